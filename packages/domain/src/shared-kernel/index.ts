/**
 * @fileoverview Shared Kernel
 *
 * Cross-cutting primitives used by every bounded context: dimensions,
 * units and dimensioned quantities.
 *
 * @module domain/shared-kernel
 */

export * from './value-objects/index.js';
