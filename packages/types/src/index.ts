/**
 * Chipload Types Package
 *
 * Zod schemas and inferred input types for everything that crosses the
 * configuration boundary: machines, tools, work materials, calculation
 * settings and the depth-of-cut sampling spec.
 *
 * @module @chipload/types
 */

export * from './schemas/index.js';
