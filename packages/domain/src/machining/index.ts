/**
 * @fileoverview Machining Bounded Context
 *
 * @module domain/machining
 */

export * from './entities/index.js';
export * from './services/index.js';
export * from './cutting-report.js';
export * from './catalog.js';
export * from './machining-service.js';
