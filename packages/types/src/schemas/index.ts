/**
 * Schema barrel - Single Source of Truth for catalog input validation
 */
export * from './common.js';
export * from './machining.js';
