/**
 * Vitest Setup File
 * Global test configuration
 */

// Keep pino quiet and the environment deterministic for every test file
process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'silent';
