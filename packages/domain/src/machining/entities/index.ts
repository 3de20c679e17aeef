export * from './tool.js';
export * from './work-material.js';
export * from './machine.js';
export * from './cutting-settings.js';
