export * from './spindle-envelope.js';
export * from './cutting-parameter-calculator.js';
export * from './stepover-curve.js';
