export * from './enums.js';
export * from './fact.js';
export * from './symbolic.js';
export * from './memory.js';
export * from './session.js';
export * from './extraction.js';
export * from './turn-result.js';
export * from './context.js';
