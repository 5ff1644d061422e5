export * from './types.js';
export * from './loader.js';
export * from './runtime.js';
