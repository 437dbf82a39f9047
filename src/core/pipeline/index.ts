export * from './types.js';
export * from './compiler.js';
