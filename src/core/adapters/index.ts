export * from './types.js';
export * from './null-adapter.js';
export * from './sass-adapter.js';
export * from './registry.js';
