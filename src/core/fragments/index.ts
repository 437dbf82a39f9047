export * from './types.js';
export * from './normalizer.js';
