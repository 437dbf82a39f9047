/**
 * Cache module exports.
 */
export * from './types.js';
export * from './store.js';
export * from './validator.js';
