export * from './paths.js';
export * from './writer.js';
