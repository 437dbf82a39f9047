export * from './request.js';
export * from './manifest.js';
