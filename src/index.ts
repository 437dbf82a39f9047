/**
 * Sonar - cached stylesheet aggregation and compilation.
 * Main library exports barrel file.
 */

// Configuration
export * from './core/config/index.js';

// Requests and fragments
export * from './core/request/index.js';
export * from './core/fragments/index.js';

// Cache identity and records
export * from './core/identity/index.js';
export * from './core/cache/index.js';

// Compiler backends
export * from './core/adapters/index.js';

// Output and orchestration
export * from './core/output/index.js';
export * from './core/reporting/index.js';
export * from './core/pipeline/index.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli } from './cli/index.js';
