/**
 * branch-promoter - merge a development branch into main and push it,
 * restoring the starting branch on any failure.
 * Main library exports barrel file.
 */

// Configuration
export * from './core/config/index.js';

// Promotion workflow
export * from './core/promote/index.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli } from './cli/index.js';
