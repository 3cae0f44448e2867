/**
 * @splat-pipeline/shared-infrastructure
 *
 * Environment parsing, sink configuration and command-line helpers used across the pipeline packages.
 */

// Environment utilities
export * from './env/index.js';

// Result sink configuration
export * from './sink/index.js';

// Command-line option parsing
export * from './cli/index.js';
