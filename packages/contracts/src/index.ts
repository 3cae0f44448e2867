export * from './job.js';
export * from './errors.js';
export * from './observability.js';
