/**
 * Data Models
 *
 * Barrel export for all model interfaces.
 */

// Record models
export * from './record.js';

// Job models
export * from './job.js';
