/**
 * @candlevault/utils
 *
 * Shared utility functions and helpers
 */

// Logger
export * from './logger/logger';
export * from './logger/log-config';
export * from './logger/log-buffer';
export * from './logger/file-transport';

// Errors
export * from './errors/errors';

// Time utilities
export * from './time/interval';
export * from './time/local-time';

// Configuration
export * from './validation/env-validator';
