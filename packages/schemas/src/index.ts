/**
 * @candlevault/schemas
 *
 * Single source of truth for Zod schemas and shared TypeScript types
 */

// Market data schemas
export * from './market/kline.schema';

// Collaborator contracts
export * from './adapter';

// Environment and configuration schemas
export * from './env/config.schema';
