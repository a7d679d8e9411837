/**
 * Models module exports
 */

// Type definitions
export * from '../types/models';

// Error taxonomy
export * from './errors';

// Validation functions and schemas
export * from './validation';

// Model transformers
export * from './transformers';

// Database migrations
export * from '../database/migrations';

// Configuration
export { getDatabase, closeDatabase } from '../config/database';
