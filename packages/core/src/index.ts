/**
 * @ledgerlink/core
 *
 * Errors, result envelopes, logging and configuration helpers shared by
 * LedgerLink connectors
 */

// Types
export * from './types/index.js';

// Errors
export * from './errors/index.js';

// Results
export * from './result/index.js';

// Logging
export * from './logging/index.js';

// Configuration
export * from './config/index.js';

// Validation schemas
export * from './validation/index.js';
