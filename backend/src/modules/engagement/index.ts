/**
 * ENGAGEMENT — Module Index
 */

export * from './engagement.types.js';
export * from './engagement.ingestor.js';
export * from './engagement.repository.js';
export * from './engagement.routes.js';
