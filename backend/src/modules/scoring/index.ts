/**
 * SCORING — Module Index
 */

export * from './scoring.types.js';
export * from './scoring.math.js';
export * from './scoring.service.js';
export * from './ranking.repository.js';
export * from './scoring.routes.js';
