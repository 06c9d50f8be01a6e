/**
 * CATALOG — Module Index
 */

export * from './catalog.types.js';
export * from './catalog.client.js';
export * from './promotion.parser.js';
export * from './promotion.matcher.js';
