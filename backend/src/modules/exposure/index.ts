/**
 * EXPOSURE MODULE — Index
 */

export * from './exposure.types.js';
export * from './exposure.selection.js';
export * from './exposure.cache.js';
export * from './exposure.builder.js';
export * from './exposure.service.js';
export * from './exposure.repository.js';
export { registerExposureRoutes } from './exposure.routes.js';
