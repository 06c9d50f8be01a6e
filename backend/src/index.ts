export * from './common/errors.js';
export type { Logger } from './common/logger.js';
export type { Clock } from './common/clock.js';
export { loadEnv, type Env } from './config/env.js';
export { buildApp, type AppOptions } from './app.js';
export { createEngine, mongoParts, settingsFrom, type Engine, type EngineParts, type EngineSettings } from './engine.js';
export * from './modules/engagement/index.js';
export * from './modules/catalog/index.js';
export * from './modules/scoring/index.js';
export * from './modules/exposure/index.js';
