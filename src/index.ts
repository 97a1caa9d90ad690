/**
 * School SQL Guard - SQL access-control validation for a school database
 *
 * Public entry point
 */

export * from './audit/index.js';
export * from './authz/index.js';
export * from './config/index.js';
export * from './extractor/index.js';
export * from './guard/index.js';
export * from './identity/index.js';
export * from './policy/index.js';
export * from './sql/index.js';
export * from './storage/index.js';
export { bootstrap, createGuardFromConfig } from './bootstrap.js';
export type { BootstrapOptions, GuardRuntime, RuntimeOptions } from './bootstrap.js';
export { default as logger, createChildLogger } from './utils/logger.js';
export * from './utils/types.js';
