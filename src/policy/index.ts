/**
 * School SQL Guard - Policy Module
 */

export * from './types.js';
export * from './templates.js';
export * from './store.js';
export * from './loader.js';
