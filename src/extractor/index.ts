/**
 * School SQL Guard - Intent Extractor Module
 */

export * from './types.js';
export * from './pattern.js';
export * from './semantic.js';
export * from './reasoning-client.js';
export * from './chain.js';
