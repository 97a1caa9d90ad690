/**
 * School SQL Guard - Identity Module
 */

export * from './types.js';
export * from './resolver.js';
