/**
 * School SQL Guard - Authorization Module
 */

export * from './types.js';
export * from './evaluator.js';
export * from './rewriter.js';
