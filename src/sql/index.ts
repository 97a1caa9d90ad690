/**
 * School SQL Guard - SQL Module
 * Token-level SQL helpers
 */

export * from './lexer.js';
export * from './clauses.js';
