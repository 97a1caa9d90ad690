/**
 * School SQL Guard - Audit Module
 */

export * from './log.js';
