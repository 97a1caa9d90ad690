/**
 * School SQL Guard - Access Guard Module
 */

export * from './service.js';
export * from './executor.js';
