/**
 * School SQL Guard - Storage Module
 */

export { PostgresClient, initializePostgres } from './postgres.js';

export type { DatabaseClient, Row } from './postgres.js';
