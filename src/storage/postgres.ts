/**
 * School SQL Guard - PostgreSQL Database Client
 * Connection pool and query helpers for the school database
 */

import pgPromise, { type IDatabase, type IMain } from 'pg-promise';

import logger from '../utils/logger.js';
import type { PostgresConfig } from '../utils/types.js';
import { DatabaseError, errorMessage } from '../utils/types.js';

// =============================================================================
// Types
// =============================================================================

export type Row = Record<string, unknown>;

/**
 * The slice of a database the guard and its collaborators use.
 * Rows come back untyped; callers validate what they read.
 */
export interface DatabaseClient {
  query(sql: string, params?: unknown[]): Promise<Row[]>;
  queryOne(sql: string, params?: unknown[]): Promise<Row | null>;
  execute(sql: string, params?: unknown[]): Promise<number>;
  close(): Promise<void>;
}

// =============================================================================
// PostgreSQL Client Class
// =============================================================================

export class PostgresClient implements DatabaseClient {
  private pgp: IMain;
  private db: IDatabase<object>;
  private config: PostgresConfig;

  constructor(config: PostgresConfig) {
    this.config = config;

    this.pgp = pgPromise({
      capSQL: true,

      query(e) {
        logger.debug('PostgreSQL query', {
          query: e.query.substring(0, 200),
        });
      },

      error(err, e) {
        logger.error('PostgreSQL error', {
          error: errorMessage(err),
          query: e.query?.substring(0, 200),
        });
      },
    });

    this.db = this.pgp({
      host: config.host,
      port: config.port,
      database: config.database,
      user: config.user,
      password: config.password,
      ssl: config.ssl ? { rejectUnauthorized: false } : false,
      max: config.poolMax,
      min: config.poolMin,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 10000,
    });
  }

  /**
   * Test database connection
   */
  public async connect(): Promise<void> {
    try {
      const connection = await this.db.connect();
      void connection.done();
      logger.info('PostgreSQL connection pool initialized', {
        host: this.config.host,
        port: this.config.port,
        database: this.config.database,
      });
    } catch (error) {
      const message = errorMessage(error);
      logger.error('Failed to connect to PostgreSQL', {
        host: this.config.host,
        port: this.config.port,
        error: message,
      });
      throw new DatabaseError(`Failed to connect to PostgreSQL: ${message}`);
    }
  }

  /**
   * Execute a query and return all rows
   */
  public async query(sql: string, params?: unknown[]): Promise<Row[]> {
    try {
      return await this.db.any<Row>(sql, params);
    } catch (error) {
      throw new DatabaseError(`Query failed: ${errorMessage(error)}`);
    }
  }

  /**
   * Execute a query and return a single row or null
   */
  public async queryOne(sql: string, params?: unknown[]): Promise<Row | null> {
    try {
      return await this.db.oneOrNone<Row>(sql, params);
    } catch (error) {
      throw new DatabaseError(`Query failed: ${errorMessage(error)}`);
    }
  }

  /**
   * Execute INSERT, UPDATE or DELETE and return the affected row count
   */
  public async execute(sql: string, params?: unknown[]): Promise<number> {
    try {
      const result = await this.db.result(sql, params);
      return result.rowCount;
    } catch (error) {
      throw new DatabaseError(`Execute failed: ${errorMessage(error)}`);
    }
  }

  /**
   * Close all connections
   */
  public async close(): Promise<void> {
    this.pgp.end();
    logger.info('PostgreSQL connection pool closed');
  }
}

export async function initializePostgres(config: PostgresConfig): Promise<PostgresClient> {
  const client = new PostgresClient(config);
  await client.connect();
  return client;
}

export default PostgresClient;
