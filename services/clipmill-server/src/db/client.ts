import { Pool, type PoolConfig, type QueryResultRow } from 'pg';
import type { ServiceConfig } from '../config.js';

export interface SqlClient {
  query<T extends QueryResultRow>(text: string, params?: unknown[]): Promise<T[]>;
}

export interface Database extends SqlClient {
  close(): Promise<void>;
}

type DatabaseConfig = Pick<
  ServiceConfig,
  'databaseUrl' | 'dbHost' | 'dbPort' | 'dbUser' | 'dbPassword' | 'dbName' | 'dbSsl'
>;

export function buildPoolConfig(config: DatabaseConfig): PoolConfig {
  const ssl = config.dbSsl ? { rejectUnauthorized: false } : undefined;

  if (config.databaseUrl) {
    return { connectionString: config.databaseUrl, ssl };
  }

  if (config.dbHost && config.dbUser && config.dbName) {
    return {
      host: config.dbHost,
      port: config.dbPort,
      user: config.dbUser,
      password: config.dbPassword || undefined,
      database: config.dbName,
      ssl,
    };
  }

  throw new Error('DATABASE_NOT_CONFIGURED');
}

export function createDatabase(config: DatabaseConfig): Database {
  const pool = new Pool(buildPoolConfig(config));

  return {
    async query<T extends QueryResultRow>(text: string, params: unknown[] = []): Promise<T[]> {
      const result = await pool.query<T>(text, params);
      return result.rows;
    },

    async close(): Promise<void> {
      await pool.end();
    },
  };
}
