import mariadb, { type Pool } from 'mariadb';
import { getConfig } from './config';
import type { DatabaseConfig } from './db-connection';

/** The slice of a pool or connection the repositories need. */
export interface Queryable {
  query<T>(sql: string, values?: unknown[]): Promise<T>;
}

/** Result of INSERT / UPDATE / DELETE statements. */
export interface WriteResult {
  affectedRows: number;
  insertId: number | bigint;
}

export function createPool(database: DatabaseConfig): Pool {
  return mariadb.createPool({
    host: database.host,
    port: database.port,
    user: database.user,
    password: database.password,
    database: database.database,
    ssl: database.ssl,
    connectTimeout: database.connectTimeout,
    connectionLimit: 5,
    // COUNT(*) and AUTO_INCREMENT ids stay plain numbers
    bigIntAsNumber: true,
    insertIdAsNumber: true,
  });
}

const globalForDb = globalThis as unknown as {
  pool: Pool | undefined;
};

export function getPool(): Pool {
  globalForDb.pool ??= createPool(getConfig().database);
  return globalForDb.pool;
}
