import fs from 'node:fs';
import path from 'node:path';
import { Pool } from 'pg';
import type { PoolClient, QueryResultRow } from 'pg';
import sqlite3 from 'sqlite3';
import type { RunResult } from 'sqlite3';
import { getMigrationSql, type SqlDialect } from './schema';

const DEFAULT_SQLITE_URL = 'file:./data/dev.db';

export interface SqlExecutor {
  dialect: SqlDialect;
  // Resolves with the number of rows the statement changed.
  execute: (sql: string, params?: unknown[]) => Promise<number>;
  query: <T extends QueryResultRow = QueryResultRow>(sql: string, params?: unknown[]) => Promise<T[]>;
}

export interface DatabaseClient extends SqlExecutor {
  // Runs `work` inside BEGIN/COMMIT; any rejection rolls back every write made through `tx`.
  transaction: <T>(work: (tx: SqlExecutor) => Promise<T>) => Promise<T>;
  healthCheck: () => Promise<boolean>;
  close: () => Promise<void>;
}

function detectDialect(databaseUrl: string): SqlDialect {
  if (databaseUrl.startsWith('postgres://') || databaseUrl.startsWith('postgresql://')) {
    return 'postgres';
  }
  return 'sqlite';
}

function resolveSqlitePath(databaseUrl: string): string {
  const raw = databaseUrl.startsWith('file:') ? databaseUrl.slice(5) : databaseUrl;
  if (!raw || raw === ':memory:') {
    return ':memory:';
  }

  const absolutePath = path.resolve(process.cwd(), raw);
  const directory = path.dirname(absolutePath);
  fs.mkdirSync(directory, { recursive: true });
  return absolutePath;
}

async function createSqliteClient(databaseUrl: string): Promise<DatabaseClient> {
  const sqliteFile = resolveSqlitePath(databaseUrl);
  const db = new sqlite3.Database(sqliteFile);

  const exec = (sql: string) =>
    new Promise<void>((resolve, reject) => {
      db.exec(sql, (error: Error | null) => {
        if (error) {
          reject(error);
          return;
        }
        resolve();
      });
    });

  const run = (sql: string, params: unknown[] = []) =>
    new Promise<number>((resolve, reject) => {
      db.run(sql, params, function (this: RunResult, error: Error | null) {
        if (error) {
          reject(error);
          return;
        }
        resolve(this.changes);
      });
    });

  const all = <T>(sql: string, params: unknown[] = []) =>
    new Promise<T[]>((resolve, reject) => {
      db.all<T>(sql, params, (error: Error | null, rows: T[]) => {
        if (error) {
          reject(error);
          return;
        }
        resolve(rows);
      });
    });

  const close = () =>
    new Promise<void>((resolve, reject) => {
      db.close((error: Error | null) => {
        if (error) {
          reject(error);
          return;
        }
        resolve();
      });
    });

  const executor: SqlExecutor = {
    dialect: 'sqlite',
    execute: async (sql, params = []) => {
      if (params.length) {
        return run(sql, params);
      }
      await exec(sql);
      return 0;
    },
    query: <T extends QueryResultRow = QueryResultRow>(sql: string, params: unknown[] = []) =>
      all<T>(sql, params),
  };

  // One connection: a statement issued outside a transaction must not land inside
  // another caller's open BEGIN, so every top-level call waits its turn.
  let transactionTail: Promise<void> = Promise.resolve();
  const runExclusive = <T>(task: () => Promise<T>): Promise<T> => {
    const result = transactionTail.then(task);
    transactionTail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  };

  await exec('PRAGMA foreign_keys = ON;');

  return {
    dialect: 'sqlite',
    execute: (sql, params) => runExclusive(() => executor.execute(sql, params)),
    query: <T extends QueryResultRow = QueryResultRow>(sql: string, params?: unknown[]) =>
      runExclusive(() => executor.query<T>(sql, params)),
    transaction: <T>(work: (tx: SqlExecutor) => Promise<T>) =>
      runExclusive(async () => {
        await exec('BEGIN');
        try {
          const result = await work(executor);
          await exec('COMMIT');
          return result;
        } catch (error) {
          await exec('ROLLBACK');
          throw error;
        }
      }),
    healthCheck: async () => {
      try {
        await runExclusive(() => all('SELECT 1 as ok;'));
        return true;
      } catch {
        return false;
      }
    },
    close,
  };
}

function wrapPostgresClient(client: Pool | PoolClient): SqlExecutor {
  return {
    dialect: 'postgres',
    execute: async (sql: string, params: unknown[] = []) => {
      const result = await client.query(sql, params);
      return result.rowCount ?? 0;
    },
    query: async <T extends QueryResultRow = QueryResultRow>(sql: string, params: unknown[] = []) => {
      const result = await client.query<T>(sql, params);
      return result.rows;
    },
  };
}

async function createPostgresClient(databaseUrl: string): Promise<DatabaseClient> {
  const pool = new Pool({ connectionString: databaseUrl });

  return {
    ...wrapPostgresClient(pool),
    transaction: async <T>(work: (tx: SqlExecutor) => Promise<T>) => {
      const connection = await pool.connect();
      try {
        await connection.query('BEGIN');
        const result = await work(wrapPostgresClient(connection));
        await connection.query('COMMIT');
        return result;
      } catch (error) {
        await connection.query('ROLLBACK');
        throw error;
      } finally {
        connection.release();
      }
    },
    healthCheck: async () => {
      try {
        await pool.query('SELECT 1 AS ok;');
        return true;
      } catch {
        return false;
      }
    },
    close: async () => {
      await pool.end();
    },
  };
}

async function runMigrations(client: DatabaseClient): Promise<void> {
  const migrationSql = getMigrationSql(client.dialect);
  for (const sql of migrationSql) {
    await client.execute(sql);
  }
}

export async function createDatabaseClient(databaseUrl?: string): Promise<DatabaseClient> {
  const resolvedUrl = databaseUrl ?? process.env.DATABASE_URL ?? DEFAULT_SQLITE_URL;
  const dialect = detectDialect(resolvedUrl);

  if (dialect === 'postgres') {
    return createPostgresClient(resolvedUrl);
  }
  return createSqliteClient(resolvedUrl);
}

export async function initDatabase(databaseUrl?: string): Promise<DatabaseClient> {
  const client = await createDatabaseClient(databaseUrl);
  await runMigrations(client);
  return client;
}
