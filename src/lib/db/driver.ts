/**
 * Database driver abstraction for SQLite (default) and PostgreSQL
 *
 * - better-sqlite3 against a local file when DATABASE_URL is not a postgres URL
 * - pg when DATABASE_URL starts with "postgres"
 *
 * SQL is written with `?` placeholders; the postgres client rewrites them.
 */

import * as path from "path";
import * as fs from "fs";
import type { QueryResult } from "pg";
import { ConfigError } from "../errors";
import { logger as rootLogger } from "../logger";

const logger = rootLogger.child("db");

export type DatabaseDriver = "sqlite" | "postgres";

export interface DbResult {
  rows: Record<string, unknown>[];
  rowCount: number;
}

/**
 * Statement execution, shared by the client and by an open transaction
 */
export interface DbExecutor {
  driver: DatabaseDriver;
  query(sql: string, params?: unknown[]): Promise<DbResult>;
  run(sql: string, params?: unknown[]): Promise<{ changes: number }>;
}

export interface DatabaseClient extends DbExecutor {
  exec(sql: string): Promise<void>;
  /** Run `fn` in one transaction; rolled back if it throws */
  transaction<T>(fn: (tx: DbExecutor) => Promise<T>): Promise<T>;
  close(): Promise<void>;
}

export const DEFAULT_SQLITE_PATH = path.join(".data", "debates.db");

interface PgQueryable {
  query(text: string, values?: unknown[]): Promise<QueryResult>;
}

let clientInstance: DatabaseClient | null = null;

/**
 * Detect which database driver to use based on environment
 */
export function detectDriver(env: NodeJS.ProcessEnv = process.env): DatabaseDriver {
  return env.DATABASE_URL?.startsWith("postgres") ? "postgres" : "sqlite";
}

/**
 * SQLite file the shared client opens, resolved against the working directory
 */
export function sqlitePath(env: NodeJS.ProcessEnv = process.env): string {
  return path.resolve(process.cwd(), env.DATABASE_PATH || DEFAULT_SQLITE_PATH);
}

/**
 * The classifier reads an existing store; opening a missing SQLite file would
 * create an empty one. Throws ConfigError when the file is not there.
 */
export function assertStoreExists(env: NodeJS.ProcessEnv = process.env): void {
  if (detectDriver(env) === "postgres") {
    return;
  }
  const dbPath = sqlitePath(env);
  if (!fs.existsSync(dbPath)) {
    throw new ConfigError(`Debate store not found at ${dbPath}`, [
      "Set DATABASE_PATH to the ingested SQLite file, or DATABASE_URL to a postgres URL",
    ]);
  }
}

/**
 * Get or create the shared database client
 */
export async function getDbClient(): Promise<DatabaseClient> {
  if (clientInstance) {
    return clientInstance;
  }

  const driver = detectDriver();
  const client =
    driver === "postgres"
      ? await createPostgresClient(process.env.DATABASE_URL ?? "")
      : await createSqliteClient(sqlitePath());

  const close = client.close.bind(client);
  client.close = async () => {
    await close();
    clientInstance = null;
  };
  clientInstance = client;

  logger.info(`Database initialized with ${driver} driver`);
  return client;
}

/**
 * Create SQLite client. `:memory:` gives a private in-process database.
 */
export async function createSqliteClient(dbPath: string): Promise<DatabaseClient> {
  const Database = (await import("better-sqlite3")).default;

  if (dbPath !== ":memory:") {
    const dataDir = path.dirname(path.resolve(process.cwd(), dbPath));
    if (!fs.existsSync(dataDir)) {
      fs.mkdirSync(dataDir, { recursive: true });
    }
  }

  const sqlite = new Database(dbPath);
  sqlite.pragma("foreign_keys = ON");
  if (dbPath !== ":memory:") {
    sqlite.pragma("journal_mode = WAL");
  }

  const executor: DbExecutor = {
    driver: "sqlite",

    async query(sql: string, params?: unknown[]): Promise<DbResult> {
      const stmt = sqlite.prepare(sql);
      const rows = params ? stmt.all(...params) : stmt.all();
      return {
        rows: rows as Record<string, unknown>[],
        rowCount: rows.length,
      };
    },

    async run(sql: string, params?: unknown[]): Promise<{ changes: number }> {
      const stmt = sqlite.prepare(sql);
      const result = params ? stmt.run(...params) : stmt.run();
      return { changes: result.changes };
    },
  };

  return {
    ...executor,

    async exec(sql: string): Promise<void> {
      sqlite.exec(sql);
    },

    async transaction<T>(fn: (tx: DbExecutor) => Promise<T>): Promise<T> {
      sqlite.exec("BEGIN");
      try {
        const result = await fn(executor);
        sqlite.exec("COMMIT");
        return result;
      } catch (error) {
        if (sqlite.inTransaction) {
          sqlite.exec("ROLLBACK");
        }
        throw error;
      }
    },

    async close(): Promise<void> {
      sqlite.close();
    },
  };
}

/**
 * Create PostgreSQL client
 */
export async function createPostgresClient(databaseUrl: string): Promise<DatabaseClient> {
  const { Pool } = await import("pg");

  if (!databaseUrl) {
    throw new Error("DATABASE_URL is required for PostgreSQL");
  }
  const needsSSL = process.env.NODE_ENV === "production" || process.env.DATABASE_SSL === "true";

  const pool = new Pool({
    connectionString: databaseUrl,
    ssl: needsSSL ? { rejectUnauthorized: false } : undefined,
    max: 4, // the classifier writes sequentially
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 10000,
    statement_timeout: 60000,
  });

  // Test connection
  await pool.query("SELECT 1");

  const executorFor = (queryable: PgQueryable): DbExecutor => ({
    driver: "postgres",

    async query(sql: string, params?: unknown[]): Promise<DbResult> {
      const result = await queryable.query(convertPlaceholders(sql), params);
      return {
        rows: result.rows,
        rowCount: result.rowCount ?? 0,
      };
    },

    async run(sql: string, params?: unknown[]): Promise<{ changes: number }> {
      const result = await queryable.query(convertPlaceholders(sql), params);
      return { changes: result.rowCount ?? 0 };
    },
  });

  return {
    ...executorFor(pool),

    async exec(sql: string): Promise<void> {
      // Split multiple statements and execute
      const statements = sql.split(";").filter((s) => s.trim());
      for (const stmt of statements) {
        await pool.query(stmt);
      }
    },

    async transaction<T>(fn: (tx: DbExecutor) => Promise<T>): Promise<T> {
      const conn = await pool.connect();
      try {
        await conn.query("BEGIN");
        const result = await fn(executorFor(conn));
        await conn.query("COMMIT");
        return result;
      } catch (error) {
        await conn.query("ROLLBACK");
        throw error;
      } finally {
        conn.release();
      }
    },

    async close(): Promise<void> {
      await pool.end();
    },
  };
}

/**
 * Convert SQLite ? placeholders to PostgreSQL $1, $2, etc.
 */
export function convertPlaceholders(sql: string): string {
  let index = 0;
  return sql.replace(/\?/g, () => `$${++index}`);
}

/**
 * INSERT ... ON CONFLICT clause updating `updateColumns` (same syntax on both drivers)
 */
export function upsertSyntax(conflictColumn: string, updateColumns: string[]): string {
  const updates = updateColumns.map((col) => `${col} = excluded.${col}`).join(", ");
  return `ON CONFLICT (${conflictColumn}) DO UPDATE SET ${updates}`;
}
