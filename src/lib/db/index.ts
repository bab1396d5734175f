/**
 * Database initialization
 *
 * Supports both SQLite (default) and PostgreSQL.
 * Driver detection is automatic based on DATABASE_URL env var.
 */

import { logger as rootLogger } from "../logger";
import { type DatabaseClient, getDbClient } from "./driver";
import { SPEECH_OUTCOME_COLUMNS, SQLITE_TABLES_SQL } from "./schema";
import { POSTGRES_SPEECH_OUTCOME_SQL, POSTGRES_TABLES_SQL } from "./schema-postgres";

const logger = rootLogger.child("db");

const initializedClients = new WeakSet<DatabaseClient>();

/**
 * Create tables if they don't exist and add the outcome columns to speeches.
 * Uses the shared client unless one is passed in.
 */
export async function initializeDatabase(client?: DatabaseClient): Promise<DatabaseClient> {
  const db = client ?? (await getDbClient());
  if (initializedClients.has(db)) {
    return db;
  }

  try {
    if (db.driver === "postgres") {
      await db.exec(POSTGRES_TABLES_SQL);
      await db.exec(POSTGRES_SPEECH_OUTCOME_SQL);
    } else {
      await db.exec(SQLITE_TABLES_SQL);
      await addMissingSqliteColumns(db);
    }
  } catch (error) {
    logger.error(`Failed to initialize ${db.driver} schema`, error);
    throw error;
  }

  initializedClients.add(db);
  logger.info(`${db.driver} schema initialized`);
  return db;
}

/**
 * SQLite has no ADD COLUMN IF NOT EXISTS; compare against table_info instead
 */
async function addMissingSqliteColumns(db: DatabaseClient): Promise<void> {
  const { rows } = await db.query("PRAGMA table_info(speeches)");
  const existing = new Set(rows.map((row) => String(row.name)));

  for (const [name, type] of SPEECH_OUTCOME_COLUMNS) {
    if (!existing.has(name)) {
      await db.exec(`ALTER TABLE speeches ADD COLUMN ${name} ${type}`);
      logger.debug(`Added speeches.${name}`);
    }
  }
}

export type { DatabaseClient, DbExecutor, DatabaseDriver } from "./driver";
export { assertStoreExists, getDbClient, createSqliteClient, createPostgresClient } from "./driver";
