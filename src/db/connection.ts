/**
 * SQLite database connection
 *
 * Manages database connection lifecycle and configuration.
 */

import Database from "better-sqlite3";
import { mkdirSync } from "fs";
import { dirname, join } from "path";
import { DEFAULT_DB_PATH } from "@/constants";

let db: Database.Database | null = null;

/**
 * Resolve the database file path (argument, then DB_PATH, then default)
 */
function resolveDbPath(dbPath?: string): string {
  const resolved = dbPath || process.env.DB_PATH || join(process.cwd(), DEFAULT_DB_PATH);

  // Ensure parent directory exists (skip for :memory:)
  if (resolved !== ":memory:") {
    mkdirSync(dirname(resolved), { recursive: true });
  }

  return resolved;
}

/**
 * Open database connection with required pragmas
 * Returns existing connection if already open
 */
export function openDb(dbPath?: string): Database.Database {
  if (db) {
    return db;
  }

  db = new Database(resolveDbPath(dbPath));

  // WAL mode so an interrupted run never leaves a half-written journal
  db.pragma("journal_mode = WAL");

  return db;
}

/**
 * Close database connection
 */
export function closeDb(): void {
  if (db) {
    db.close();
    db = null;
  }
}

/**
 * Get current database connection (must be opened first)
 */
export function getDb(): Database.Database {
  if (!db) {
    throw new Error("Database not opened. Call openDb() first.");
  }
  return db;
}

/**
 * Set database connection for testing purposes only.
 * This allows injecting a test database into the singleton.
 *
 * @internal Test use only - do not use in production code
 */
export function setDbForTesting(testDb: Database.Database | null): void {
  db = testDb;
}
