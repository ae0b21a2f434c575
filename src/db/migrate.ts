/**
 * Database migration runner
 *
 * Applies SQL migrations from migrations/ directory in order.
 */

import type Database from "better-sqlite3";
import { readdirSync, readFileSync } from "fs";
import { join } from "path";
import * as logger from "@/logger";

function migrationsDir(): string {
  return join(process.cwd(), "migrations");
}

/**
 * Ensure schema_migrations table exists
 */
function ensureMigrationsTable(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      version TEXT NOT NULL UNIQUE,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    );
  `);
}

/**
 * Get list of applied migrations
 */
function getAppliedMigrations(db: Database.Database): Set<string> {
  const rows = db.prepare("SELECT version FROM schema_migrations").all() as {
    version: string;
  }[];
  return new Set(rows.map((r) => r.version));
}

/**
 * Get pending migrations from migrations/ directory
 */
function getPendingMigrations(appliedMigrations: Set<string>): string[] {
  let files: string[];
  try {
    files = readdirSync(migrationsDir());
  } catch (err) {
    logger.warn("Migrations directory not readable", {
      dir: migrationsDir(),
      error: err instanceof Error ? err.message : String(err),
    });
    return [];
  }

  return files
    .filter((f) => f.endsWith(".sql"))
    .sort()
    .filter((f) => !appliedMigrations.has(f));
}

/**
 * Apply a single migration file atomically
 */
function applyMigration(db: Database.Database, filename: string): void {
  const sql = readFileSync(join(migrationsDir(), filename), "utf-8");

  // Wrap migration + recording in a transaction
  const transaction = db.transaction(() => {
    db.exec(sql);
    db.prepare("INSERT INTO schema_migrations (version) VALUES (?)").run(filename);
  });

  transaction();
}

/**
 * Run all pending migrations on the given database
 *
 * @returns Names of the migrations applied by this call
 */
export function runMigrations(db: Database.Database): string[] {
  ensureMigrationsTable(db);

  const pendingMigrations = getPendingMigrations(getAppliedMigrations(db));
  for (const migration of pendingMigrations) {
    logger.debug("Applying migration", { migration });
    applyMigration(db, migration);
  }

  return pendingMigrations;
}
