/**
 * Seen keys repository
 *
 * Data access layer for the seen_keys table (append-only fingerprint set).
 */

import type { SeenKey } from "@/types";
import { getDb } from "../connection";

/**
 * Load every persisted key
 */
export function listSeenKeys(): Set<SeenKey> {
  const rows = getDb().prepare("SELECT key FROM seen_keys").all() as { key: string }[];
  return new Set(rows.map((r) => r.key));
}

/**
 * Insert keys, ignoring ones already present
 *
 * @returns Number of rows actually inserted
 */
export function insertSeenKeys(keys: Iterable<SeenKey>): number {
  const db = getDb();
  const insert = db.prepare("INSERT OR IGNORE INTO seen_keys (key) VALUES (?)");

  const insertAll = db.transaction((batch: SeenKey[]) => {
    let inserted = 0;
    for (const key of batch) {
      inserted += insert.run(key).changes;
    }
    return inserted;
  });

  return insertAll(Array.from(keys));
}

export function countSeenKeys(): number {
  const row = getDb().prepare("SELECT COUNT(*) AS total FROM seen_keys").get() as {
    total: number;
  };
  return row.total;
}
