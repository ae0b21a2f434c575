/**
 * SQLite-backed seen store (seen_keys table)
 *
 * Requires an open connection with migrations applied (see @/db).
 */

import type { SeenStore } from "@/interfaces";
import type { SeenKey } from "@/types";
import { insertSeenKeys, listSeenKeys } from "@/db";
import * as logger from "@/logger";

export class SqliteSeenStore implements SeenStore {
  async load(): Promise<Set<SeenKey>> {
    return listSeenKeys();
  }

  async persist(keys: Iterable<SeenKey>): Promise<void> {
    const inserted = insertSeenKeys(keys);
    logger.debug("Seen keys persisted", { inserted });
  }
}
