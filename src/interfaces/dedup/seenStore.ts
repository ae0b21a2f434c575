/**
 * SeenStore interface: durable, append-only set of posting fingerprints
 */

import type { SeenKey } from "@/types";

export interface SeenStore {
  /**
   * Load every persisted key (missing storage means an empty set)
   */
  load(): Promise<Set<SeenKey>>;

  /**
   * Append keys to durable storage; existing entries are never rewritten
   */
  persist(keys: Iterable<SeenKey>): Promise<void>;
}
