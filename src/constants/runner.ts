/**
 * Feed runner constants: environment defaults
 */

import type { SeenStoreKind } from "@/types";

export const DEFAULT_INPUT_PATH = "companies.csv";

export const DEFAULT_OUTPUT_DIR = "out";

export const DEFAULT_SEEN_PATH = "seen.csv";

export const DEFAULT_DB_PATH = "data/seen.db";

export const DEFAULT_HTTP_TIMEOUT_SECONDS = 20;

export const DEFAULT_SEEN_STORE: SeenStoreKind = "file";

export const SEEN_STORE_KINDS: readonly SeenStoreKind[] = ["file", "sqlite"];
