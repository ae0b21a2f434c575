/**
 * CLI entrypoint: runs the job feed once
 *
 * Usage:
 *   npm start
 *
 * Environment variables (all optional, see .env.example):
 *   - INPUT_PATH: company CSV (company_name, provider, slug, career_url, keywords)
 *   - OUTPUT_DIR: directory for new_openings_<timestamp>.csv
 *   - SEEN_STORE: file | sqlite
 *   - SEEN_PATH / DB_PATH: seen store location
 *   - HTTP_TIMEOUT: per-request timeout in seconds
 *   - HTTP_UA: User-Agent sent to providers
 *   - LOG_LEVEL: debug | info | warn | error
 */

import "dotenv/config";
import type { SeenStore } from "@/interfaces";
import type { RunConfig } from "@/types";
import { createAtsClientRegistry } from "@/clients/atsClientRegistry";
import { closeDb, openDb, runMigrations } from "@/db";
import { FileSeenStore, SqliteSeenStore } from "@/dedup";
import { readCompanyInputs, writePostingsCsv } from "@/io";
import { loadRunConfig, runFeedOnce } from "@/orchestration";
import * as logger from "@/logger";

function createSeenStore(config: RunConfig): SeenStore {
  if (config.seenStore === "sqlite") {
    runMigrations(openDb(config.dbPath));
    return new SqliteSeenStore();
  }
  return new FileSeenStore(config.seenPath);
}

async function main() {
  const config = loadRunConfig();
  logger.setLogLevel(config.logLevel);

  const companies = await readCompanyInputs(config.inputPath);
  logger.info("Starting feed run", {
    companies: companies.length,
    input: config.inputPath,
    seenStore: config.seenStore,
  });

  const registry = createAtsClientRegistry({
    timeoutMs: config.httpTimeoutMs,
    userAgent: config.userAgent,
  });

  try {
    const result = await runFeedOnce(companies, {
      registry,
      seenStore: createSeenStore(config),
    });

    const outputPath = await writePostingsCsv(config.outputDir, result.fresh);
    logger.info("Fresh postings written", {
      path: outputPath,
      fresh: result.counters.postingsFresh,
      alreadySeen: result.counters.postingsAlreadySeen,
    });
  } finally {
    closeDb();
  }
}

main().catch((error: unknown) => {
  logger.error("Feed run failed with fatal error", {
    error: error instanceof Error ? error.message : String(error),
    stack: error instanceof Error ? error.stack : undefined,
  });
  process.exit(1);
});
