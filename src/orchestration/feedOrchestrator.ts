/**
 * Feed orchestrator: runs every configured company once and dedups the batch
 *
 * Companies are processed sequentially:
 *   detect provider → resolve identifier → fetch → keyword filter → accumulate
 *
 * Dedup runs exactly once, after the last company, over the whole batch.
 * Only the persisted seen set suppresses postings; two companies producing
 * the same URL in one run both reach the output.
 *
 * Adapter failures and unresolvable companies contribute zero postings; only
 * seen-store I/O can reject the returned promise.
 */

import type { AtsPostingsClient, SeenStore } from "@/interfaces";
import type {
  CompanyInput,
  CompanyRunResult,
  FeedRunCounters,
  FeedRunResult,
  Logger,
  NormalizedPosting,
  ResolvedProvider,
} from "@/types";
import type { AtsClientRegistry } from "@/clients/atsClientRegistry";
import { detectProvider, resolveSlug } from "@/atsDetection";
import { filterByKeywords } from "@/filtering";
import { partitionFreshPostings } from "@/dedup";
import * as logger from "@/logger";

export interface FeedRunDeps {
  registry: AtsClientRegistry;
  seenStore: SeenStore;
  /** Defaults to the project logger */
  logger?: Logger;
}

type CompanyOutcome = {
  result: CompanyRunResult;
  postings: NormalizedPosting[];
};

function skipped(
  company: CompanyInput,
  provider: ResolvedProvider,
  identifier: string,
  note: string,
): CompanyOutcome {
  return {
    result: {
      company: company.name,
      provider,
      identifier,
      status: "SKIPPED",
      fetched: 0,
      kept: 0,
      note,
    },
    postings: [],
  };
}

/**
 * Identifier handed to the client: configured value, else derived from careerUrl
 */
function resolveIdentifier(client: AtsPostingsClient, company: CompanyInput): string {
  const configured = company.identifier.trim();
  if (configured !== "" || !client.requiresIdentifier) {
    return configured;
  }
  return resolveSlug(client.provider, company.careerUrl);
}

async function runCompany(
  company: CompanyInput,
  deps: FeedRunDeps,
  parentLog: Logger,
): Promise<CompanyOutcome> {
  const log = logger.withContext({ company: company.name }, parentLog);
  const provider = detectProvider(company.providerHint, company.identifier, company.careerUrl);

  if (provider === "unknown") {
    log.info("Skipping company: provider could not be detected", { careerUrl: company.careerUrl });
    return skipped(company, provider, company.identifier, "provider not detected");
  }

  const client = deps.registry.get(provider);
  if (!client) {
    log.info("Skipping company: no client registered for provider", { provider });
    return skipped(company, provider, company.identifier, "no client registered");
  }

  const identifier = resolveIdentifier(client, company);
  if (client.requiresIdentifier && identifier === "") {
    log.info("Skipping company: no identifier configured or derivable", {
      provider,
      careerUrl: company.careerUrl,
    });
    return skipped(company, provider, identifier, "identifier not resolved");
  }

  const fetchResult = await client.fetchPostings({
    identifier,
    displayName: company.name,
    careerUrl: company.careerUrl,
  });

  if (fetchResult.status === "error") {
    return {
      result: {
        company: company.name,
        provider,
        identifier,
        status: "ERROR",
        fetched: 0,
        kept: 0,
        note: fetchResult.reason,
      },
      postings: [],
    };
  }

  const kept = filterByKeywords(fetchResult.postings, company.keywords);

  return {
    result: {
      company: company.name,
      provider,
      identifier,
      status: "DONE",
      fetched: fetchResult.postings.length,
      kept: kept.length,
    },
    postings: kept,
  };
}

/**
 * Run the feed once over the configured companies
 *
 * @returns Fresh postings in input order, their keys and per-company outcomes
 */
export async function runFeedOnce(
  companies: CompanyInput[],
  deps: FeedRunDeps,
): Promise<FeedRunResult> {
  const log = deps.logger ?? logger;
  const results: CompanyRunResult[] = [];
  const accumulated: NormalizedPosting[] = [];

  const counters: FeedRunCounters = {
    companies: companies.length,
    companiesSkipped: 0,
    companiesFailed: 0,
    postingsFetched: 0,
    postingsKept: 0,
    postingsFresh: 0,
    postingsAlreadySeen: 0,
  };

  for (const company of companies) {
    const { result, postings } = await runCompany(company, deps, log);

    results.push(result);
    accumulated.push(...postings);

    if (result.status === "SKIPPED") {
      counters.companiesSkipped++;
    } else if (result.status === "ERROR") {
      counters.companiesFailed++;
    }
    counters.postingsFetched += result.fetched;
    counters.postingsKept += result.kept;
  }

  const seen = await deps.seenStore.load();
  const { fresh, freshKeys } = partitionFreshPostings(accumulated, seen);

  if (freshKeys.size > 0) {
    await deps.seenStore.persist(freshKeys);
  }

  counters.postingsFresh = fresh.length;
  counters.postingsAlreadySeen = accumulated.length - fresh.length;

  log.info("Feed run finished", { ...counters });

  return { fresh, freshKeys, companies: results, counters };
}
