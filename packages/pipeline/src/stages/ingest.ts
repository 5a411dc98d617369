import type { ContestQuery, ContestSource } from "@contestcal/connectors";
import {
  type ContestRecord,
  createLogger,
  describeResourceFilter,
  errorMessage,
  isContestCalError,
  type ResourceFilter,
} from "@contestcal/shared";

const log = createLogger({ component: "ingest" });

export interface IngestResourceResult {
  resource: string;
  requests: number;
  fetched: number;
  normalized: number;
  skipped: number;
  /** CLIST reported further pages that the per-resource limit cut off. */
  truncated: boolean;
}

export interface IngestRunResult {
  contests: ContestRecord[];
  perResource: IngestResourceResult[];
  totals: {
    resources: number;
    requests: number;
    fetched: number;
    normalized: number;
    skipped: number;
  };
}

/** Record-level failures that drop one contest instead of aborting the run. */
function isSkippableRecordError(err: unknown): boolean {
  return isContestCalError(err) && (err.code === "API_ERROR" || err.code === "TIME_PARSING_ERROR");
}

/**
 * Fetch and normalize contests for each resource in turn. Resources are never
 * queried concurrently; any fetch failure aborts the whole run.
 */
export async function ingestContests(params: {
  source: ContestSource;
  filters: readonly ResourceFilter[];
  query: ContestQuery;
}): Promise<IngestRunResult> {
  const { source, filters, query } = params;
  const limit = Math.max(0, Math.floor(query.perResourceLimit));

  const contests: ContestRecord[] = [];
  const perResource: IngestResourceResult[] = [];
  const totals = { resources: filters.length, requests: 0, fetched: 0, normalized: 0, skipped: 0 };

  for (const filter of filters) {
    const resource = describeResourceFilter(filter);
    const fetchResult = await source.fetch(filter, query);

    const result: IngestResourceResult = {
      resource,
      requests: fetchResult.meta.requests,
      fetched: fetchResult.rawItems.length,
      normalized: 0,
      skipped: 0,
      truncated: fetchResult.meta.hasMore,
    };

    for (const raw of fetchResult.rawItems) {
      if (limit > 0 && result.normalized >= limit) break;
      try {
        contests.push(source.normalize(raw));
        result.normalized += 1;
      } catch (err) {
        if (!isSkippableRecordError(err)) throw err;
        result.skipped += 1;
        log.warn({ source: source.name, resource, err: errorMessage(err) }, "Skipping malformed contest record");
      }
    }

    log.info(
      {
        source: source.name,
        resource,
        requests: result.requests,
        fetched: result.fetched,
        normalized: result.normalized,
        skipped: result.skipped,
        truncated: result.truncated,
      },
      "Fetched contests",
    );

    perResource.push(result);
    totals.requests += result.requests;
    totals.fetched += result.fetched;
    totals.normalized += result.normalized;
    totals.skipped += result.skipped;
  }

  return { contests, perResource, totals };
}
