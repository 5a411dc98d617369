import { randomUUID } from "node:crypto";
import { writeFile } from "node:fs/promises";

import { type RenderOptions, renderCalendar } from "@contestcal/calendar";
import { type ContestSource, resolveResourceFilters } from "@contestcal/connectors";
import { type ContestRecord, createRunLogger, FileWriteError, type TimeWindow } from "@contestcal/shared";

import { ingestContests, type IngestRunResult } from "./stages/ingest";
import { mergeContests } from "./stages/merge";

export interface ExportRunParams {
  source: ContestSource;
  /** Raw resource tokens (aliases, hosts or numeric ids). */
  resources: readonly string[];
  window: TimeWindow;
  includeEnded: boolean;
  perResourceLimit: number;
  maxContests: number;
  calendar: RenderOptions;
  outputPath: string;
  now?: Date;
  runId?: string;
}

export interface ExportRunResult {
  runId: string;
  outputPath: string;
  contests: ContestRecord[];
  /** False when no contest survived filtering; nothing is written then. */
  written: boolean;
  ingest: IngestRunResult;
}

export async function writeCalendarFile(path: string, text: string): Promise<void> {
  try {
    await writeFile(path, text, "utf8");
  } catch (err) {
    throw new FileWriteError(path, { cause: err });
  }
}

/**
 * Resolve resources, fetch and normalize each one, merge the results and
 * write the calendar file.
 */
export async function runExport(params: ExportRunParams): Promise<ExportRunResult> {
  const runId = params.runId ?? randomUUID();
  const log = createRunLogger(runId);
  const now = params.now ?? new Date();

  const filters = resolveResourceFilters(params.resources);
  log.info({ resources: filters.length, includeEnded: params.includeEnded }, "Starting export");

  const ingest = await ingestContests({
    source: params.source,
    filters,
    query: {
      window: params.window,
      includeEnded: params.includeEnded,
      perResourceLimit: params.perResourceLimit,
      now,
    },
  });

  const contests = mergeContests(ingest.contests, {
    window: params.window,
    includeEnded: params.includeEnded,
    now,
    maxContests: params.maxContests,
  });

  if (contests.length === 0) {
    log.info({ fetched: ingest.totals.fetched }, "No contests left after filtering");
    return { runId, outputPath: params.outputPath, contests, written: false, ingest };
  }

  await writeCalendarFile(params.outputPath, renderCalendar(contests, params.calendar));
  log.info({ contests: contests.length, outputPath: params.outputPath }, "Calendar written");

  return { runId, outputPath: params.outputPath, contests, written: true, ingest };
}
