import { createClistSource } from "@contestcal/connectors";
import { type ExportRunResult, runExport } from "@contestcal/pipeline";
import {
  API_KEY_ENV,
  type Credentials,
  loadRuntimeEnv,
  type TimeWindow,
  USERNAME_ENV,
  UsageError,
} from "@contestcal/shared";

import { DEFAULT_PER_RESOURCE_LIMIT, parseExportArgs } from "../args";
import { type CommandContext, currentTime } from "./context";

export const NO_CONTESTS_MESSAGE = "No contests retrieved. Adjust filters or timeframe.";

export interface ExportSettings {
  credentials: Credentials;
  resources: readonly string[];
  window: TimeWindow;
  includeEnded: boolean;
  perResourceLimit: number;
  maxContests: number;
  calendarName: string;
  productId: string;
  outputPath: string;
}

/** Without an explicit lower bound, only contests starting from `now` are kept unless ended ones are wanted. */
export function buildWindow(params: {
  startsAfter: Date | null;
  endsBefore: Date | null;
  includeEnded: boolean;
  now: Date;
}): TimeWindow {
  return {
    startsAfter: params.startsAfter ?? (params.includeEnded ? null : params.now),
    endsBefore: params.endsBefore,
    inclusiveStart: true,
    inclusiveEnd: true,
  };
}

/** Flags win over CLIST_API_USERNAME / CLIST_API_KEY. */
export function resolveCredentials(
  flags: { username: string | null; apiKey: string | null },
  env: NodeJS.ProcessEnv,
): Credentials {
  const runtime = loadRuntimeEnv(env);
  const username = flags.username ?? runtime.clistUsername;
  const apiKey = flags.apiKey ?? runtime.clistApiKey;
  if (!username || !apiKey) {
    throw new UsageError(
      `CLIST credentials are required. Provide --username/--api-key or set ${USERNAME_ENV}/${API_KEY_ENV}.`,
    );
  }
  return { username, apiKey };
}

export async function runContestExport(
  settings: ExportSettings,
  ctx: CommandContext,
  now: Date,
): Promise<ExportRunResult> {
  const runtime = loadRuntimeEnv(ctx.env);
  const source = createClistSource({
    credentials: settings.credentials,
    baseUrl: runtime.apiBaseUrl,
    timeoutMs: runtime.requestTimeoutMs,
    fetchImpl: ctx.fetchImpl,
  });

  return runExport({
    source,
    resources: settings.resources,
    window: settings.window,
    includeEnded: settings.includeEnded,
    perResourceLimit: settings.perResourceLimit,
    maxContests: settings.maxContests,
    calendar: { calendarName: settings.calendarName, productId: settings.productId },
    outputPath: settings.outputPath,
    now,
  });
}

/** Prints the outcome; returns the exit code. */
export function reportExport(result: ExportRunResult): number {
  if (!result.written) {
    console.error(NO_CONTESTS_MESSAGE);
    return 1;
  }
  console.log(`Wrote ${result.contests.length} contest(s) to ${result.outputPath}`);
  return 0;
}

export function printExportUsage(): void {
  console.log("Usage:");
  console.log("  export [--username U] [--api-key K] [--resources <tok>...] [--starts-after <ISO>]");
  console.log("         [--ends-before <ISO>] [--include-ended] [--per-resource-limit N]");
  console.log("         [--max-contests N] [--calendar-name NAME] [--product-id ID] [--output PATH]");
  console.log("");
  console.log("Resources accept aliases (lc, cf, ac, lg, nk), hostnames or numeric resource ids.");
  console.log(`--per-resource-limit defaults to ${DEFAULT_PER_RESOURCE_LIMIT}; 0 means unlimited for both limits.`);
  console.log("Time bounds apply to contest start times.");
  console.log("");
  console.log("Example:");
  console.log("  contestcal export --resources cf ac --max-contests 20 --output contests.ics");
}

export async function exportCommand(argv: readonly string[], ctx: CommandContext): Promise<number> {
  const parsed = parseExportArgs(argv);
  if (parsed.kind === "help") {
    printExportUsage();
    return 0;
  }
  const args = parsed.args;
  const now = currentTime(ctx);

  const result = await runContestExport(
    {
      credentials: resolveCredentials(args, ctx.env),
      resources: args.resources,
      window: buildWindow({
        startsAfter: args.startsAfter,
        endsBefore: args.endsBefore,
        includeEnded: args.includeEnded,
        now,
      }),
      includeEnded: args.includeEnded,
      perResourceLimit: args.perResourceLimit,
      maxContests: args.maxContests,
      calendarName: args.calendarName,
      productId: args.productId,
      outputPath: args.output,
    },
    ctx,
    now,
  );
  return reportExport(result);
}
