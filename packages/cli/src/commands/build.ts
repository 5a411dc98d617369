import { DEFAULT_CALENDAR_NAME, DEFAULT_PRODUCT_ID } from "@contestcal/calendar";
import { DEFAULT_RESOURCES } from "@contestcal/connectors";
import { addSeconds, API_KEY_ENV, loadRuntimeEnv, USERNAME_ENV, UsageError } from "@contestcal/shared";

import { DEFAULT_PER_RESOURCE_LIMIT, parseBuildArgs } from "../args";
import { type CommandContext, currentTime } from "./context";
import { runContestExport } from "./export";

export const BUILD_WINDOW_DAYS = 3;
export const NO_UPCOMING_MESSAGE = "No contests found in the next three days.";

function printBuildUsage(): void {
  console.log("Usage:");
  console.log("  build [--output PATH]");
  console.log("");
  console.log(
    `Exports contests from the default resources starting within the next ${BUILD_WINDOW_DAYS} days.`,
  );
  console.log(`Credentials come from ${USERNAME_ENV} and ${API_KEY_ENV} only.`);
}

/** Preset export for scheduled jobs: default resources, now .. now + 3 days. */
export async function buildCommand(argv: readonly string[], ctx: CommandContext): Promise<number> {
  const parsed = parseBuildArgs(argv);
  if (parsed.kind === "help") {
    printBuildUsage();
    return 0;
  }

  const runtime = loadRuntimeEnv(ctx.env);
  if (!runtime.clistUsername) throw new UsageError(`Environment variable ${USERNAME_ENV} is required`);
  if (!runtime.clistApiKey) throw new UsageError(`Environment variable ${API_KEY_ENV} is required`);

  const now = currentTime(ctx);
  const result = await runContestExport(
    {
      credentials: { username: runtime.clistUsername, apiKey: runtime.clistApiKey },
      resources: DEFAULT_RESOURCES,
      window: {
        startsAfter: now,
        endsBefore: addSeconds(now, BUILD_WINDOW_DAYS * 24 * 60 * 60),
        inclusiveStart: true,
        inclusiveEnd: true,
      },
      includeEnded: false,
      perResourceLimit: DEFAULT_PER_RESOURCE_LIMIT,
      maxContests: 0,
      calendarName: DEFAULT_CALENDAR_NAME,
      productId: DEFAULT_PRODUCT_ID,
      outputPath: parsed.args.output,
    },
    ctx,
    now,
  );

  if (!result.written) {
    console.log(NO_UPCOMING_MESSAGE);
    return 0;
  }
  console.log(`Wrote ${result.contests.length} contest(s) to ${result.outputPath}`);
  return 0;
}
