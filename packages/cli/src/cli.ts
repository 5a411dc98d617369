import { createLogger, errorMessage, isContestCalError } from "@contestcal/shared";

import { buildCommand } from "./commands/build";
import type { CommandContext } from "./commands/context";
import { exportCommand } from "./commands/export";
import { helperCommand } from "./commands/helper";

const log = createLogger({ component: "cli" });

export function printHelp(): void {
  console.log("contestcal: export CLIST contests to an iCalendar file");
  console.log("");
  console.log("Commands:");
  console.log("  export [flags]    (default) fetch contests and write an .ics file");
  console.log("  helper            interactive export with saved credentials");
  console.log("  build [--output]  contests starting in the next three days, credentials from env");
  console.log("");
  console.log("Run `contestcal <command> --help` for command flags.");
}

/** Exit code for a failure: 2 for usage errors, 1 otherwise. */
export function exitCodeFor(err: unknown): number {
  return isContestCalError(err) && err.code === "USAGE_ERROR" ? 2 : 1;
}

/** Dispatch argv (without node and script) and return the process exit code. */
export async function runCli(argv: readonly string[], ctx: CommandContext): Promise<number> {
  let [cmd, ...rest] = argv;
  // npm forwards the argument separator to the script as a literal "--".
  if (cmd === "--") {
    [cmd, ...rest] = rest;
  }

  try {
    switch (cmd) {
      case undefined:
        return await exportCommand([], ctx);
      case "export":
        return await exportCommand(rest, ctx);
      case "helper":
        return await helperCommand(rest, ctx);
      case "build":
        return await buildCommand(rest, ctx);
      case "help":
      case "--help":
      case "-h":
        printHelp();
        return 0;
      default:
        if (cmd.startsWith("-")) return await exportCommand(argv, ctx);
        console.error(`Unknown command: ${cmd}`);
        console.error("");
        printHelp();
        return 2;
    }
  } catch (err) {
    log.debug({ err }, "Command failed");
    console.error(`error: ${errorMessage(err)}`);
    return exitCodeFor(err);
  }
}
