import { DEFAULT_CALENDAR_NAME, DEFAULT_PRODUCT_ID } from "@contestcal/calendar";
import { DEFAULT_RESOURCES } from "@contestcal/connectors";
import { errorMessage, parseIsoTimestamp, UsageError } from "@contestcal/shared";

export const DEFAULT_OUTPUT_PATH = "contests.ics";
export const DEFAULT_PER_RESOURCE_LIMIT = 50;

export interface ExportArgs {
  username: string | null;
  apiKey: string | null;
  resources: string[];
  startsAfter: Date | null;
  endsBefore: Date | null;
  includeEnded: boolean;
  /** 0 = unlimited */
  perResourceLimit: number;
  /** 0 = unlimited */
  maxContests: number;
  calendarName: string;
  productId: string;
  output: string;
}

export type ParsedArgs<T> = { kind: "help" } | { kind: "run"; args: T };

function splitCsv(value: string): string[] {
  return value
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

/** Expand `--flag=value` into `--flag value`. */
function expandInlineValues(args: readonly string[]): string[] {
  const out: string[] = [];
  for (const a of args) {
    const eq = a.indexOf("=");
    if (a.startsWith("--") && eq > 2) {
      out.push(a.slice(0, eq), a.slice(eq + 1));
    } else {
      out.push(a);
    }
  }
  return out;
}

function isFlag(value: string | undefined): boolean {
  return value !== undefined && value.startsWith("--");
}

function requireValue(args: readonly string[], i: number, flag: string): string {
  const next = args[i + 1];
  if (next === undefined || isFlag(next) || next.trim().length === 0) {
    throw new UsageError(`Missing value for ${flag}`);
  }
  return next.trim();
}

export function parseNonNegativeInt(flag: string, raw: string): number {
  if (!/^\d+$/.test(raw)) {
    throw new UsageError(`Invalid ${flag} (expected a non-negative integer): ${raw}`);
  }
  return Number.parseInt(raw, 10);
}

export function parseTimestampArg(flag: string, raw: string): Date {
  try {
    return parseIsoTimestamp(raw);
  } catch (err) {
    throw new UsageError(`Invalid ${flag}: ${errorMessage(err)}`);
  }
}

export function parseExportArgs(argv: readonly string[]): ParsedArgs<ExportArgs> {
  const args = expandInlineValues(argv);
  const out: ExportArgs = {
    username: null,
    apiKey: null,
    resources: [],
    startsAfter: null,
    endsBefore: null,
    includeEnded: false,
    perResourceLimit: DEFAULT_PER_RESOURCE_LIMIT,
    maxContests: 0,
    calendarName: DEFAULT_CALENDAR_NAME,
    productId: DEFAULT_PRODUCT_ID,
    output: DEFAULT_OUTPUT_PATH,
  };

  for (let i = 0; i < args.length; i += 1) {
    const a = args[i];
    switch (a) {
      case "--help":
      case "-h":
        return { kind: "help" };
      case "--username":
        out.username = requireValue(args, i, a);
        i += 1;
        break;
      case "--api-key":
        out.apiKey = requireValue(args, i, a);
        i += 1;
        break;
      case "--resources": {
        const start = i;
        while (i + 1 < args.length && !isFlag(args[i + 1])) {
          i += 1;
          out.resources.push(...splitCsv(args[i] ?? ""));
        }
        if (i === start) throw new UsageError("Missing value for --resources");
        break;
      }
      case "--starts-after":
        out.startsAfter = parseTimestampArg(a, requireValue(args, i, a));
        i += 1;
        break;
      case "--ends-before":
        out.endsBefore = parseTimestampArg(a, requireValue(args, i, a));
        i += 1;
        break;
      case "--include-ended":
        out.includeEnded = true;
        break;
      case "--per-resource-limit":
        out.perResourceLimit = parseNonNegativeInt(a, requireValue(args, i, a));
        i += 1;
        break;
      case "--max-contests":
        out.maxContests = parseNonNegativeInt(a, requireValue(args, i, a));
        i += 1;
        break;
      case "--calendar-name":
        out.calendarName = requireValue(args, i, a);
        i += 1;
        break;
      case "--product-id":
        out.productId = requireValue(args, i, a);
        i += 1;
        break;
      case "--output":
        out.output = requireValue(args, i, a);
        i += 1;
        break;
      default:
        throw new UsageError(`Unknown argument: ${a}`);
    }
  }

  if (out.resources.length === 0) out.resources = [...DEFAULT_RESOURCES];
  return { kind: "run", args: out };
}

export interface BuildArgs {
  output: string;
}

export function parseBuildArgs(argv: readonly string[]): ParsedArgs<BuildArgs> {
  const args = expandInlineValues(argv);
  let output = DEFAULT_OUTPUT_PATH;
  for (let i = 0; i < args.length; i += 1) {
    const a = args[i];
    if (a === "--help" || a === "-h") return { kind: "help" };
    if (a === "--output") {
      output = requireValue(args, i, a);
      i += 1;
      continue;
    }
    throw new UsageError(`Unknown argument: ${a}`);
  }
  return { kind: "run", args: { output } };
}
