import { mkdtemp, readFile, rm, stat } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { DEFAULT_CALENDAR_NAME, DEFAULT_PRODUCT_ID } from "@contestcal/calendar";
import { createClistSource } from "@contestcal/connectors";
import { FileWriteError, unboundedWindow } from "@contestcal/shared";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { type ExportRunParams, runExport } from "./run";

const NOW = new Date("2025-06-01T00:00:00Z");

function rawContest(id: number, resource: string, hour: number): Record<string, unknown> {
  const start = new Date(NOW.getTime() + hour * 3_600_000);
  return {
    id,
    event: `Round ${id}`,
    start: start.toISOString().slice(0, 19),
    duration: 5400,
    resource,
    href: `https://example.com/contest/${id}`,
  };
}

/** Serves canned /contest/ pages keyed by the `resource` query parameter. */
function fakeClist(pages: Record<string, unknown[][]>): { impl: typeof fetch; requested: string[] } {
  const requested: string[] = [];
  const served = new Map<string, number>();
  const impl: typeof fetch = async (input) => {
    const url = new URL(String(input));
    const resource = url.searchParams.get("resource") ?? "";
    requested.push(resource);
    const index = served.get(resource) ?? 0;
    served.set(resource, index + 1);
    const list = pages[resource] ?? [];
    const objects = list[index] ?? [];
    const next = index + 1 < list.length ? `/api/v2/contest/?page=${index + 2}` : null;
    return new Response(JSON.stringify({ meta: { next }, objects }), { status: 200 });
  };
  return { impl, requested };
}

describe("runExport", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "contestcal-run-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function params(impl: typeof fetch, overrides: Partial<ExportRunParams> = {}): ExportRunParams {
    return {
      source: createClistSource({ credentials: { username: "alice", apiKey: "test-key" }, fetchImpl: impl }),
      resources: ["cf", "atcoder"],
      window: { ...unboundedWindow(), startsAfter: NOW },
      includeEnded: false,
      perResourceLimit: 50,
      maxContests: 0,
      calendar: { calendarName: DEFAULT_CALENDAR_NAME, productId: DEFAULT_PRODUCT_ID },
      outputPath: join(dir, "contests.ics"),
      now: NOW,
      runId: "run-1",
      ...overrides,
    };
  }

  it("writes a sorted, deduplicated calendar for all resources", async () => {
    const { impl, requested } = fakeClist({
      "codeforces.com": [[rawContest(3, "codeforces.com", 5), rawContest(1, "codeforces.com", 1)]],
      "atcoder.jp": [[rawContest(2, "atcoder.jp", 3), rawContest(1, "codeforces.com", 1)]],
    });

    const result = await runExport(params(impl));

    expect(requested).toEqual(["codeforces.com", "atcoder.jp"]);
    expect(result.written).toBe(true);
    expect(result.contests.map((c) => c.id)).toEqual([1, 2, 3]);

    const text = await readFile(result.outputPath, "utf8");
    const uids = text
      .replace(/\r\n[ \t]/g, "")
      .split("\r\n")
      .filter((line) => line.startsWith("UID:"));
    expect(uids).toEqual(["UID:1@clist.by", "UID:2@clist.by", "UID:3@clist.by"]);
    expect(text.trimEnd().endsWith("END:VCALENDAR")).toBe(true);
  });

  it("follows pagination and keeps all 80 contests when limits are 0", async () => {
    const contests = Array.from({ length: 80 }, (_, i) => rawContest(i + 1, "codeforces.com", i + 1));
    const { impl, requested } = fakeClist({
      "codeforces.com": [contests.slice(0, 50), contests.slice(50)],
    });

    const result = await runExport(params(impl, { resources: ["cf"], perResourceLimit: 0, maxContests: 0 }));

    expect(requested).toEqual(["codeforces.com", "codeforces.com"]);
    expect(result.contests).toHaveLength(80);
    const text = await readFile(result.outputPath, "utf8");
    expect(text.split("\r\n").filter((line) => line === "BEGIN:VEVENT")).toHaveLength(80);
  });

  it("keeps only the earliest contests when max contests is set", async () => {
    const { impl } = fakeClist({
      "codeforces.com": [[9, 4, 7, 1].map((hour) => rawContest(hour * 10, "codeforces.com", hour))],
    });

    const result = await runExport(params(impl, { resources: ["cf"], maxContests: 2 }));

    expect(result.contests.map((c) => c.id)).toEqual([10, 40]);
  });

  it("writes nothing when no contest remains", async () => {
    const { impl } = fakeClist({});

    const result = await runExport(params(impl));

    expect(result.written).toBe(false);
    expect(result.contests).toEqual([]);
    await expect(stat(result.outputPath)).rejects.toMatchObject({ code: "ENOENT" });
  });

  it("wraps write failures in FileWriteError", async () => {
    const { impl } = fakeClist({ "codeforces.com": [[rawContest(1, "codeforces.com", 1)]] });
    const outputPath = join(dir, "missing", "contests.ics");

    const error = await runExport(params(impl, { resources: ["cf"], outputPath })).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(FileWriteError);
    expect(error).toMatchObject({ code: "FILE_WRITE_ERROR", path: outputPath });
  });
});
