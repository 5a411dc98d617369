import { ApiError, TimeParsingError } from "@contestcal/shared";
import { describe, expect, it } from "vitest";

import { type ClistRawContest, normalizeClistContest } from "./normalize";

const CF_ROUND: ClistRawContest = {
  id: 5012345,
  event: "  Codeforces Round 999 (Div. 2)  ",
  start: "2025-06-01T14:35:00",
  end: "2025-06-01T16:35:00",
  duration: 7200,
  href: "https://codeforces.com/contests/2100",
  resource: "codeforces.com",
  resource_id: 1,
};

describe("normalizeClistContest", () => {
  it("maps a typical v2 payload", () => {
    const result = normalizeClistContest(CF_ROUND);
    expect(result).toEqual({
      id: 5012345,
      title: "Codeforces Round 999 (Div. 2)",
      start: new Date("2025-06-01T14:35:00Z"),
      end: new Date("2025-06-01T16:35:00Z"),
      url: "https://codeforces.com/contests/2100",
      resourceId: 1,
      platform: "codeforces.com",
    });
  });

  it("derives end from duration when end is missing", () => {
    const result = normalizeClistContest({ ...CF_ROUND, end: undefined, duration: 5400 });
    expect(result.end.toISOString()).toBe("2025-06-01T16:05:00.000Z");
  });

  it("accepts duration given as a numeric string", () => {
    const result = normalizeClistContest({ ...CF_ROUND, end: null, duration: "600" });
    expect(result.end.toISOString()).toBe("2025-06-01T14:45:00.000Z");
  });

  it("converts offset timestamps to UTC", () => {
    const result = normalizeClistContest({
      ...CF_ROUND,
      start: "2025-06-01T20:00:00+08:00",
      end: "2025-06-01T21:30:00+08:00",
    });
    expect(result.start.toISOString()).toBe("2025-06-01T12:00:00.000Z");
    expect(result.end.toISOString()).toBe("2025-06-01T13:30:00.000Z");
  });

  it("reads the platform name and id from a resource object", () => {
    const result = normalizeClistContest({
      ...CF_ROUND,
      resource: { id: 93, name: "atcoder.jp", short_name: "AtCoder", host: "atcoder.jp" },
      resource_id: undefined,
    });
    expect(result.resourceId).toBe(93);
    expect(result.platform).toBe("atcoder.jp");
  });

  it("falls back through short_name and host for the platform", () => {
    expect(normalizeClistContest({ ...CF_ROUND, resource: { short_name: "LC" } }).platform).toBe("LC");
    expect(normalizeClistContest({ ...CF_ROUND, resource: { host: "luogu.com.cn" } }).platform).toBe(
      "luogu.com.cn",
    );
  });

  it("names unknown resources by id", () => {
    const result = normalizeClistContest({ ...CF_ROUND, resource: undefined, resource_id: 77 });
    expect(result.platform).toBe("Resource 77");
  });

  it("falls back from event to title to a generated name", () => {
    expect(normalizeClistContest({ ...CF_ROUND, event: "", title: "Weekly 450" }).title).toBe("Weekly 450");
    expect(normalizeClistContest({ ...CF_ROUND, event: undefined }).title).toBe("Contest 5012345");
  });

  it("falls back through event_url and url, and allows no URL at all", () => {
    expect(
      normalizeClistContest({ ...CF_ROUND, href: undefined, event_url: " https://atcoder.jp/contests/abc400 " }).url,
    ).toBe("https://atcoder.jp/contests/abc400");
    expect(normalizeClistContest({ ...CF_ROUND, href: null, url: "https://example.com/c" }).url).toBe(
      "https://example.com/c",
    );
    expect(normalizeClistContest({ ...CF_ROUND, href: undefined }).url).toBe("");
  });

  it("accepts a numeric string id", () => {
    expect(normalizeClistContest({ ...CF_ROUND, id: "42" }).id).toBe(42);
  });

  it("rejects payloads without an id", () => {
    expect(() => normalizeClistContest({ ...CF_ROUND, id: undefined })).toThrow(ApiError);
  });

  it("rejects unreadable timestamps", () => {
    expect(() => normalizeClistContest({ ...CF_ROUND, start: "next tuesday" })).toThrow(TimeParsingError);
  });

  it("rejects contests that end before they start", () => {
    expect(() => normalizeClistContest({ ...CF_ROUND, end: "2025-06-01T10:00:00" })).toThrow(
      "Contest 5012345 ends before it starts",
    );
  });

  it("rejects contests with neither end nor duration", () => {
    expect(() => normalizeClistContest({ ...CF_ROUND, end: undefined, duration: undefined })).toThrow(ApiError);
  });

  it("treats non-object input as an empty payload", () => {
    expect(() => normalizeClistContest("not a contest")).toThrow("Contest payload is missing a numeric id");
  });
});
