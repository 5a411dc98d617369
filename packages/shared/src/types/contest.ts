/**
 * Uniform contest representation. All timestamps are UTC instants.
 * Invariant: start <= end.
 */
export interface ContestRecord {
  id: number;
  title: string;
  start: Date;
  end: Date;
  /** Contest page; empty string when CLIST has none. */
  url: string;
  resourceId: number;
  /** Platform display name (e.g. "codeforces.com"). */
  platform: string;
}

export type ResourceFilter = { kind: "host"; host: string } | { kind: "id"; id: number };

/**
 * Bounds on contest start time. A null bound is unbounded.
 */
export interface TimeWindow {
  startsAfter: Date | null;
  endsBefore: Date | null;
  inclusiveStart: boolean;
  inclusiveEnd: boolean;
}

export interface Credentials {
  username: string;
  apiKey: string;
}

export function contestDurationMs(contest: ContestRecord): number {
  return contest.end.getTime() - contest.start.getTime();
}

export function describeResourceFilter(filter: ResourceFilter): string {
  return filter.kind === "host" ? filter.host : `#${filter.id}`;
}

export function unboundedWindow(): TimeWindow {
  return { startsAfter: null, endsBefore: null, inclusiveStart: true, inclusiveEnd: true };
}
