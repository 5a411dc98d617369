import type { ContestRecord, TimeWindow } from "@contestcal/shared";

export interface MergeOptions {
  window: TimeWindow;
  includeEnded: boolean;
  now: Date;
  /** Keep only the earliest N contests; 0 means unlimited. */
  maxContests: number;
}

/** A contest ending exactly at `now` counts as ended. */
export function hasEnded(contest: ContestRecord, now: Date): boolean {
  return contest.end.getTime() <= now.getTime();
}

export function startsWithinWindow(contest: ContestRecord, window: TimeWindow): boolean {
  const start = contest.start.getTime();
  if (window.startsAfter) {
    const bound = window.startsAfter.getTime();
    if (window.inclusiveStart ? start < bound : start <= bound) return false;
  }
  if (window.endsBefore) {
    const bound = window.endsBefore.getTime();
    if (window.inclusiveEnd ? start > bound : start >= bound) return false;
  }
  return true;
}

/** Start time, then platform name (code-unit order), then contest id. */
export function compareContests(a: ContestRecord, b: ContestRecord): number {
  const byStart = a.start.getTime() - b.start.getTime();
  if (byStart !== 0) return byStart;
  if (a.platform !== b.platform) return a.platform < b.platform ? -1 : 1;
  return a.id - b.id;
}

/**
 * Filter, deduplicate and order normalized contests for rendering.
 *
 * Duplicates share an id; the last one seen wins but keeps the position of
 * the first. Sorting happens before `maxContests` is applied, so the result
 * is always the earliest N.
 */
export function mergeContests(
  contests: readonly ContestRecord[],
  options: MergeOptions,
): ContestRecord[] {
  const byId = new Map<number, ContestRecord>();
  for (const contest of contests) {
    if (!options.includeEnded && hasEnded(contest, options.now)) continue;
    if (!startsWithinWindow(contest, options.window)) continue;
    byId.set(contest.id, contest);
  }

  const merged = Array.from(byId.values()).sort(compareContests);
  const max = Math.max(0, Math.floor(options.maxContests));
  return max > 0 ? merged.slice(0, max) : merged;
}
