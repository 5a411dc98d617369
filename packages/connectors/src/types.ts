import type { ContestRecord, ResourceFilter, TimeWindow } from "@contestcal/shared";

export interface ContestQuery {
  window: TimeWindow;
  includeEnded: boolean;
  /** Max raw records per resource; 0 means unlimited. */
  perResourceLimit: number;
  now: Date;
}

export interface FetchResult {
  rawItems: unknown[];
  meta: {
    requests: number;
    hasMore: boolean;
  };
}

export interface ContestSource {
  name: string;
  fetch(filter: ResourceFilter, query: ContestQuery): Promise<FetchResult>;
  normalize(raw: unknown): ContestRecord;
}
