import type { ContestSource } from "../types";
import { ClistClient, type ClistClientOptions } from "./fetch";
import { normalizeClistContest } from "./normalize";

export function createClistSource(options: ClistClientOptions): ContestSource {
  const client = new ClistClient(options);
  return {
    name: "clist",
    fetch: (filter, query) => client.fetchContests(filter, query),
    normalize: normalizeClistContest,
  };
}

export { ClistClient, PAGE_SIZE, buildContestParams, isAuthLikeMessage } from "./fetch";
export type { ClistClientOptions } from "./fetch";
export { DEFAULT_RESOURCES, RESOURCE_ALIASES, resolveResourceFilters, resolveResourceToken } from "./config";
export { normalizeClistContest } from "./normalize";
export type { ClistRawContest } from "./normalize";
