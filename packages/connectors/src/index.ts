export * from "./clist";
export type { ContestQuery, ContestSource, FetchResult } from "./types";
