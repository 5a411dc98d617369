export * from "./run";
export * from "./stages/ingest";
export * from "./stages/merge";
