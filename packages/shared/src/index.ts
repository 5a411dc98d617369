export * from "./config/load_dotenv";
export * from "./config/runtime_env";
export * from "./errors";
export * from "./logging";
export * from "./types/contest";
export * from "./utils/time";
