import { UsageError } from "../errors";

export const DEFAULT_API_BASE = "https://clist.by/api/v2";
export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;
export const DEFAULT_CREDENTIALS_FILE = "clist_credentials.json";

export const USERNAME_ENV = "CLIST_API_USERNAME";
export const API_KEY_ENV = "CLIST_API_KEY";

export interface RuntimeEnv {
  appEnv: "local" | "dev" | "prod";

  // Fallbacks for --username / --api-key
  clistUsername?: string;
  clistApiKey?: string;

  apiBaseUrl: string;
  requestTimeoutMs: number;
  credentialsPath: string;
}

function optionalEnv(value: string | undefined): string | undefined {
  if (!value) return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function parsePositiveIntEnv(name: string, value: string | undefined, fallback: number): number {
  const raw = optionalEnv(value);
  if (raw === undefined) return fallback;
  const parsed = Number.parseInt(raw, 10);
  if (!Number.isFinite(parsed) || parsed <= 0 || String(parsed) !== raw) {
    throw new UsageError(`Invalid integer env var: ${name}=${raw}`);
  }
  return parsed;
}

export function loadRuntimeEnv(env: NodeJS.ProcessEnv = process.env): RuntimeEnv {
  const appEnvRaw = env.APP_ENV ?? "local";
  const appEnv =
    appEnvRaw === "prod" || appEnvRaw === "dev" || appEnvRaw === "local" ? appEnvRaw : "local";

  return {
    appEnv,
    clistUsername: optionalEnv(env[USERNAME_ENV]),
    clistApiKey: optionalEnv(env[API_KEY_ENV]),
    apiBaseUrl: (optionalEnv(env.CLIST_API_BASE) ?? DEFAULT_API_BASE).replace(/\/+$/, ""),
    requestTimeoutMs: parsePositiveIntEnv(
      "CLIST_REQUEST_TIMEOUT_MS",
      env.CLIST_REQUEST_TIMEOUT_MS,
      DEFAULT_REQUEST_TIMEOUT_MS,
    ),
    credentialsPath: optionalEnv(env.CLIST_CREDENTIALS_PATH) ?? DEFAULT_CREDENTIALS_FILE,
  };
}
