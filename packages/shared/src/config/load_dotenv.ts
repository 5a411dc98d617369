import { existsSync, readFileSync } from "node:fs";
import { dirname, resolve } from "node:path";

import { errorMessage } from "../errors";
import { createLogger } from "../logging";

const log = createLogger({ component: "config" });

/**
 * Walk up from `startDir` to the first directory holding a .env file or the
 * workspace root package.json. Falls back to `startDir`.
 */
function findProjectRoot(startDir: string): string {
  let dir = startDir;
  while (true) {
    if (existsSync(resolve(dir, ".env"))) return dir;
    const pkgPath = resolve(dir, "package.json");
    if (existsSync(pkgPath)) {
      try {
        const pkg: unknown = JSON.parse(readFileSync(pkgPath, "utf8"));
        if (pkg && typeof pkg === "object" && "workspaces" in pkg) return dir;
      } catch (err) {
        log.debug({ pkgPath, err: errorMessage(err) }, "Skipping unreadable package.json");
      }
    }
    const parent = dirname(dir);
    if (parent === dir) return startDir;
    dir = parent;
  }
}

/**
 * Parse one dotenv value: quoted values keep their contents (with \" escapes),
 * unquoted values lose a trailing ` # comment`.
 */
export function parseEnvValue(raw: string): string {
  const trimmed = raw.trim();
  const quote = trimmed.charAt(0);
  if (quote === '"' || quote === "'") {
    let out = "";
    for (let i = 1; i < trimmed.length; i += 1) {
      const ch = trimmed.charAt(i);
      if (ch === "\\" && i + 1 < trimmed.length) {
        out += trimmed.charAt(i + 1);
        i += 1;
        continue;
      }
      if (ch === quote) return out;
      out += ch;
    }
  }
  const comment = trimmed.search(/[ \t]#/);
  return comment >= 0 ? trimmed.slice(0, comment).trimEnd() : trimmed;
}

export function parseDotEnv(raw: string): Record<string, string> {
  const out: Record<string, string> = {};
  for (const line of raw.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;
    const idx = trimmed.indexOf("=");
    if (idx <= 0) continue;
    const key = trimmed
      .slice(0, idx)
      .replace(/^export\s+/, "")
      .trim();
    out[key] = parseEnvValue(trimmed.slice(idx + 1));
  }
  return out;
}

/**
 * Load .env then .env.local from the project root into `env`.
 * Variables already set are never overridden.
 */
export function loadDotEnvIfPresent(
  cwd: string = process.cwd(),
  env: NodeJS.ProcessEnv = process.env,
): void {
  const projectRoot = findProjectRoot(cwd);
  for (const filename of [".env", ".env.local"]) {
    const fullPath = resolve(projectRoot, filename);
    if (!existsSync(fullPath)) continue;
    let raw: string;
    try {
      raw = readFileSync(fullPath, "utf8");
    } catch (err) {
      log.warn({ filename, err: errorMessage(err) }, "Failed to read env file");
      continue;
    }
    for (const [key, value] of Object.entries(parseDotEnv(raw))) {
      if (env[key] === undefined) env[key] = value;
    }
  }
}
