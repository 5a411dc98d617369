import { randomUUID } from "node:crypto";
import { readFile, rename, rm, writeFile } from "node:fs/promises";
import { basename, dirname, join, resolve } from "node:path";

import {
  CredentialFileError,
  type Credentials,
  createLogger,
  errorMessage,
  FileWriteError,
} from "@contestcal/shared";

const log = createLogger({ component: "credentials" });

function asRecord(value: unknown): Record<string, unknown> {
  if (value && typeof value === "object" && !Array.isArray(value)) return value as Record<string, unknown>;
  return {};
}

function asString(value: unknown): string | null {
  return typeof value === "string" && value.trim().length > 0 ? value.trim() : null;
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * Username/API key pair saved as `{ "username", "api_key" }` JSON.
 * No locking: concurrent writers race and the last rename wins.
 */
export class CredentialStore {
  readonly path: string;

  constructor(path: string) {
    this.path = resolve(path);
  }

  /** Saved credentials, or null when the file is missing or unusable. */
  async load(): Promise<Credentials | null> {
    let raw: string;
    try {
      raw = await readFile(this.path, "utf8");
    } catch (err) {
      if (isNotFound(err)) {
        log.debug({ path: this.path }, "No saved credentials");
      } else {
        this.report(new CredentialFileError(this.path, errorMessage(err), { cause: err }));
      }
      return null;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      this.report(new CredentialFileError(this.path, "invalid JSON", { cause: err }));
      return null;
    }

    const record = asRecord(parsed);
    const username = asString(record.username);
    const apiKey = asString(record.api_key);
    if (!username || !apiKey) {
      this.report(new CredentialFileError(this.path, 'expected string "username" and "api_key" fields'));
      return null;
    }
    return { username, apiKey };
  }

  /** Write to a temp file beside the target (mode 0600), then rename over it. */
  async save(credentials: Credentials): Promise<void> {
    const body = `${JSON.stringify({ username: credentials.username, api_key: credentials.apiKey }, null, 2)}\n`;
    const tmpPath = join(dirname(this.path), `.${basename(this.path)}.${randomUUID()}.tmp`);
    try {
      await writeFile(tmpPath, body, { encoding: "utf8", mode: 0o600 });
      await rename(tmpPath, this.path);
    } catch (err) {
      await rm(tmpPath, { force: true }).catch((cleanupErr: unknown) => {
        log.warn({ path: tmpPath, err: errorMessage(cleanupErr) }, "Failed to remove temp credentials file");
      });
      throw new FileWriteError(this.path, { cause: err });
    }
    log.info({ path: this.path }, "Credentials saved");
  }

  /** Returns false when there was nothing to delete. */
  async delete(): Promise<boolean> {
    try {
      await rm(this.path);
    } catch (err) {
      if (isNotFound(err)) return false;
      throw err;
    }
    log.info({ path: this.path }, "Saved credentials deleted");
    return true;
  }

  private report(error: CredentialFileError): void {
    log.warn({ path: error.path, code: error.code, err: error.message }, "Ignoring saved credentials");
  }
}
