export type ErrorCode =
  | "AUTH_ERROR"
  | "NETWORK_ERROR"
  | "API_ERROR"
  | "TIME_PARSING_ERROR"
  | "FILE_WRITE_ERROR"
  | "RENDER_ERROR"
  | "CREDENTIAL_FILE_ERROR"
  | "USAGE_ERROR";

export class ContestCalError extends Error {
  constructor(
    readonly code: ErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ContestCalError";
  }
}

/** CLIST rejected the username/API key pair. */
export class AuthenticationError extends ContestCalError {
  constructor(
    readonly status: number,
    message: string,
  ) {
    super("AUTH_ERROR", message);
    this.name = "AuthenticationError";
  }
}

/** Connectivity failure or request timeout; no HTTP response was received. */
export class NetworkError extends ContestCalError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("NETWORK_ERROR", message, options);
    this.name = "NetworkError";
  }
}

/** Non-2xx response or a payload that does not have the expected shape. */
export class ApiError extends ContestCalError {
  constructor(
    message: string,
    readonly status: number | null = null,
    options?: { cause?: unknown },
  ) {
    super("API_ERROR", message, options);
    this.name = "ApiError";
  }
}

export class TimeParsingError extends ContestCalError {
  constructor(readonly input: string) {
    super("TIME_PARSING_ERROR", `Unsupported datetime format: ${JSON.stringify(input)}`);
    this.name = "TimeParsingError";
  }
}

export class FileWriteError extends ContestCalError {
  constructor(
    readonly path: string,
    options?: { cause?: unknown },
  ) {
    const reason = options?.cause instanceof Error ? `: ${options.cause.message}` : "";
    super("FILE_WRITE_ERROR", `Failed to write ${path}${reason}`, options);
    this.name = "FileWriteError";
  }
}

/** The calendar library rejected the event list. */
export class CalendarRenderError extends ContestCalError {
  constructor(message: string, options?: { cause?: unknown }) {
    const reason = options?.cause instanceof Error ? `: ${options.cause.message}` : "";
    super("RENDER_ERROR", `${message}${reason}`, options);
    this.name = "CalendarRenderError";
  }
}

/** Saved credentials file exists but cannot be used. Recovered by treating it as absent. */
export class CredentialFileError extends ContestCalError {
  constructor(
    readonly path: string,
    reason: string,
    options?: { cause?: unknown },
  ) {
    super("CREDENTIAL_FILE_ERROR", `Credential file ${path} is unusable: ${reason}`, options);
    this.name = "CredentialFileError";
  }
}

export class UsageError extends ContestCalError {
  constructor(message: string) {
    super("USAGE_ERROR", message);
    this.name = "UsageError";
  }
}

export function isContestCalError(error: unknown): error is ContestCalError {
  return error instanceof ContestCalError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
