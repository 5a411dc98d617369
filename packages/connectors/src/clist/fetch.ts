import {
  ApiError,
  AuthenticationError,
  type Credentials,
  createLogger,
  DEFAULT_API_BASE,
  DEFAULT_REQUEST_TIMEOUT_MS,
  errorMessage,
  NetworkError,
  type ResourceFilter,
  toApiTime,
} from "@contestcal/shared";

import type { ContestQuery, FetchResult } from "../types";

const log = createLogger({ component: "clist" });

export const PAGE_SIZE = 100;

const AUTH_ERROR_PATTERNS: RegExp[] = [
  /unauthori[sz]ed/i,
  /authenticat/i,
  /invalid (api )?key/i,
  /api ?key/i,
  /credentials/i,
  /not logged in/i,
];

export function isAuthLikeMessage(message: string): boolean {
  return AUTH_ERROR_PATTERNS.some((pattern) => pattern.test(message));
}

function asRecord(value: unknown): Record<string, unknown> {
  if (value && typeof value === "object" && !Array.isArray(value)) {
    return value as Record<string, unknown>;
  }
  return {};
}

export interface ClistClientOptions {
  credentials: Credentials;
  baseUrl?: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
}

export function buildContestParams(
  filter: ResourceFilter,
  query: ContestQuery,
  page: { offset: number; limit: number },
): URLSearchParams {
  const params = new URLSearchParams();
  if (filter.kind === "host") params.set("resource", filter.host);
  else params.set("resource_id", String(filter.id));
  params.set("order_by", "start");
  params.set("offset", String(page.offset));
  params.set("limit", String(page.limit));
  if (query.window.startsAfter) params.set("start__gte", toApiTime(query.window.startsAfter));
  if (query.window.endsBefore) params.set("start__lte", toApiTime(query.window.endsBefore));
  if (!query.includeEnded) params.set("end__gte", toApiTime(query.now));
  return params;
}

/**
 * Thin client over the CLIST v2 REST API. One attempt per request; failures
 * surface as AuthenticationError, NetworkError or ApiError.
 */
export class ClistClient {
  private readonly baseUrl: string;
  private readonly authorization: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: ClistClientOptions) {
    this.baseUrl = (options.baseUrl ?? DEFAULT_API_BASE).replace(/\/+$/, "");
    this.authorization = `ApiKey ${options.credentials.username}:${options.credentials.apiKey}`;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  /**
   * Page through `/contest/` for one resource until CLIST reports no next page
   * or the per-resource limit is reached.
   */
  async fetchContests(filter: ResourceFilter, query: ContestQuery): Promise<FetchResult> {
    const limit = Math.max(0, Math.floor(query.perResourceLimit));
    const rawItems: unknown[] = [];
    let offset = 0;
    let requests = 0;
    let hasMore = false;

    while (true) {
      const pageLimit = limit > 0 ? Math.min(PAGE_SIZE, limit - rawItems.length) : PAGE_SIZE;
      if (pageLimit <= 0) break;

      const data = await this.getJson("/contest/", buildContestParams(filter, query, { offset, limit: pageLimit }));
      requests += 1;

      const objects = data.objects;
      if (!Array.isArray(objects)) {
        throw new ApiError('CLIST API response is missing the "objects" array');
      }
      if (objects.length === 0) break;

      for (const item of objects) {
        rawItems.push(item);
        if (limit > 0 && rawItems.length >= limit) break;
      }
      offset += objects.length;

      hasMore = Boolean(asRecord(data.meta).next);
      if (!hasMore) break;
    }

    return { rawItems, meta: { requests, hasMore } };
  }

  private async getJson(path: string, params: URLSearchParams): Promise<Record<string, unknown>> {
    const url = `${this.baseUrl}${path}?${params.toString()}`;
    log.debug({ url }, "CLIST request");

    let res: Response;
    let body: string;
    try {
      res = await this.fetchImpl(url, {
        method: "GET",
        headers: {
          Authorization: this.authorization,
          Accept: "application/json",
          "User-Agent": "contestcal/0.x (clist connector)",
        },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      body = await res.text();
    } catch (err) {
      throw new NetworkError(`Failed to reach CLIST API: ${errorMessage(err)}`, { cause: err });
    }

    if (!res.ok) {
      const detail = body.slice(0, 500);
      if (res.status === 401 || (res.status >= 400 && res.status < 500 && isAuthLikeMessage(detail))) {
        throw new AuthenticationError(
          res.status,
          `CLIST rejected the credentials (${res.status}). Check the username and API key.`,
        );
      }
      throw new ApiError(`CLIST API error (${res.status} ${res.statusText}) for ${url}: ${detail}`, res.status);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(body);
    } catch (err) {
      throw new ApiError("CLIST API response was not valid JSON", res.status, { cause: err });
    }
    if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) {
      throw new ApiError("CLIST API returned a non-object JSON payload", res.status);
    }
    return asRecord(parsed);
  }
}
