import { addSeconds, ApiError, type ContestRecord, parseIsoTimestamp } from "@contestcal/shared";

// CLIST contest payload (v2). Field presence varies by resource and API version,
// so every field is optional here and resolved with fallbacks below.
export interface ClistRawContest {
  id?: unknown;
  event?: unknown;
  title?: unknown;
  start?: unknown;
  end?: unknown;
  duration?: unknown; // seconds
  href?: unknown;
  event_url?: unknown;
  url?: unknown;
  resource?: unknown; // host string, or { id, name, short_name, host }
  resource_id?: unknown;
  host?: unknown;
}

function asRecord(value: unknown): Record<string, unknown> {
  if (value && typeof value === "object" && !Array.isArray(value)) {
    return value as Record<string, unknown>;
  }
  return {};
}

function asString(value: unknown): string | null {
  return typeof value === "string" && value.trim().length > 0 ? value.trim() : null;
}

function asInt(value: unknown): number | null {
  if (typeof value === "number" && Number.isInteger(value)) return value;
  if (typeof value === "string" && /^\d+$/.test(value.trim())) return Number.parseInt(value, 10);
  return null;
}

function asFiniteNumber(value: unknown): number | null {
  if (typeof value === "number" && Number.isFinite(value)) return value;
  if (typeof value === "string" && value.trim() !== "" && Number.isFinite(Number(value))) {
    return Number(value);
  }
  return null;
}

function resolveEnd(raw: Record<string, unknown>, start: Date, id: number): Date {
  const end = asString(raw.end);
  if (end) return parseIsoTimestamp(end);
  const duration = asFiniteNumber(raw.duration);
  if (duration !== null && duration >= 0) return addSeconds(start, duration);
  throw new ApiError(`Contest ${id} has neither an end time nor a duration`);
}

function resolvePlatform(raw: Record<string, unknown>, resourceId: number): string {
  const info = asRecord(raw.resource);
  return (
    asString(info.name) ??
    asString(info.short_name) ??
    asString(info.host) ??
    asString(raw.resource) ??
    asString(raw.host) ??
    `Resource ${resourceId}`
  );
}

/**
 * Convert one CLIST contest payload into a ContestRecord.
 *
 * Throws TimeParsingError for unreadable timestamps and ApiError for payloads
 * that cannot form a valid record (no id, no end, end before start).
 */
export function normalizeClistContest(input: unknown): ContestRecord {
  const raw = asRecord(input);

  const id = asInt(raw.id);
  if (id === null) {
    throw new ApiError("Contest payload is missing a numeric id");
  }

  const startRaw = asString(raw.start);
  if (!startRaw) throw new ApiError(`Contest ${id} has no start time`);
  const start = parseIsoTimestamp(startRaw);
  const end = resolveEnd(raw, start, id);
  if (end.getTime() < start.getTime()) {
    throw new ApiError(`Contest ${id} ends before it starts`);
  }

  const resourceId = asInt(raw.resource_id) ?? asInt(asRecord(raw.resource).id) ?? 0;

  return {
    id,
    title: asString(raw.event) ?? asString(raw.title) ?? `Contest ${id}`,
    start,
    end,
    url: asString(raw.href) ?? asString(raw.event_url) ?? asString(raw.url) ?? "",
    resourceId,
    platform: resolvePlatform(raw, resourceId),
  };
}
