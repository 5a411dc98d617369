import { type ResourceFilter, UsageError } from "@contestcal/shared";

export const DEFAULT_RESOURCES = ["leetcode", "codeforces", "atcoder", "luogu", "nowcoder"];

// Short user-facing tokens -> CLIST resource hosts. Keys are lowercase.
export const RESOURCE_ALIASES: Readonly<Record<string, string>> = {
  leetcode: "leetcode.com",
  lc: "leetcode.com",
  codeforces: "codeforces.com",
  cf: "codeforces.com",
  atcoder: "atcoder.jp",
  ac: "atcoder.jp",
  luogu: "luogu.com.cn",
  lg: "luogu.com.cn",
  nowcoder: "ac.nowcoder.com",
  nk: "ac.nowcoder.com",
};

function filterKey(filter: ResourceFilter): string {
  return filter.kind === "host" ? `host:${filter.host}` : `id:${filter.id}`;
}

export function resolveResourceToken(token: string): ResourceFilter | null {
  const value = token.trim();
  if (!value) return null;

  const alias = RESOURCE_ALIASES[value.toLowerCase()];
  if (alias) return { kind: "host", host: alias };
  if (/^\d+$/.test(value)) return { kind: "id", id: Number.parseInt(value, 10) };
  // Unknown tokens go to the API untouched; CLIST decides whether the host exists.
  return { kind: "host", host: value };
}

/**
 * Map user tokens (aliases, hosts, numeric ids) to resource filters.
 * Deduplicated, first occurrence wins.
 */
export function resolveResourceFilters(tokens: readonly string[]): ResourceFilter[] {
  const resolved: ResourceFilter[] = [];
  const seen = new Set<string>();

  for (const token of tokens) {
    const filter = resolveResourceToken(token);
    if (!filter) continue;
    const key = filterKey(filter);
    if (seen.has(key)) continue;
    seen.add(key);
    resolved.push(filter);
  }

  if (resolved.length === 0) {
    throw new UsageError("No valid resources resolved. Check the provided resource filters.");
  }
  return resolved;
}
