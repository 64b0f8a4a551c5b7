import type { AgentEvent } from "./types.js";

const SENSITIVE_KEY = /token|secret|password|passwd|authorization|cookie|api[-_]?key/i;
const URL_QUERY_ALLOWLIST = new Set(["page", "id", "lang", "v"]);
const MAX_STRING_LENGTH = 240;
const MAX_QUERY_VALUE_LENGTH = 40;

export const REDACTED = "[REDACTED]";

/**
 * Scrubs an event before it reaches any sink: credentials by key name,
 * query strings outside the allow-list, oversized strings.
 */
export function redactEvent(event: AgentEvent): AgentEvent {
  const scrubbed: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(event)) {
    scrubbed[key] = scrub(key, value);
  }
  return scrubbed as AgentEvent;
}

function scrub(key: string, value: unknown): unknown {
  if (value === null || value === undefined) {
    return value;
  }
  if (SENSITIVE_KEY.test(key)) {
    return REDACTED;
  }
  if (typeof value === "string") {
    return /^https?:\/\//.test(value) ? scrubUrl(value) : clip(value, MAX_STRING_LENGTH);
  }
  if (Array.isArray(value)) {
    return value.map((item) => scrub(key, item));
  }
  if (typeof value === "object") {
    return Object.fromEntries(Object.entries(value).map(([k, v]) => [k, scrub(k, v)]));
  }
  return value;
}

function scrubUrl(raw: string): string {
  let url: URL;
  try {
    url = new URL(raw);
  } catch {
    return clip(raw, MAX_STRING_LENGTH);
  }
  const kept = new URLSearchParams();
  url.searchParams.forEach((value, name) => {
    if (URL_QUERY_ALLOWLIST.has(name.toLowerCase())) {
      kept.set(name, clip(value, MAX_QUERY_VALUE_LENGTH));
    }
  });
  url.search = kept.toString();
  url.hash = "";
  url.username = "";
  url.password = "";
  return url.toString();
}

function clip(value: string, max: number): string {
  return value.length > max ? `${value.slice(0, max)}...[truncated]` : value;
}
