import type { InvalidUrlReason } from "../shared/errors";

export type UrlRejectionReason = Exclude<InvalidUrlReason, "missing">;

export type UrlValidation =
  | { ok: true; url: string; host: string }
  | { ok: false; reason: UrlRejectionReason; input: string };

const URL_TOKEN_PATTERN = /https?:\/\/\S+/i;
const TRAILING_PUNCTUATION = /[)\]}>,.;:!?'"]+$/;

export function extractFirstUrl(text: string): string | null {
  const match = URL_TOKEN_PATTERN.exec(text);
  if (!match) {
    return null;
  }
  const candidate = match[0].replace(TRAILING_PUNCTUATION, "");
  return candidate.length > 0 ? candidate : null;
}

export function normalizeAllowedDomains(domains: readonly string[]): string[] {
  const normalized = domains
    .map((domain) => normalizeHost(normalizeHost(domain).replace(/^\*\./, "")))
    .filter((domain) => domain.length > 0);
  return Array.from(new Set(normalized));
}

export function validateTrackUrl(input: string, allowedDomains: readonly string[]): UrlValidation {
  const trimmed = input.trim();
  let parsed: URL;
  try {
    parsed = new URL(trimmed);
  } catch {
    return { ok: false, reason: "malformed", input: trimmed };
  }

  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    return { ok: false, reason: "protocol", input: trimmed };
  }
  if (parsed.username || parsed.password) {
    return { ok: false, reason: "malformed", input: trimmed };
  }

  const host = normalizeHost(parsed.hostname);
  if (!isAllowedHost(host, allowedDomains)) {
    return { ok: false, reason: "domain", input: trimmed };
  }

  return { ok: true, url: parsed.toString(), host };
}

export function isAllowedHost(host: string, allowedDomains: readonly string[]): boolean {
  const normalized = normalizeHost(host);
  if (!normalized) {
    return false;
  }
  return allowedDomains.some(
    (domain) => normalized === domain || normalized.endsWith(`.${domain}`),
  );
}

function normalizeHost(value: string): string {
  return value.trim().toLowerCase().replace(/^\.+/, "").replace(/\.+$/, "");
}
