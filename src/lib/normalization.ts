import {
  INVISIBLE_CHARS,
  TIER_BADGE_PATTERN,
  TIER_SUFFIX_PATTERN,
  type NormalizationMaps,
} from "./normalization-maps";

/** Result of a controlled-vocabulary lookup. Unmapped values pass through unchanged. */
export interface LookupResult {
  value: string | null;
  mapped: boolean;
}

const EMPTY: LookupResult = { value: null, mapped: true };

export function normalizeText(raw: unknown): string | null {
  if (raw === null || raw === undefined) return null;
  const text = String(raw).replace(INVISIBLE_CHARS, "").replace(/\s+/g, " ").trim();
  return text.length > 0 ? text : null;
}

export function normalizeName(raw: unknown): string | null {
  const text = normalizeText(raw);
  if (!text) return null;
  return text.replace(TIER_BADGE_PATTERN, "").trim() || null;
}

/** Dedup key part: lower-cased, whitespace-collapsed name. */
export function nameKey(name: string): string {
  return name.toLowerCase().replace(/\s+/g, " ").trim();
}

export function normalizeCountry(raw: unknown, maps: NormalizationMaps): LookupResult {
  const text = normalizeText(raw);
  if (!text) return EMPTY;

  const code = maps.countryByKey.get(text.toLowerCase());
  if (code) return { value: code, mapped: true };
  return { value: text, mapped: false };
}

export function normalizeIndustry(raw: unknown, maps: NormalizationMaps): LookupResult {
  const text = normalizeText(raw);
  if (!text) return EMPTY;

  const industry = maps.industryByKey.get(text.toLowerCase());
  if (industry) return { value: industry, mapped: true };
  return { value: text, mapped: false };
}

export function normalizeTier(raw: unknown, maps: NormalizationMaps): LookupResult {
  const text = normalizeText(raw);
  if (!text) return EMPTY;

  const lower = text.toLowerCase();
  const tier = maps.tierByKey.get(lower) ?? maps.tierByKey.get(lower.replace(TIER_SUFFIX_PATTERN, ""));
  if (tier) return { value: tier, mapped: true };
  return { value: text, mapped: false };
}

/** Module aliases and core-module casing; anything else is kept as written. */
export function normalizeService(item: string, maps: NormalizationMaps): string {
  return maps.serviceByKey.get(item.toLowerCase()) ?? item;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Split a delimited cell into an ordered list: trimmed, no empties,
 * de-duplicated case-insensitively with the first spelling kept.
 */
export function splitList(raw: unknown, delimiters: string[]): string[] {
  if (raw === null || raw === undefined) return [];
  const parts = Array.isArray(raw)
    ? raw.map((item) => String(item))
    : String(raw).split(new RegExp(delimiters.map(escapeRegExp).join("|")));
  return dedupeList(parts.map(normalizeText).filter((p): p is string => p !== null));
}

export function dedupeList(items: string[]): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const item of items) {
    const key = item.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    out.push(item);
  }
  return out;
}

export function normalizeServices(raw: unknown, maps: NormalizationMaps): string[] {
  return dedupeList(splitList(raw, maps.delimiters).map((item) => normalizeService(item, maps)));
}

/**
 * Services named in free text such as a gig title, matched as whole words
 * against the service vocabulary and listed in order of appearance.
 */
export function inferServices(text: string | null, maps: NormalizationMaps): string[] {
  if (!text) return [];
  const lower = text.toLowerCase();
  const found: Array<{ service: string; at: number }> = [];
  for (const [key, service] of maps.serviceByKey) {
    const at = lower.search(new RegExp(`\\b${escapeRegExp(key)}\\b`));
    if (at >= 0) found.push({ service, at });
  }
  return dedupeList(found.sort((a, b) => a.at - b.at).map((f) => f.service));
}

/**
 * Coerce numeric-looking text: "From $1,200" → 1200, "4.9" → 4.9, "(1.2k)" → 1200.
 */
export function parseNumber(raw: unknown): number | null {
  if (typeof raw === "number") return Number.isFinite(raw) ? raw : null;
  if (typeof raw !== "string") return null;
  const match = raw.match(/(-?\d[\d,]*(?:\.\d+)?)\s*([kK])?(?![a-zA-Z])/);
  if (!match) return null;
  const num = parseFloat(match[1].replace(/,/g, ""));
  if (isNaN(num)) return null;
  return match[2] ? Math.round(num * 1000) : num;
}

/** ISO-8601 when the value parses as a date, otherwise the trimmed text. */
export function normalizeTimestamp(raw: unknown): string | null {
  const text = normalizeText(raw);
  if (!text) return null;
  const ms = Date.parse(text);
  return isNaN(ms) ? text : new Date(ms).toISOString();
}

/** Industry inferred from description keywords, in dictionary order. */
export function inferIndustry(text: string | null, maps: NormalizationMaps): string | null {
  if (!text) return null;
  const lower = text.toLowerCase();
  for (const [industry, keywords] of maps.industryKeywords) {
    if (keywords.some((k) => lower.includes(k))) return industry;
  }
  return null;
}
