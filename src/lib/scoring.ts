import {
  ReferenceQuality,
  type CanonicalProvider,
  type CanonicalReference,
  type QualityFlags,
  type QualityReport,
  type ScoredProvider,
} from "./types";
import type { DataDictionary } from "./data-dictionary";

type FieldValue = string | number | string[] | null;

export function providerField(p: CanonicalProvider, field: string): FieldValue {
  switch (field) {
    case "provider_id": return p.providerId;
    case "name": return p.name;
    case "country": return p.country;
    case "location": return p.location;
    case "tier": return p.tier;
    case "industry": return p.industry;
    case "services": return p.services;
    case "references": return p.references;
    case "website": return p.website;
    case "description": return p.description;
    case "price": return p.price;
    case "rating": return p.rating;
    case "review_count": return p.reviewCount;
    case "source_url": return p.sourceUrl;
    case "source_batch": return p.sourceBatch;
    case "collected_at": return p.collectedAt;
    default: return null;
  }
}

export function isPopulated(value: FieldValue): boolean {
  if (value === null) return false;
  if (Array.isArray(value)) return value.length > 0;
  if (typeof value === "string") return value.trim().length > 0;
  return true;
}

export function isHttpUrl(value: string): boolean {
  let url: URL;
  try {
    url = new URL(value);
  } catch {
    return false;
  }
  return (url.protocol === "http:" || url.protocol === "https:") && url.hostname.includes(".");
}

function listItemsValid(items: string[]): boolean {
  return items.every((item) => item.length >= 2 && item.length <= 200);
}

type FieldCheck = (value: FieldValue) => boolean;

function buildChecks(dictionary: DataDictionary): Record<string, FieldCheck> {
  const countryPattern = new RegExp(dictionary.data_quality_rules.validation_patterns.country_code);
  const tiers = new Set(dictionary.tiers.values);
  const taxonomy = new Set(dictionary.industries.standardized_taxonomy);
  const text = (check: (v: string) => boolean): FieldCheck => (v) => typeof v === "string" && check(v);
  const num = (check: (v: number) => boolean): FieldCheck => (v) => typeof v === "number" && check(v);
  const list: FieldCheck = (v) => Array.isArray(v) && listItemsValid(v);

  return {
    name: text((v) => /[\p{L}\p{N}]/u.test(v) && v.length <= 200),
    country: text((v) => countryPattern.test(v)),
    tier: text((v) => tiers.has(v)),
    industry: text((v) => taxonomy.has(v)),
    website: text(isHttpUrl),
    source_url: text(isHttpUrl),
    services: list,
    references: list,
    price: num((v) => Number.isFinite(v) && v >= 0),
    rating: num((v) => v >= 0 && v <= 5),
    review_count: num((v) => Number.isInteger(v) && v >= 0),
    collected_at: text((v) => !isNaN(Date.parse(v))),
  };
}

const checksCache = new WeakMap<DataDictionary, Record<string, FieldCheck>>();

function getChecks(dictionary: DataDictionary): Record<string, FieldCheck> {
  let checks = checksCache.get(dictionary);
  if (!checks) {
    checks = buildChecks(dictionary);
    checksCache.set(dictionary, checks);
  }
  return checks;
}

export function roundScore(value: number): number {
  return Math.min(1, Math.max(0, Math.round(value * 100) / 100));
}

/**
 * Completeness, validity and weighted quality for one provider. Returns a
 * new record; the input is left untouched and no field is corrected.
 */
export function scoreProvider(record: CanonicalProvider, dictionary: DataDictionary): ScoredProvider {
  const rules = dictionary.data_quality_rules;
  const checks = getChecks(dictionary);
  const required = rules.required_fields;

  // Scorer-owned flags from a previous run are recomputed
  const flags: QualityFlags = {};
  for (const [flag, value] of Object.entries(record.qualityFlags)) {
    const scorerFlag =
      required.some((f) => flag === `missing_${f}`) || Object.keys(checks).some((f) => flag === `invalid_${f}`);
    if (!scorerFlag && value) flags[flag] = true;
  }

  let present = 0;
  for (const field of required) {
    if (isPopulated(providerField(record, field))) {
      present++;
    } else {
      flags[`missing_${field}`] = true;
    }
  }
  const completeness = required.length > 0 ? present / required.length : 0;

  let checked = 0;
  let passed = 0;
  for (const [field, check] of Object.entries(checks)) {
    const value = providerField(record, field);
    if (!isPopulated(value)) continue;
    checked++;
    if (check(value)) {
      passed++;
    } else {
      flags[`invalid_${field}`] = true;
    }
  }
  const validity = checked > 0 ? passed / checked : 0;

  const { completeness: wc, validity: wv } = rules.score_weights;
  const quality = (wc * completeness + wv * validity) / (wc + wv);

  return {
    ...record,
    services: [...record.services],
    references: [...record.references],
    qualityFlags: flags,
    completenessScore: roundScore(completeness),
    validityScore: roundScore(validity),
    qualityScore: roundScore(quality),
  };
}

export function scoreProviders(records: CanonicalProvider[], dictionary: DataDictionary): ScoredProvider[] {
  return records.map((r) => scoreProvider(r, dictionary));
}

/** high: five or more optional details, medium: two or more, low: fewer. */
export function scoreReference(ref: Omit<CanonicalReference, "qualityFlag">): ReferenceQuality {
  const details = [
    ref.country,
    ref.industry,
    ref.projectSizeUsers,
    ref.servicesImplemented.length > 0 ? ref.servicesImplemented : null,
    ref.implementationTimelineMonths,
    ref.outcomes,
    ref.caseStudyUrl,
  ].filter((v) => v !== null).length;

  if (details >= 5) return ReferenceQuality.HIGH;
  if (details >= 2) return ReferenceQuality.MEDIUM;
  return ReferenceQuality.LOW;
}

function distribution(scores: number[]): Record<"high" | "medium" | "low", number> {
  return {
    high: scores.filter((s) => s > 0.8).length,
    medium: scores.filter((s) => s >= 0.5 && s <= 0.8).length,
    low: scores.filter((s) => s < 0.5).length,
  };
}

function average(values: number[]): number {
  if (values.length === 0) return 0;
  return Math.round((values.reduce((a, b) => a + b, 0) / values.length) * 1000) / 1000;
}

export function generateQualityReport(scored: ScoredProvider[], now: Date = new Date()): QualityReport {
  const flagCounts = new Map<string, number>();
  for (const p of scored) {
    for (const [flag, set] of Object.entries(p.qualityFlags)) {
      if (set) flagCounts.set(flag, (flagCounts.get(flag) ?? 0) + 1);
    }
  }

  // Count desc, then flag name, top 10
  const commonQualityIssues: Record<string, number> = {};
  for (const [flag, count] of [...flagCounts].sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0])).slice(0, 10)) {
    commonQualityIssues[flag] = count;
  }

  const completeness = scored.map((p) => p.completenessScore);
  const quality = scored.map((p) => p.qualityScore);

  return {
    totalProviders: scored.length,
    averageCompleteness: average(completeness),
    averageValidity: average(scored.map((p) => p.validityScore)),
    averageQuality: average(quality),
    completenessDistribution: distribution(completeness),
    qualityDistribution: distribution(quality),
    commonQualityIssues,
    generatedAt: now.toISOString(),
  };
}
