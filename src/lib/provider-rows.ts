import {
  PROVIDER_COLUMNS,
  REFERENCE_COLUMNS,
  SCORE_COLUMNS,
  type CanonicalProvider,
  type CanonicalReference,
  type FlatRow,
  type FlatTable,
  type QualityFlags,
  type ScoredProvider,
} from "./types";
import { LIST_JOINER } from "./aggregator";
import { normalizeText, parseNumber, splitList } from "./normalization";

// Conversions between canonical records and their CSV rows.

export function serializeFlags(flags: QualityFlags): string {
  const sorted: QualityFlags = {};
  for (const key of Object.keys(flags).sort()) sorted[key] = flags[key];
  return JSON.stringify(sorted);
}

export function parseFlags(raw: unknown): QualityFlags | null {
  const text = normalizeText(raw);
  if (!text) return null;
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return null;
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) return null;
  const flags: QualityFlags = {};
  for (const [key, value] of Object.entries(parsed)) {
    if (value === true) flags[key] = true;
  }
  return flags;
}

function joinList(items: string[]): string | null {
  return items.length > 0 ? items.join(LIST_JOINER) : null;
}

export function providerToRow(p: CanonicalProvider): FlatRow {
  return {
    provider_id: p.providerId,
    name: p.name,
    country: p.country,
    location: p.location,
    tier: p.tier,
    industry: p.industry,
    services: joinList(p.services),
    references: joinList(p.references),
    website: p.website,
    description: p.description,
    price: p.price,
    rating: p.rating,
    review_count: p.reviewCount,
    source_url: p.sourceUrl,
    source_batch: p.sourceBatch,
    collected_at: p.collectedAt,
    quality_flags: serializeFlags(p.qualityFlags),
  };
}

export function scoredToRow(p: ScoredProvider): FlatRow {
  return {
    ...providerToRow(p),
    completeness_score: p.completenessScore,
    validity_score: p.validityScore,
    quality_score: p.qualityScore,
  };
}

export function providersToTable(providers: CanonicalProvider[]): FlatTable {
  return { columns: [...PROVIDER_COLUMNS], rows: providers.map(providerToRow) };
}

export function scoredToTable(providers: ScoredProvider[]): FlatTable {
  return { columns: [...PROVIDER_COLUMNS, ...SCORE_COLUMNS], rows: providers.map(scoredToRow) };
}

const ROW_LIST_DELIMITERS = [";"];

/** Read back a row written by `providerToRow`. Values are taken as already clean. */
export function providerFromRow(row: FlatRow): CanonicalProvider {
  return {
    providerId: normalizeText(row.provider_id) ?? "",
    name: normalizeText(row.name) ?? "",
    country: normalizeText(row.country),
    location: normalizeText(row.location),
    tier: normalizeText(row.tier),
    industry: normalizeText(row.industry),
    services: splitList(row.services, ROW_LIST_DELIMITERS),
    references: splitList(row.references, ROW_LIST_DELIMITERS),
    website: normalizeText(row.website),
    description: normalizeText(row.description),
    price: parseNumber(row.price),
    rating: parseNumber(row.rating),
    reviewCount: parseNumber(row.review_count),
    sourceUrl: normalizeText(row.source_url),
    sourceBatch: normalizeText(row.source_batch),
    collectedAt: normalizeText(row.collected_at),
    qualityFlags: parseFlags(row.quality_flags) ?? {},
  };
}

export function isScoredTable(table: FlatTable): boolean {
  return SCORE_COLUMNS.every((c) => table.columns.includes(c));
}

export function scoredFromRow(row: FlatRow): ScoredProvider {
  return {
    ...providerFromRow(row),
    completenessScore: parseNumber(row.completeness_score) ?? 0,
    validityScore: parseNumber(row.validity_score) ?? 0,
    qualityScore: parseNumber(row.quality_score) ?? 0,
  };
}

export function referenceToRow(r: CanonicalReference): FlatRow {
  return {
    reference_id: r.referenceId,
    provider_id: r.providerId,
    client_name: r.clientName,
    country: r.country,
    industry: r.industry,
    project_size_users: r.projectSizeUsers,
    is_large_project: r.isLargeProject,
    services_implemented: joinList(r.servicesImplemented),
    implementation_timeline_months: r.implementationTimelineMonths,
    outcomes: r.outcomes,
    case_study_url: r.caseStudyUrl,
    source_url: r.sourceUrl,
    quality_flag: r.qualityFlag,
  };
}

export function referencesToTable(references: CanonicalReference[]): FlatTable {
  return { columns: [...REFERENCE_COLUMNS], rows: references.map(referenceToRow) };
}
