import { createHash } from "crypto";
import type {
  CanonicalProvider,
  CanonicalReference,
  CellValue,
  CleanResult,
  CleanStats,
  FlatRow,
  FlatTable,
  QualityFlags,
} from "./types";
import type { DataDictionary } from "./data-dictionary";
import { getNormalizationMaps, normalizeColumnName, type NormalizationMaps } from "./normalization-maps";
import {
  dedupeList,
  inferIndustry,
  inferServices,
  nameKey,
  normalizeCountry,
  normalizeIndustry,
  normalizeName,
  normalizeServices,
  normalizeText,
  normalizeTier,
  normalizeTimestamp,
  parseNumber,
  splitList,
} from "./normalization";
import { parseFlags } from "./provider-rows";
import { isPopulated, providerField, scoreReference } from "./scoring";

// ===== IDs =====

export function dedupKey(name: string, country: string | null): string {
  return `${nameKey(name)}|${(country ?? "").toLowerCase()}`;
}

export function generateProviderId(key: string): string {
  return createHash("sha256").update(key).digest("hex").slice(0, 16);
}

export function generateReferenceId(providerId: string, clientName: string): string {
  return createHash("sha256").update(`${providerId}|${clientName.toLowerCase()}`).digest("hex").slice(0, 16);
}

// ===== Row → canonical fields =====

/** Canonical field → first non-empty cell among the columns aliased to it. */
export function mapColumns(row: FlatRow, maps: NormalizationMaps): Map<string, CellValue> {
  const fields = new Map<string, CellValue>();
  for (const [column, value] of Object.entries(row)) {
    const normalized = normalizeColumnName(column);
    const field = maps.fieldAliases.get(normalized) ?? normalized;
    const existing = fields.get(field);
    if (existing === undefined || existing === null || existing === "") {
      fields.set(field, value);
    }
  }
  return fields;
}

type ReferenceDraft = Omit<CanonicalReference, "referenceId" | "providerId" | "qualityFlag">;

export interface ProviderDraft {
  provider: CanonicalProvider;
  references: ReferenceDraft[];
  unmapped: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function pick(obj: Record<string, unknown>, ...keys: string[]): unknown {
  for (const key of keys) {
    const value = obj[key];
    if (value !== undefined && value !== null && value !== "") return value;
  }
  return null;
}

function parseDetailedReferences(
  raw: CellValue | undefined,
  maps: NormalizationMaps,
  dictionary: DataDictionary,
  providerSourceUrl: string | null
): ReferenceDraft[] | null {
  const text = normalizeText(raw);
  if (!text) return [];

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return null;
  }
  if (!Array.isArray(parsed)) return null;

  const drafts: ReferenceDraft[] = [];
  for (const item of parsed) {
    if (!isRecord(item)) continue;
    const clientName = normalizeText(pick(item, "client_name", "name", "client"));
    if (!clientName) continue;

    const industry = normalizeIndustry(pick(item, "industry", "sector"), maps);
    const description = normalizeText(pick(item, "description", "outcomes"));
    const users = parseNumber(pick(item, "project_size_users", "users", "project_size"));
    const projectSizeUsers = users === null ? null : Math.round(users);

    drafts.push({
      clientName,
      country: normalizeCountry(pick(item, "country", "country_code"), maps).value,
      industry: industry.value ?? inferIndustry(description, maps),
      projectSizeUsers,
      isLargeProject: projectSizeUsers !== null && projectSizeUsers >= dictionary.data_quality_rules.large_project_users,
      servicesImplemented: normalizeServices(pick(item, "services_implemented", "modules_implemented", "services"), maps),
      implementationTimelineMonths: parseNumber(pick(item, "implementation_timeline_months", "timeline_months", "timeline")),
      outcomes: normalizeText(pick(item, "outcomes", "roi_estimate")),
      caseStudyUrl: normalizeText(pick(item, "case_study_url", "url")),
      sourceUrl: normalizeText(pick(item, "source_url")) ?? providerSourceUrl,
    });
  }
  return drafts;
}

/** Normalize one flat row. Returns null when the row has no usable name. */
export function normalizeRow(row: FlatRow, dictionary: DataDictionary): ProviderDraft | null {
  const maps = getNormalizationMaps(dictionary);
  const fields = mapColumns(row, maps);

  const name = normalizeName(fields.get("name"));
  if (!name) return null;

  const flags: QualityFlags = { ...(parseFlags(fields.get("quality_flags")) ?? {}) };
  let unmapped = 0;

  const country = normalizeCountry(fields.get("country"), maps);
  if (!country.mapped) {
    flags.unmapped_country = true;
    unmapped++;
  }
  const industry = normalizeIndustry(fields.get("industry"), maps);
  if (!industry.mapped) {
    flags.unmapped_industry = true;
    unmapped++;
  }
  const tier = normalizeTier(fields.get("tier"), maps);
  if (!tier.mapped) {
    flags.unmapped_tier = true;
    unmapped++;
  }

  const description = normalizeText(fields.get("description"));
  let services = normalizeServices(fields.get("services"), maps);
  if (services.length === 0) {
    services = inferServices(description, maps);
    if (services.length > 0) flags.inferred_services = true;
  }

  const sourceUrl = normalizeText(fields.get("source_url"));
  let references = splitList(fields.get("references"), maps.delimiters);
  const detailed = parseDetailedReferences(fields.get("references_detailed"), maps, dictionary, sourceUrl);
  if (detailed === null) {
    flags.invalid_references_detailed = true;
  } else {
    references = dedupeList([...references, ...detailed.map((r) => r.clientName)]);
  }

  const provider: CanonicalProvider = {
    providerId: "",
    name,
    country: country.value,
    location: normalizeText(fields.get("location")),
    tier: tier.value,
    industry: industry.value,
    services,
    references,
    website: normalizeText(fields.get("website")),
    description,
    price: parseNumber(fields.get("price")),
    rating: parseNumber(fields.get("rating")),
    reviewCount: parseNumber(fields.get("review_count")),
    sourceUrl,
    sourceBatch: normalizeText(fields.get("source_batch")),
    collectedAt: normalizeTimestamp(fields.get("collected_at")),
    qualityFlags: flags,
  };
  provider.providerId = generateProviderId(dedupKey(provider.name, provider.country));

  return { provider, references: detailed ?? [], unmapped };
}

// ===== Deduplication =====

const COMPLETENESS_FIELDS = [
  "name", "country", "location", "tier", "industry", "services", "references", "website",
  "description", "price", "rating", "review_count", "source_url", "collected_at",
];

/** Count of populated canonical fields, used to pick the surviving duplicate. */
export function fieldCompleteness(p: CanonicalProvider): number {
  return COMPLETENESS_FIELDS.filter((f) => isPopulated(providerField(p, f))).length;
}

// Scalars a duplicate can supply when the surviving record lacks them
const FILLABLE_FIELDS = [
  "location", "tier", "industry", "website", "description", "price", "rating",
  "reviewCount", "sourceUrl", "sourceBatch", "collectedAt",
] as const satisfies ReadonlyArray<keyof CanonicalProvider>;

type FillableField = (typeof FILLABLE_FIELDS)[number];

const FIELD_FLAGS: Partial<Record<FillableField, string>> = {
  tier: "unmapped_tier",
  industry: "unmapped_industry",
};

function fillField<K extends FillableField>(target: CanonicalProvider, source: CanonicalProvider, field: K): boolean {
  if (target[field] !== null || source[field] === null) return false;
  target[field] = source[field];
  return true;
}

function mergeDrafts(existing: ProviderDraft, incoming: ProviderDraft): ProviderDraft {
  const incomingWins = fieldCompleteness(incoming.provider) > fieldCompleteness(existing.provider);
  const [winner, loser] = incomingWins ? [incoming, existing] : [existing, incoming];

  const provider: CanonicalProvider = {
    ...winner.provider,
    services: dedupeList([...winner.provider.services, ...loser.provider.services]),
    references: dedupeList([...winner.provider.references, ...loser.provider.references]),
    qualityFlags: { ...winner.provider.qualityFlags },
  };
  let unmapped = winner.unmapped;
  for (const field of FILLABLE_FIELDS) {
    if (!fillField(provider, loser.provider, field)) continue;
    const flag = FIELD_FLAGS[field];
    if (flag && loser.provider.qualityFlags[flag]) {
      provider.qualityFlags[flag] = true;
      unmapped++;
    }
  }

  return {
    provider,
    // Both sets of references survive; later rows win in the reference dedup
    references: [...existing.references, ...incoming.references],
    unmapped,
  };
}

/**
 * Normalize, deduplicate and re-key a flat table. Cleaning the flat form of
 * the result again yields the same providers.
 */
export function cleanTable(table: FlatTable, dictionary: DataDictionary): CleanResult {
  const stats: CleanStats = {
    inputRows: table.rows.length,
    droppedNoName: 0,
    duplicatesMerged: 0,
    unmappedValues: 0,
    outputRows: 0,
  };

  const byKey = new Map<string, ProviderDraft>();
  for (const row of table.rows) {
    const draft = normalizeRow(row, dictionary);
    if (!draft) {
      stats.droppedNoName++;
      continue;
    }
    const key = dedupKey(draft.provider.name, draft.provider.country);
    const existing = byKey.get(key);
    if (existing) {
      byKey.set(key, mergeDrafts(existing, draft));
      stats.duplicatesMerged++;
    } else {
      byKey.set(key, draft);
    }
  }

  const providers: CanonicalProvider[] = [];
  const referencesByKey = new Map<string, CanonicalReference>();
  for (const draft of byKey.values()) {
    providers.push(draft.provider);
    stats.unmappedValues += draft.unmapped;
    const providerId = draft.provider.providerId;
    for (const ref of draft.references) {
      const refKey = `${providerId}|${ref.clientName.toLowerCase()}`;
      const reference: CanonicalReference = {
        ...ref,
        referenceId: generateReferenceId(providerId, ref.clientName),
        providerId,
        qualityFlag: scoreReference({ ...ref, referenceId: "", providerId }),
      };
      referencesByKey.set(refKey, reference);
    }
  }

  stats.outputRows = providers.length;
  console.log(
    `[clean] ${stats.inputRows} row(s) → ${stats.outputRows} provider(s): ` +
      `${stats.duplicatesMerged} duplicate(s) merged, ${stats.droppedNoName} without name dropped, ` +
      `${stats.unmappedValues} unmapped value(s) flagged, ${referencesByKey.size} reference(s)`
  );
  return { providers, references: [...referencesByKey.values()], stats };
}
