import type { DataDictionary } from "./data-dictionary";
import { PROVIDER_COLUMNS } from "./types";

// ===== Static patterns =====

// Directory badges appended to partner names, e.g. "Acme Consulting Gold", any case
export const TIER_BADGE_PATTERN = /(?:\s+(?:Gold|Silver|Ready))+\s*$/i;

// Zero-width and NUL characters that survive HTML text extraction
export const INVISIBLE_CHARS = /[\u0000\u200b\u200c\u200d\ufeff\u00ad]/g;

// "Gold Partner" → "gold", "Level 2 Seller" → "level 2"
export const TIER_SUFFIX_PATTERN = /\s+(?:partner|seller)$/;

// Columns the cleaner reads that are not provider columns themselves
export const EXTRA_CANONICAL_FIELDS = ["references_detailed", "completeness_score", "validity_score", "quality_score"] as const;

// ===== Dictionary-derived lookups =====
// All keys are lower-cased; values carry the canonical casing.

export interface NormalizationMaps {
  fieldAliases: Map<string, string>;
  countryByKey: Map<string, string>;
  industryByKey: Map<string, string>;
  tierByKey: Map<string, string>;
  serviceByKey: Map<string, string>;
  industryKeywords: Array<[industry: string, keywords: string[]]>;
  delimiters: string[];
}

export function normalizeColumnName(column: string): string {
  return column.trim().toLowerCase().replace(/[\s-]+/g, "_");
}

const cache = new WeakMap<DataDictionary, NormalizationMaps>();

export function getNormalizationMaps(dictionary: DataDictionary): NormalizationMaps {
  const cached = cache.get(dictionary);
  if (cached) return cached;
  const maps = buildNormalizationMaps(dictionary);
  cache.set(dictionary, maps);
  return maps;
}

function buildNormalizationMaps(dictionary: DataDictionary): NormalizationMaps {
  const fieldAliases = new Map<string, string>();
  for (const column of [...PROVIDER_COLUMNS, ...EXTRA_CANONICAL_FIELDS]) {
    fieldAliases.set(column, column);
  }
  for (const [alias, field] of Object.entries(dictionary.field_aliases)) {
    fieldAliases.set(normalizeColumnName(alias), field);
  }

  const countryByKey = new Map<string, string>();
  for (const [code, country] of Object.entries(dictionary.countries)) {
    const keys = [code, country.name, country.full_name, ...country.aliases];
    for (const key of keys) {
      if (key) countryByKey.set(key.toLowerCase(), code);
    }
  }

  const industryByKey = new Map<string, string>();
  for (const industry of dictionary.industries.standardized_taxonomy) {
    industryByKey.set(industry.toLowerCase(), industry);
  }
  for (const [alias, industry] of Object.entries(dictionary.industries.normalization_map)) {
    industryByKey.set(alias.toLowerCase(), industry);
  }

  const tierByKey = new Map<string, string>();
  for (const tier of dictionary.tiers.values) {
    tierByKey.set(tier.toLowerCase(), tier);
  }
  for (const [alias, tier] of Object.entries(dictionary.tiers.aliases)) {
    tierByKey.set(alias.toLowerCase(), tier);
  }

  const serviceByKey = new Map<string, string>();
  for (const module of dictionary.service_modules.core_modules) {
    serviceByKey.set(module.toLowerCase(), module);
  }
  for (const [alias, module] of Object.entries(dictionary.service_modules.module_aliases)) {
    serviceByKey.set(alias.toLowerCase(), module);
  }

  const industryKeywords = Object.entries(dictionary.industries.keywords).map(
    ([industry, keywords]): [string, string[]] => [industry, keywords.map((k) => k.toLowerCase())]
  );

  return {
    fieldAliases,
    countryByKey,
    industryByKey,
    tierByKey,
    serviceByKey,
    industryKeywords,
    delimiters: dictionary.list_delimiters,
  };
}
