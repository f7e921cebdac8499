import fs from "fs";
import os from "os";
import path from "path";
import { fileURLToPath } from "url";
import { loadDataDictionary, type DataDictionary } from "../lib/data-dictionary";
import type { CanonicalProvider, ScoredProvider } from "../lib/types";

export const DICTIONARY_PATH = fileURLToPath(new URL("../../config/data-dictionary.json", import.meta.url));
export const SCRAPER_CONFIG_PATH = fileURLToPath(new URL("../../config/scraper-config.json", import.meta.url));

export function testDictionary(): DataDictionary {
  return loadDataDictionary(DICTIONARY_PATH);
}

export function readFixture(name: string): string {
  return fs.readFileSync(fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url)), "utf-8");
}

export function makeTempDir(prefix = "provider-etl-"): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function makeProvider(overrides: Partial<CanonicalProvider> = {}): CanonicalProvider {
  return {
    providerId: "p-test",
    name: "Test Provider",
    country: null,
    location: null,
    tier: null,
    industry: null,
    services: [],
    references: [],
    website: null,
    description: null,
    price: null,
    rating: null,
    reviewCount: null,
    sourceUrl: null,
    sourceBatch: null,
    collectedAt: null,
    qualityFlags: {},
    ...overrides,
  };
}

export function makeScored(overrides: Partial<ScoredProvider> = {}): ScoredProvider {
  return {
    ...makeProvider(),
    completenessScore: 0,
    validityScore: 0,
    qualityScore: 0,
    ...overrides,
  };
}
