import fs from "fs";
import path from "path";
import Database from "better-sqlite3";
import { config } from "./config";
import {
  ReferenceQuality,
  type CanonicalReference,
  type QualityFlags,
  type ScoredProvider,
} from "./types";

let db: Database.Database | null = null;

/** Open (and migrate) a store. ":memory:" gives a throwaway database. */
export function openDb(dbPath: string): Database.Database {
  let target = dbPath;
  if (dbPath !== ":memory:") {
    target = path.resolve(process.cwd(), dbPath);
    fs.mkdirSync(path.dirname(target), { recursive: true });
  }

  const database = new Database(target);
  if (dbPath !== ":memory:") database.pragma("journal_mode = WAL");
  database.pragma("foreign_keys = ON");

  initSchema(database);
  return database;
}

export function getDb(): Database.Database {
  if (db) return db;
  db = openDb(config.dbPath);
  console.log(`[db] Opened ${config.dbPath}`);
  return db;
}

export function closeDb(): void {
  if (!db) return;
  db.close();
  db = null;
}

function initSchema(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS providers (
      provider_id TEXT PRIMARY KEY,
      name TEXT NOT NULL,
      country TEXT,
      location TEXT,
      tier TEXT,
      industry TEXT,
      services TEXT NOT NULL DEFAULT '[]',
      client_references TEXT NOT NULL DEFAULT '[]',
      website TEXT,
      description TEXT,
      price REAL,
      rating REAL,
      review_count INTEGER,
      source_url TEXT,
      source_batch TEXT,
      collected_at TEXT,
      completeness_score REAL NOT NULL DEFAULT 0,
      validity_score REAL NOT NULL DEFAULT 0,
      quality_score REAL NOT NULL DEFAULT 0,
      quality_flags TEXT NOT NULL DEFAULT '{}',
      date_collected TEXT NOT NULL,
      last_updated TEXT NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_providers_country ON providers(country);
    CREATE INDEX IF NOT EXISTS idx_providers_tier ON providers(tier);
    CREATE INDEX IF NOT EXISTS idx_providers_quality ON providers(quality_score DESC);
    CREATE INDEX IF NOT EXISTS idx_providers_services ON providers(services);

    CREATE TABLE IF NOT EXISTS "references" (
      reference_id TEXT PRIMARY KEY,
      provider_id TEXT NOT NULL REFERENCES providers(provider_id) ON DELETE CASCADE,
      client_name TEXT NOT NULL,
      country TEXT,
      industry TEXT,
      project_size_users INTEGER,
      is_large_project INTEGER NOT NULL DEFAULT 0,
      services_implemented TEXT NOT NULL DEFAULT '[]',
      implementation_timeline_months REAL,
      outcomes TEXT,
      case_study_url TEXT,
      source_url TEXT,
      quality_flag TEXT NOT NULL DEFAULT 'medium',
      date_collected TEXT NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_references_provider ON "references"(provider_id);
    CREATE INDEX IF NOT EXISTS idx_references_country ON "references"(country);
    CREATE INDEX IF NOT EXISTS idx_references_industry ON "references"(industry);
  `);
}

// ===== Row mapping =====

function str(value: unknown): string | null {
  return typeof value === "string" ? value : null;
}

function num(value: unknown): number | null {
  return typeof value === "number" ? value : null;
}

function jsonList(value: unknown): string[] {
  if (typeof value !== "string") return [];
  const parsed: unknown = JSON.parse(value);
  return Array.isArray(parsed) ? parsed.filter((v): v is string => typeof v === "string") : [];
}

function jsonFlags(value: unknown): QualityFlags {
  if (typeof value !== "string") return {};
  const parsed: unknown = JSON.parse(value);
  const flags: QualityFlags = {};
  if (typeof parsed === "object" && parsed !== null) {
    for (const [key, set] of Object.entries(parsed)) {
      if (set === true) flags[key] = true;
    }
  }
  return flags;
}

export interface StoredProvider extends ScoredProvider {
  dateCollected: string;
  lastUpdated: string;
}

function mapRowToProvider(row: Record<string, unknown>): StoredProvider {
  return {
    providerId: str(row.provider_id) ?? "",
    name: str(row.name) ?? "",
    country: str(row.country),
    location: str(row.location),
    tier: str(row.tier),
    industry: str(row.industry),
    services: jsonList(row.services),
    references: jsonList(row.client_references),
    website: str(row.website),
    description: str(row.description),
    price: num(row.price),
    rating: num(row.rating),
    reviewCount: num(row.review_count),
    sourceUrl: str(row.source_url),
    sourceBatch: str(row.source_batch),
    collectedAt: str(row.collected_at),
    completenessScore: num(row.completeness_score) ?? 0,
    validityScore: num(row.validity_score) ?? 0,
    qualityScore: num(row.quality_score) ?? 0,
    qualityFlags: jsonFlags(row.quality_flags),
    dateCollected: str(row.date_collected) ?? "",
    lastUpdated: str(row.last_updated) ?? "",
  };
}

function toReferenceQuality(value: unknown): ReferenceQuality {
  if (value === ReferenceQuality.HIGH) return ReferenceQuality.HIGH;
  if (value === ReferenceQuality.LOW) return ReferenceQuality.LOW;
  return ReferenceQuality.MEDIUM;
}

function mapRowToReference(row: Record<string, unknown>): CanonicalReference {
  return {
    referenceId: str(row.reference_id) ?? "",
    providerId: str(row.provider_id) ?? "",
    clientName: str(row.client_name) ?? "",
    country: str(row.country),
    industry: str(row.industry),
    projectSizeUsers: num(row.project_size_users),
    isLargeProject: row.is_large_project === 1,
    servicesImplemented: jsonList(row.services_implemented),
    implementationTimelineMonths: num(row.implementation_timeline_months),
    outcomes: str(row.outcomes),
    caseStudyUrl: str(row.case_study_url),
    sourceUrl: str(row.source_url),
    qualityFlag: toReferenceQuality(row.quality_flag),
  };
}

// ===== Providers =====

/**
 * Insert or update providers. Scores and flags are replaced,
 * date_collected keeps its first value and last_updated is bumped.
 */
export function upsertProviders(
  providers: ScoredProvider[],
  database: Database.Database = getDb(),
  now: Date = new Date()
): number {
  if (providers.length === 0) return 0;
  const timestamp = now.toISOString();
  const stmt = database.prepare(`
    INSERT INTO providers (
      provider_id, name, country, location, tier, industry, services, client_references,
      website, description, price, rating, review_count, source_url, source_batch, collected_at,
      completeness_score, validity_score, quality_score, quality_flags, date_collected, last_updated
    ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    ON CONFLICT(provider_id) DO UPDATE SET
      name = excluded.name,
      country = excluded.country,
      location = excluded.location,
      tier = excluded.tier,
      industry = excluded.industry,
      services = excluded.services,
      client_references = excluded.client_references,
      website = excluded.website,
      description = excluded.description,
      price = excluded.price,
      rating = excluded.rating,
      review_count = excluded.review_count,
      source_url = excluded.source_url,
      source_batch = excluded.source_batch,
      collected_at = excluded.collected_at,
      completeness_score = excluded.completeness_score,
      validity_score = excluded.validity_score,
      quality_score = excluded.quality_score,
      quality_flags = excluded.quality_flags,
      last_updated = excluded.last_updated
  `);

  database.transaction(() => {
    for (const p of providers) {
      stmt.run(
        p.providerId, p.name, p.country, p.location, p.tier, p.industry,
        JSON.stringify(p.services), JSON.stringify(p.references),
        p.website, p.description, p.price, p.rating, p.reviewCount,
        p.sourceUrl, p.sourceBatch, p.collectedAt,
        p.completenessScore, p.validityScore, p.qualityScore,
        JSON.stringify(p.qualityFlags), timestamp, timestamp
      );
    }
  })();
  return providers.length;
}

export interface ProviderFilter {
  country?: string;
  tier?: string;
  minQuality?: number;
}

export function getProviders(filter: ProviderFilter = {}, database: Database.Database = getDb()): StoredProvider[] {
  const where: string[] = [];
  const params: Array<string | number> = [];
  if (filter.country) {
    where.push("country = ?");
    params.push(filter.country);
  }
  if (filter.tier) {
    where.push("tier = ?");
    params.push(filter.tier);
  }
  if (filter.minQuality !== undefined) {
    where.push("quality_score >= ?");
    params.push(filter.minQuality);
  }

  const sql = `SELECT * FROM providers ${where.length > 0 ? `WHERE ${where.join(" AND ")}` : ""}
    ORDER BY quality_score DESC, name ASC`;
  const rows = database.prepare(sql).all(...params) as Record<string, unknown>[];
  return rows.map(mapRowToProvider);
}

export function deleteProvider(providerId: string, database: Database.Database = getDb()): boolean {
  const result = database.prepare("DELETE FROM providers WHERE provider_id = ?").run(providerId);
  return result.changes > 0;
}

// ===== References =====

export function insertReferences(
  references: CanonicalReference[],
  database: Database.Database = getDb(),
  now: Date = new Date()
): number {
  if (references.length === 0) return 0;
  const timestamp = now.toISOString();
  const stmt = database.prepare(`
    INSERT INTO "references" (
      reference_id, provider_id, client_name, country, industry, project_size_users,
      is_large_project, services_implemented, implementation_timeline_months, outcomes,
      case_study_url, source_url, quality_flag, date_collected
    ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    ON CONFLICT(reference_id) DO UPDATE SET
      client_name = excluded.client_name,
      country = excluded.country,
      industry = excluded.industry,
      project_size_users = excluded.project_size_users,
      is_large_project = excluded.is_large_project,
      services_implemented = excluded.services_implemented,
      implementation_timeline_months = excluded.implementation_timeline_months,
      outcomes = excluded.outcomes,
      case_study_url = excluded.case_study_url,
      source_url = excluded.source_url,
      quality_flag = excluded.quality_flag
  `);

  database.transaction(() => {
    for (const r of references) {
      stmt.run(
        r.referenceId, r.providerId, r.clientName, r.country, r.industry, r.projectSizeUsers,
        r.isLargeProject ? 1 : 0, JSON.stringify(r.servicesImplemented),
        r.implementationTimelineMonths, r.outcomes, r.caseStudyUrl, r.sourceUrl,
        r.qualityFlag, timestamp
      );
    }
  })();
  return references.length;
}

export function getReferencesForProvider(providerId: string, database: Database.Database = getDb()): CanonicalReference[] {
  const rows = database
    .prepare(`SELECT * FROM "references" WHERE provider_id = ? ORDER BY client_name ASC`)
    .all(providerId) as Record<string, unknown>[];
  return rows.map(mapRowToReference);
}
