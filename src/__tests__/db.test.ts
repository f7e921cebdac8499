import { describe, it, expect, beforeEach, afterEach } from "vitest";
import type Database from "better-sqlite3";
import {
  deleteProvider,
  getProviders,
  getReferencesForProvider,
  insertReferences,
  openDb,
  upsertProviders,
} from "../lib/db";
import { ReferenceQuality, type CanonicalReference } from "../lib/types";
import { makeScored } from "./helpers";

function makeReference(overrides: Partial<CanonicalReference> = {}): CanonicalReference {
  return {
    referenceId: "r-1",
    providerId: "p-1",
    clientName: "Blue Shop",
    country: "US",
    industry: "Retail",
    projectSizeUsers: 150,
    isLargeProject: true,
    servicesImplemented: ["Point of Sale"],
    implementationTimelineMonths: 6,
    outcomes: null,
    caseStudyUrl: null,
    sourceUrl: null,
    qualityFlag: ReferenceQuality.MEDIUM,
    ...overrides,
  };
}

describe("provider store", () => {
  let db: Database.Database;

  beforeEach(() => {
    db = openDb(":memory:");
  });

  afterEach(() => {
    db.close();
  });

  const alpha = makeScored({
    providerId: "p-1",
    name: "Alpha",
    country: "US",
    tier: "Gold",
    services: ["Implementation", "CRM"],
    references: ["Blue Shop"],
    price: 120,
    qualityScore: 0.9,
    qualityFlags: { unmapped_industry: true },
  });
  const beta = makeScored({ providerId: "p-2", name: "Beta", country: "DE", qualityScore: 0.4 });
  const gamma = makeScored({ providerId: "p-3", name: "Gamma", country: "US", tier: "Silver", qualityScore: 0.9 });

  it("round-trips providers ordered by quality then name", () => {
    upsertProviders([beta, gamma, alpha], db, new Date("2024-01-01T00:00:00Z"));

    const stored = getProviders({}, db);
    expect(stored.map((p) => p.name)).toEqual(["Alpha", "Gamma", "Beta"]);
    expect(stored[0]).toEqual({
      ...alpha,
      dateCollected: "2024-01-01T00:00:00.000Z",
      lastUpdated: "2024-01-01T00:00:00.000Z",
    });
  });

  it("filters by country, tier and minimum quality", () => {
    upsertProviders([alpha, beta, gamma], db);
    expect(getProviders({ country: "US" }, db).map((p) => p.name)).toEqual(["Alpha", "Gamma"]);
    expect(getProviders({ tier: "Silver" }, db).map((p) => p.name)).toEqual(["Gamma"]);
    expect(getProviders({ minQuality: 0.5 }, db).map((p) => p.name)).toEqual(["Alpha", "Gamma"]);
    expect(getProviders({ country: "US", tier: "Gold", minQuality: 0.95 }, db)).toEqual([]);
  });

  it("keeps the first collection date on upsert and bumps last_updated", () => {
    upsertProviders([alpha], db, new Date("2024-01-01T00:00:00Z"));
    upsertProviders([{ ...alpha, price: 150 }], db, new Date("2024-02-01T00:00:00Z"));

    const [stored] = getProviders({}, db);
    expect(stored.price).toBe(150);
    expect(stored.dateCollected).toBe("2024-01-01T00:00:00.000Z");
    expect(stored.lastUpdated).toBe("2024-02-01T00:00:00.000Z");
    expect(getProviders({}, db)).toHaveLength(1);
  });

  it("stores references and removes them with their provider", () => {
    upsertProviders([alpha, beta], db);
    insertReferences(
      [
        makeReference(),
        makeReference({ referenceId: "r-2", clientName: "Acme Client", qualityFlag: ReferenceQuality.HIGH }),
        makeReference({ referenceId: "r-3", providerId: "p-2", clientName: "Other" }),
      ],
      db
    );

    const refs = getReferencesForProvider("p-1", db);
    expect(refs.map((r) => r.clientName)).toEqual(["Acme Client", "Blue Shop"]);
    expect(refs[1]).toEqual(makeReference());
    expect(refs[0].qualityFlag).toBe(ReferenceQuality.HIGH);

    expect(deleteProvider("p-1", db)).toBe(true);
    expect(getReferencesForProvider("p-1", db)).toEqual([]);
    expect(getReferencesForProvider("p-2", db)).toHaveLength(1);
    expect(deleteProvider("p-1", db)).toBe(false);
  });

  it("rejects references to unknown providers", () => {
    expect(() => insertReferences([makeReference({ providerId: "missing" })], db)).toThrow(/FOREIGN KEY/);
  });
});
