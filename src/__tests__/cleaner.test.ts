import { describe, it, expect } from "vitest";
import { cleanTable, dedupKey, generateProviderId, generateReferenceId } from "../lib/cleaner";
import { providersToTable } from "../lib/provider-rows";
import { formatCsv, parseCsv } from "../lib/table";
import { ReferenceQuality, type FlatRow, type FlatTable } from "../lib/types";
import { testDictionary } from "./helpers";

const dictionary = testDictionary();

function table(rows: FlatRow[]): FlatTable {
  const columns = [...new Set(rows.flatMap((r) => Object.keys(r)))];
  return { columns, rows };
}

describe("cleanTable — deduplication", () => {
  it("merges same name and country, keeping the more complete record", () => {
    const result = cleanTable(
      table([
        { name: "Acme Corp", country: "us", website: null },
        { name: "acme corp", country: "US", website: "acme.com" },
      ]),
      dictionary
    );

    expect(result.providers).toHaveLength(1);
    const [acme] = result.providers;
    expect(acme.name).toBe("acme corp");
    expect(acme.country).toBe("US");
    expect(acme.website).toBe("acme.com");
    expect(acme.providerId).toBe(generateProviderId(dedupKey("Acme Corp", "US")));
    expect(result.stats.duplicatesMerged).toBe(1);
    expect(result.stats.outputRows).toBe(1);
  });

  it("keeps the first record on a completeness tie", () => {
    const result = cleanTable(
      table([
        { name: "Tie Co", country: "FR", description: "first" },
        { name: "TIE CO", country: "France", description: "second" },
      ]),
      dictionary
    );
    expect(result.providers).toHaveLength(1);
    expect(result.providers[0].description).toBe("first");
    expect(result.providers[0].name).toBe("Tie Co");
  });

  it("unions list fields with the winner's items first", () => {
    const result = cleanTable(
      table([
        { name: "Beta", country: "DE", services: "CRM; Sales" },
        { name: "BETA", country: "Germany", services: "Sales; Inventory", website: "https://beta.example.com" },
      ]),
      dictionary
    );
    expect(result.providers).toHaveLength(1);
    expect(result.providers[0].name).toBe("BETA");
    expect(result.providers[0].services).toEqual(["Sales", "Inventory", "CRM"]);
  });

  it("merges names that differ only by an upper-case badge", () => {
    const result = cleanTable(
      table([
        { name: "Acme Consulting GOLD", country: "US" },
        { name: "Acme Consulting", country: "US" },
      ]),
      dictionary
    );
    expect(result.providers.map((p) => p.name)).toEqual(["Acme Consulting"]);
    expect(result.stats.duplicatesMerged).toBe(1);
  });

  it("fills the surviving record's empty fields from its duplicate", () => {
    const result = cleanTable(
      table([
        { name: "Zed", country: "US", website: "https://zed.example.com", industry: "Space Mining" },
        { name: "zed", country: "US", location: "NYC", tier: "Gold", description: "ERP partner" },
      ]),
      dictionary
    );

    expect(result.providers).toHaveLength(1);
    const [zed] = result.providers;
    expect(zed.name).toBe("zed");
    expect(zed.location).toBe("NYC");
    expect(zed.tier).toBe("Gold");
    expect(zed.website).toBe("https://zed.example.com");
    expect(zed.industry).toBe("Space Mining");
    expect(zed.qualityFlags).toEqual({ unmapped_industry: true });
    expect(result.stats.unmappedValues).toBe(1);
  });

  it("keeps providers with the same name in different countries apart", () => {
    const result = cleanTable(
      table([
        { name: "Gamma", country: "US" },
        { name: "Gamma", country: "GB" },
      ]),
      dictionary
    );
    expect(result.providers.map((p) => p.country)).toEqual(["US", "GB"]);
    expect(result.stats.duplicatesMerged).toBe(0);
  });
});

describe("cleanTable — normalization", () => {
  it("maps aliased columns and coerces values", () => {
    const result = cleanTable(
      table([
        {
          seller_name: "Jane Dev Gold",
          seller_country: "Bangladesh",
          tags: "setup; api integration",
          starting_price: "From $150",
          reviews: "(1.2k)",
          scraped_at: "2024-05-01T00:00:00Z",
          link: "https://gigs.example.com/gig/1",
        },
      ]),
      dictionary
    );

    const [jane] = result.providers;
    expect(jane.name).toBe("Jane Dev");
    expect(jane.country).toBe("BD");
    expect(jane.services).toEqual(["Implementation", "Integration"]);
    expect(jane.price).toBe(150);
    expect(jane.reviewCount).toBe(1200);
    expect(jane.collectedAt).toBe("2024-05-01T00:00:00.000Z");
    expect(jane.sourceUrl).toBe("https://gigs.example.com/gig/1");
    expect(jane.qualityFlags).toEqual({});
  });

  it("keeps unknown vocabulary values and flags them", () => {
    const result = cleanTable(
      table([{ name: "Nova", country: "Atlantis", tier: "Platinum", industry: "Space Mining" }]),
      dictionary
    );

    const [nova] = result.providers;
    expect(nova.country).toBe("Atlantis");
    expect(nova.tier).toBe("Platinum");
    expect(nova.industry).toBe("Space Mining");
    expect(nova.qualityFlags).toEqual({ unmapped_country: true, unmapped_tier: true, unmapped_industry: true });
    expect(result.stats.unmappedValues).toBe(3);
  });

  it("infers services from the title when none are listed", () => {
    const result = cleanTable(
      table([{ seller_name: "Ravi K", seller_country: "India", title: "I will do odoo data migration and upgrade, plus support" }]),
      dictionary
    );
    const [ravi] = result.providers;
    expect(ravi.description).toBe("I will do odoo data migration and upgrade, plus support");
    expect(ravi.services).toEqual(["Migration", "Support"]);
    expect(ravi.qualityFlags).toEqual({ inferred_services: true });
  });

  it("drops rows without a usable name", () => {
    const result = cleanTable(table([{ name: "   ", country: "US" }, { name: "Kept", country: "US" }]), dictionary);
    expect(result.providers.map((p) => p.name)).toEqual(["Kept"]);
    expect(result.stats.droppedNoName).toBe(1);
    expect(result.stats.inputRows).toBe(2);
  });
});

describe("cleanTable — references", () => {
  const detailed = JSON.stringify([
    {
      client_name: "Blue Shop",
      industry: "ecommerce",
      project_size_users: 150,
      services_implemented: ["pos", "warehouse"],
      implementation_timeline_months: 6,
      outcomes: "Faster checkout",
      case_study_url: "https://gamma.example.com/blue",
    },
    { client_name: "Green Farm", description: "Organic food factory" },
  ]);

  it("builds reference records from detailed JSON", () => {
    const result = cleanTable(
      table([
        {
          name: "Gamma",
          country: "US",
          references: "Old Client",
          references_detailed: detailed,
          source_url: "https://partners.example.com/gamma",
        },
      ]),
      dictionary
    );

    const [gamma] = result.providers;
    expect(gamma.references).toEqual(["Old Client", "Blue Shop", "Green Farm"]);
    expect(result.references).toHaveLength(2);

    const [blue, green] = result.references;
    expect(blue).toEqual({
      referenceId: generateReferenceId(gamma.providerId, "Blue Shop"),
      providerId: gamma.providerId,
      clientName: "Blue Shop",
      country: null,
      industry: "Retail",
      projectSizeUsers: 150,
      isLargeProject: true,
      servicesImplemented: ["Point of Sale", "Inventory"],
      implementationTimelineMonths: 6,
      outcomes: "Faster checkout",
      caseStudyUrl: "https://gamma.example.com/blue",
      sourceUrl: "https://partners.example.com/gamma",
      qualityFlag: ReferenceQuality.HIGH,
    });
    expect(green.industry).toBe("Manufacturing");
    expect(green.isLargeProject).toBe(false);
    expect(green.qualityFlag).toBe(ReferenceQuality.LOW);
  });

  it("flags unparseable detailed references and keeps the plain list", () => {
    const result = cleanTable(
      table([{ name: "Delta", country: "US", references: "One; Two", references_detailed: "[not json" }]),
      dictionary
    );
    expect(result.providers[0].references).toEqual(["One", "Two"]);
    expect(result.providers[0].qualityFlags).toEqual({ invalid_references_detailed: true });
    expect(result.references).toEqual([]);
  });

  it("keeps the later reference when the same client appears twice", () => {
    const result = cleanTable(
      table([
        { name: "Echo", country: "US", references_detailed: JSON.stringify([{ client_name: "Acme Client", outcomes: "first" }]) },
        { name: "Echo", country: "US", references_detailed: JSON.stringify([{ client_name: "acme client", outcomes: "second" }]) },
      ]),
      dictionary
    );
    expect(result.references).toHaveLength(1);
    expect(result.references[0].outcomes).toBe("second");
    expect(result.references[0].clientName).toBe("acme client");
  });
});

describe("cleanTable — idempotency", () => {
  it("cleaning the written CSV again yields the same providers", () => {
    const first = cleanTable(
      table([
        { seller_name: "Jane Dev Gold", seller_country: "Bangladesh", tags: "setup; api integration", starting_price: "From $150" },
        { name: "Nova", country: "Atlantis", tier: "Platinum" },
        { name: "Acme Corp", country: "us" },
        { name: "acme corp", country: "US", website: "acme.com", scraped_at: "2024-05-01T00:00:00Z" },
        { name: "Delta", country: "US", references: "One", references_detailed: "[not json" },
      ]),
      dictionary
    );

    const written = parseCsv(formatCsv(providersToTable(first.providers)));
    const second = cleanTable(written, dictionary);

    expect(second.providers).toEqual(first.providers);
    expect(second.stats.duplicatesMerged).toBe(0);
  });
});
