import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import fs from "fs";
import path from "path";
import ExcelJS from "exceljs";
import type { Worksheet } from "exceljs";
import { summarizeDirectory } from "../lib/analysis/directory";
import { DASHBOARD_SHEET_NAMES, buildDashboardWorkbook, writeDashboard } from "../lib/report/dashboard";
import { ReferenceQuality, type CanonicalReference } from "../lib/types";
import { makeProvider, makeTempDir } from "./helpers";

function makeReference(overrides: Partial<CanonicalReference> = {}): CanonicalReference {
  return {
    referenceId: "r-test",
    providerId: "p-test",
    clientName: "Test Client",
    country: null,
    industry: null,
    projectSizeUsers: null,
    isLargeProject: false,
    servicesImplemented: [],
    implementationTimelineMonths: null,
    outcomes: null,
    caseStudyUrl: null,
    sourceUrl: null,
    qualityFlag: ReferenceQuality.LOW,
    ...overrides,
  };
}

const providers = [
  makeProvider({ providerId: "a", name: "Alpha", country: "US", tier: "Gold", references: ["C1", "C2", "C3"] }),
  makeProvider({ providerId: "b", name: "Beta", country: "US", tier: "Silver", references: ["C4"] }),
  makeProvider({ providerId: "c", name: "Gamma", country: "DE", tier: "Gold", services: ["CRM", "Sales"] }),
  makeProvider({ providerId: "d", name: "Delta", references: ["C5"] }),
];

const references = [
  makeReference({ referenceId: "r1", providerId: "a", clientName: "C1", industry: "Retail", projectSizeUsers: 150, isLargeProject: true }),
  makeReference({ referenceId: "r2", providerId: "a", clientName: "C2", industry: "Retail" }),
  makeReference({ referenceId: "r3", providerId: "b", clientName: "C4", servicesImplemented: ["Inventory", "Sales"] }),
];

function rowStarting(ws: Worksheet, text: string): number {
  for (let i = 1; i <= ws.rowCount; i++) {
    if (ws.getRow(i).getCell(1).value === text) return i;
  }
  return -1;
}

describe("summarizeDirectory", () => {
  it("counts partners and clients", () => {
    expect(summarizeDirectory(providers, references).kpis).toEqual({
      totalPartners: 4,
      totalClients: 5,
      detailedClients: 3,
      countries: 2,
      averageClientsPerPartner: 1.25,
      largeProjects: 1,
    });
  });

  it("breaks partners down by tier and country and clients by industry", () => {
    const summary = summarizeDirectory(providers, references);
    expect(summary.partnersByTier).toEqual([
      { label: "Gold", count: 2 },
      { label: "Silver", count: 1 },
      { label: "Unknown", count: 1 },
    ]);
    expect(summary.partnersByCountry).toEqual([
      { label: "US", count: 2 },
      { label: "DE", count: 1 },
      { label: "Unknown", count: 1 },
    ]);
    expect(summary.clientIndustries).toEqual([
      { label: "Retail", count: 2 },
      { label: "Unknown", count: 1 },
    ]);
  });

  it("averages clients per tier and ranks partners by client count", () => {
    const summary = summarizeDirectory(providers, references);
    expect(summary.clientsPerTier).toEqual([
      { tier: "Gold", partners: 2, averageClients: 1.5 },
      { tier: "Silver", partners: 1, averageClients: 1 },
      { tier: "Unknown", partners: 1, averageClients: 1 },
    ]);
    expect(summary.topPartners.map((p) => [p.name, p.clientCount])).toEqual([
      ["Alpha", 3],
      ["Beta", 1],
      ["Delta", 1],
    ]);
  });

  it("handles an empty directory", () => {
    const summary = summarizeDirectory([], []);
    expect(summary.kpis.averageClientsPerPartner).toBe(0);
    expect(summary.partnersByTier).toEqual([]);
    expect(summary.topPartners).toEqual([]);
  });
});

describe("buildDashboardWorkbook", () => {
  it("creates the dashboard and both data sheets in order", () => {
    const workbook = buildDashboardWorkbook(providers, references);
    expect(workbook.worksheets.map((ws) => ws.name)).toEqual([...DASHBOARD_SHEET_NAMES]);
  });

  it("puts the KPIs first and titled breakdown tables below", () => {
    const ws = buildDashboardWorkbook(providers, references).getWorksheet("Dashboard");
    expect(ws).toBeDefined();
    if (!ws) return;

    expect(ws.getCell("A1").value).toBe("Metric");
    expect(ws.getCell("A1").font.bold).toBe(true);
    expect(ws.getCell("B2").value).toBe(4);
    expect(ws.getCell("A6").value).toBe("Avg Clients/Partner");
    expect(ws.getCell("B6").value).toBe(1.25);
    expect(ws.getCell("B6").numFmt).toBe("0.0");

    const tiers = rowStarting(ws, "Partners by Tier");
    expect(tiers).toBeGreaterThan(7);
    expect(ws.getRow(tiers + 1).getCell(1).value).toBe("Tier");
    expect(ws.getRow(tiers + 2).getCell(1).value).toBe("Gold");
    expect(ws.getRow(tiers + 2).getCell(2).value).toBe(2);

    const top = rowStarting(ws, "Top Partners by Client Count");
    expect(ws.getRow(top + 2).getCell(1).value).toBe("Alpha");
    expect(ws.getRow(top + 2).getCell(4).value).toBe(3);
  });

  it("lists partners and clients on filterable sheets", () => {
    const workbook = buildDashboardWorkbook(providers, references);
    const partners = workbook.getWorksheet("Partners");
    const clients = workbook.getWorksheet("Clients");
    expect(partners).toBeDefined();
    expect(clients).toBeDefined();
    if (!partners || !clients) return;

    expect(partners.rowCount).toBe(5);
    expect(partners.getCell("A4").value).toBe("Gamma");
    expect(partners.getCell("F4").value).toBe("CRM; Sales");
    expect(partners.getCell("G2").value).toBe(3);
    expect(partners.autoFilter).toEqual({ from: { row: 1, column: 1 }, to: { row: 1, column: 9 } });

    expect(clients.rowCount).toBe(4);
    expect(clients.getCell("A2").value).toBe("Alpha");
    expect(clients.getCell("F2").value).toBe("Yes");
    expect(clients.getCell("A4").value).toBe("Beta");
    expect(clients.getCell("G4").value).toBe("Inventory; Sales");
    expect(clients.getCell("K4").value).toBe("low");
    expect(clients.autoFilter).toEqual({ from: { row: 1, column: 1 }, to: { row: 1, column: 11 } });
  });
});

describe("writeDashboard", () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("writes an xlsx that reads back", async () => {
    const file = path.join(dir, "out", "dashboard.xlsx");
    await writeDashboard(providers, references, file);

    const workbook = new ExcelJS.Workbook();
    await workbook.xlsx.readFile(file);
    expect(workbook.worksheets.map((ws) => ws.name)).toEqual([...DASHBOARD_SHEET_NAMES]);
    expect(workbook.getWorksheet("Clients")?.getCell("B3").value).toBe("C2");
  });
});
