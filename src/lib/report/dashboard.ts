import ExcelJS from "exceljs";
import type { Workbook, Worksheet } from "exceljs";
import type { CanonicalProvider, CanonicalReference } from "../types";
import { summarizeDirectory, type CountRow, type DirectorySummary } from "../analysis/directory";
import { DECIMAL, addDataSheet, addSheet, addTable, fitColumns, saveWorkbook, type ColumnSpec } from "./sheets";

export const DASHBOARD_SHEET_NAMES = ["Dashboard", "Partners", "Clients"] as const;

function addCountTable(ws: Worksheet, title: string, header: string, rows: CountRow[]): void {
  ws.addRow([]);
  ws.addRow([title]).getCell(1).font = { bold: true };
  addTable(
    ws,
    [{ header }, { header: "Count" }],
    rows.map((r) => [r.label, r.count])
  );
}

function buildDashboardSheet(workbook: Workbook, summary: DirectorySummary): void {
  const ws = addSheet(workbook, "Dashboard");
  const k = summary.kpis;
  addTable(
    ws,
    [{ header: "Metric" }, { header: "Value" }],
    [
      ["Total Partners", k.totalPartners],
      ["Total Clients", k.totalClients],
      ["Detailed Client References", k.detailedClients],
      ["Countries Covered", k.countries],
      ["Avg Clients/Partner", k.averageClientsPerPartner],
      ["Large Projects", k.largeProjects],
    ]
  );
  ws.getCell("B6").numFmt = DECIMAL;

  addCountTable(ws, "Partners by Tier", "Tier", summary.partnersByTier);
  addCountTable(ws, "Top Countries (Partners)", "Country", summary.partnersByCountry);
  addCountTable(ws, "Top Client Industries", "Industry", summary.clientIndustries);

  ws.addRow([]);
  ws.addRow(["Avg Clients per Partner Tier"]).getCell(1).font = { bold: true };
  addTable(
    ws,
    [{ header: "Tier" }, { header: "Partners" }, { header: "Avg Clients", numFmt: DECIMAL }],
    summary.clientsPerTier.map((t) => [t.tier, t.partners, t.averageClients])
  );

  ws.addRow([]);
  ws.addRow(["Top Partners by Client Count"]).getCell(1).font = { bold: true };
  addTable(
    ws,
    [{ header: "Partner" }, { header: "Country" }, { header: "Tier" }, { header: "Clients" }],
    summary.topPartners.map((p) => [p.name, p.country, p.tier, p.clientCount])
  );
  fitColumns(ws);
}

const PARTNER_COLUMNS: ColumnSpec[] = [
  { header: "Name" },
  { header: "Country" },
  { header: "Location" },
  { header: "Tier" },
  { header: "Industry" },
  { header: "Services" },
  { header: "Clients" },
  { header: "Website" },
  { header: "Source URL" },
];

const CLIENT_COLUMNS: ColumnSpec[] = [
  { header: "Partner" },
  { header: "Client" },
  { header: "Country" },
  { header: "Industry" },
  { header: "Project Size (Users)" },
  { header: "Large Project" },
  { header: "Services Implemented" },
  { header: "Timeline (Months)" },
  { header: "Outcomes" },
  { header: "Case Study URL" },
  { header: "Quality" },
];

/** Dashboard, Partners and Clients sheets for a partner directory. */
export function buildDashboardWorkbook(providers: CanonicalProvider[], references: CanonicalReference[]): Workbook {
  const workbook = new ExcelJS.Workbook();
  buildDashboardSheet(workbook, summarizeDirectory(providers, references));

  addDataSheet(
    workbook,
    "Partners",
    PARTNER_COLUMNS,
    providers.map((p) => [
      p.name,
      p.country,
      p.location,
      p.tier,
      p.industry,
      p.services.join("; "),
      p.references.length,
      p.website,
      p.sourceUrl,
    ])
  );

  const partnerNames = new Map(providers.map((p) => [p.providerId, p.name]));
  addDataSheet(
    workbook,
    "Clients",
    CLIENT_COLUMNS,
    references.map((r) => [
      partnerNames.get(r.providerId) ?? r.providerId,
      r.clientName,
      r.country,
      r.industry,
      r.projectSizeUsers,
      r.isLargeProject ? "Yes" : "No",
      r.servicesImplemented.join("; "),
      r.implementationTimelineMonths,
      r.outcomes,
      r.caseStudyUrl,
      r.qualityFlag,
    ])
  );
  return workbook;
}

export async function writeDashboard(
  providers: CanonicalProvider[],
  references: CanonicalReference[],
  filePath: string
): Promise<string> {
  await saveWorkbook(buildDashboardWorkbook(providers, references), filePath);
  console.log(`[report] Wrote partner dashboard (${providers.length} partner(s), ${references.length} client(s)) to ${filePath}`);
  return filePath;
}
