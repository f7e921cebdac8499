import ExcelJS from "exceljs";
import type { Workbook } from "exceljs";
import type { MarketAnalysis } from "../analysis/analyzer";
import { CURRENCY, PERCENT, SCORE, addDataSheet, addSheet, addTable, fitColumns, saveWorkbook, type ColumnSpec } from "./sheets";

export const SHEET_NAMES = ["Executive Summary", "Category Analysis", "Service Gaps", "Raw Data"] as const;

function buildSummarySheet(workbook: Workbook, analysis: MarketAnalysis): void {
  const ws = addSheet(workbook, "Executive Summary");
  const s = analysis.summary;
  const metrics: Array<[string, number | null, string | undefined]> = [
    ["Total Providers Analyzed", s.totalProviders, undefined],
    ["Countries", s.countries, undefined],
    ["Average Completeness", s.averageCompleteness, PERCENT],
    ["Average Validity", s.averageValidity, PERCENT],
    ["Average Quality", s.averageQuality, PERCENT],
    ["High-Quality Share", s.highQualityShare, PERCENT],
    ["Average Market Price", s.averagePrice, CURRENCY],
    ["Median Market Price", s.medianPrice, CURRENCY],
    ["Highest Price", s.maxPrice, CURRENCY],
    ["Client References", s.totalReferences, undefined],
    ["Categories", s.clusterCount, undefined],
    ["Service Gaps", s.gapCount, undefined],
  ];

  addTable(ws, [{ header: "Metric" }, { header: "Value" }], []);
  for (const [metric, value, numFmt] of metrics) {
    const row = ws.addRow([metric, value]);
    if (numFmt) row.getCell(2).numFmt = numFmt;
  }
  fitColumns(ws);
}

function buildCategorySheet(workbook: Workbook, analysis: MarketAnalysis): void {
  const ws = addSheet(workbook, "Category Analysis");
  addTable(
    ws,
    [
      { header: "Category" },
      { header: "Providers" },
      { header: "Share", numFmt: PERCENT },
      { header: "Avg Quality", numFmt: SCORE },
      { header: "Avg Completeness", numFmt: SCORE },
      { header: "Avg Price ($)", numFmt: CURRENCY },
      { header: "Min Price ($)", numFmt: CURRENCY },
      { header: "Max Price ($)", numFmt: CURRENCY },
      { header: "Top Keywords" },
    ],
    analysis.clusters.map((c) => [
      c.label,
      c.count,
      c.share,
      c.meanQuality,
      c.meanCompleteness,
      c.averagePrice,
      c.minPrice,
      c.maxPrice,
      c.keywords.join(", "),
    ])
  );
  fitColumns(ws);
}

function buildGapSheet(workbook: Workbook, analysis: MarketAnalysis): void {
  const ws = addSheet(workbook, "Service Gaps");
  addTable(
    ws,
    [{ header: "Service Keyword" }, { header: "Providers" }, { header: "Coverage", numFmt: PERCENT }, { header: "Gap" }],
    analysis.gaps.map((g) => [g.keyword, g.providerCount, g.coverage, g.isGap ? "Yes" : "No"])
  );

  ws.addRow([]);
  addTable(
    ws,
    [
      { header: "Service Category" },
      { header: "Providers" },
      { header: "Avg Price ($)", numFmt: CURRENCY },
      { header: "Max Price ($)", numFmt: CURRENCY },
    ],
    analysis.serviceMatches.map((m) => [m.service, m.count, m.averagePrice, m.maxPrice])
  );
  fitColumns(ws);
}

const RAW_COLUMNS: ColumnSpec[] = [
  { header: "Name" },
  { header: "Country" },
  { header: "Tier" },
  { header: "Industry" },
  { header: "Services" },
  { header: "Price ($)", numFmt: CURRENCY },
  { header: "Rating" },
  { header: "Reviews" },
  { header: "Completeness", numFmt: SCORE },
  { header: "Validity", numFmt: SCORE },
  { header: "Quality", numFmt: SCORE },
  { header: "Category" },
  { header: "Service Match" },
  { header: "Source URL" },
];

function buildRawSheet(workbook: Workbook, analysis: MarketAnalysis): void {
  addDataSheet(
    workbook,
    "Raw Data",
    RAW_COLUMNS,
    analysis.providers.map(({ provider: p, cluster, serviceMatch }) => [
      p.name,
      p.country,
      p.tier,
      p.industry,
      p.services.join("; "),
      p.price,
      p.rating,
      p.reviewCount,
      p.completenessScore,
      p.validityScore,
      p.qualityScore,
      cluster,
      serviceMatch.join(", "),
      p.sourceUrl,
    ])
  );
}

export function buildWorkbook(analysis: MarketAnalysis): Workbook {
  const workbook = new ExcelJS.Workbook();
  buildSummarySheet(workbook, analysis);
  buildCategorySheet(workbook, analysis);
  buildGapSheet(workbook, analysis);
  buildRawSheet(workbook, analysis);
  return workbook;
}

export async function writeReport(analysis: MarketAnalysis, filePath: string): Promise<string> {
  await saveWorkbook(buildWorkbook(analysis), filePath);
  console.log(`[report] Wrote ${SHEET_NAMES.length} sheets to ${filePath}`);
  return filePath;
}
