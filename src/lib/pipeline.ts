import path from "path";
import type Database from "better-sqlite3";
import type { CleanStats, QualityReport, SkippedFile } from "./types";
import type { DataDictionary } from "./data-dictionary";
import { aggregateBatches, providersCsvName } from "./aggregator";
import { cleanTable } from "./cleaner";
import { generateQualityReport, scoreProviders } from "./scoring";
import { analyzeProviders, type MarketAnalysis, type SummaryMetrics } from "./analysis/analyzer";
import { writeReport } from "./report/workbook";
import { writeDashboard } from "./report/dashboard";
import {
  isScoredTable,
  providerFromRow,
  providersToTable,
  referencesToTable,
  scoredFromRow,
  scoredToTable,
} from "./provider-rows";
import { readCsv, writeCsv, writeJsonFile } from "./table";
import { FatalError } from "./errors";
import { getDb, insertReferences, upsertProviders } from "./db";
import { profiler } from "./profiler";

export interface PipelineOptions {
  keyword: string;
  pattern: string;
  outDir: string;
  dictionary: DataDictionary;
  /** Also write providers and references to the SQLite store */
  persist?: boolean;
  database?: Database.Database;
  now?: Date;
}

export interface PipelineOutputs {
  providersCsv: string;
  cleanedCsv: string;
  referencesCsv: string;
  scoredCsv: string;
  qualityReport: string;
  workbook: string;
  dashboard: string;
}

export interface PipelineResult {
  outputs: PipelineOutputs;
  skipped: SkippedFile[];
  cleanStats: CleanStats;
  quality: QualityReport;
  summary: SummaryMetrics;
  persisted: { providers: number; references: number } | null;
}

export function pipelineOutputs(outDir: string, keyword: string): PipelineOutputs {
  return {
    providersCsv: path.join(outDir, providersCsvName(keyword)),
    cleanedCsv: path.join(outDir, `${keyword}_cleaned.csv`),
    referencesCsv: path.join(outDir, `${keyword}_references.csv`),
    scoredCsv: path.join(outDir, `${keyword}_scored.csv`),
    qualityReport: path.join(outDir, "quality_report.json"),
    workbook: path.join(outDir, `${keyword}_market_report.xlsx`),
    dashboard: path.join(outDir, `${keyword}_partner_dashboard.xlsx`),
  };
}

/** Throws when a stage leaves nothing to work on. */
export function requireProviders<T>(providers: T[], source: string): T[] {
  if (providers.length === 0) throw new FatalError(`No valid provider records in ${source}`);
  return providers;
}

/**
 * Analyze a scored or cleaned CSV and write the market report. Unscored
 * input is scored first.
 */
export async function analyzeCsv(input: string, output: string, dictionary: DataDictionary): Promise<MarketAnalysis> {
  const table = readCsv(input);
  const rows = requireProviders(table.rows, input);
  const scored = isScoredTable(table)
    ? rows.map(scoredFromRow)
    : scoreProviders(rows.map(providerFromRow), dictionary);

  const analysis = analyzeProviders(scored, dictionary.analysis);
  await writeReport(analysis, output);
  return analysis;
}

/**
 * aggregate → clean → score → analyze → reports (→ store). Stages run in
 * order and each writes its output before the next starts.
 */
export async function runPipeline(options: PipelineOptions): Promise<PipelineResult> {
  const { keyword, pattern, outDir, dictionary } = options;
  const outputs = pipelineOutputs(outDir, keyword);
  const now = options.now ?? new Date();

  console.log(`[pipeline] ${keyword}: ${pattern} → ${outDir}`);

  const aggregated = profiler.timeSync("pipeline:aggregate", () =>
    aggregateBatches({ pattern, keyword, outDir })
  );

  const cleaned = profiler.timeSync("pipeline:clean", () => {
    const result = cleanTable(aggregated.table, dictionary);
    requireProviders(result.providers, `${aggregated.table.rows.length} aggregated row(s)`);
    writeCsv(outputs.cleanedCsv, providersToTable(result.providers));
    writeCsv(outputs.referencesCsv, referencesToTable(result.references));
    return result;
  });

  const scored = profiler.timeSync("pipeline:score", () => {
    const providers = scoreProviders(cleaned.providers, dictionary);
    writeCsv(outputs.scoredCsv, scoredToTable(providers));
    return providers;
  });
  const quality = generateQualityReport(scored, now);
  writeJsonFile(outputs.qualityReport, quality);
  console.log(
    `[score] ${quality.totalProviders} provider(s), average quality ${quality.averageQuality}, ` +
      `average completeness ${quality.averageCompleteness}`
  );

  const analysis = profiler.timeSync("pipeline:analyze", () => analyzeProviders(scored, dictionary.analysis));
  await profiler.time("pipeline:report", async () => {
    await writeReport(analysis, outputs.workbook);
    await writeDashboard(cleaned.providers, cleaned.references, outputs.dashboard);
  });

  let persisted: PipelineResult["persisted"] = null;
  if (options.persist) {
    const database = options.database ?? getDb();
    persisted = profiler.timeSync("pipeline:db-write", () => ({
      providers: upsertProviders(scored, database, now),
      references: insertReferences(cleaned.references, database, now),
    }));
    console.log(`[db] Stored ${persisted.providers} provider(s), ${persisted.references} reference(s)`);
  }

  console.log(`[pipeline] Done: ${scored.length} provider(s), report at ${outputs.workbook}`);
  return {
    outputs,
    skipped: aggregated.skipped,
    cleanStats: cleaned.stats,
    quality,
    summary: analysis.summary,
    persisted,
  };
}
