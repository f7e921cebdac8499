import fs from "fs";
import path from "path";
import fg from "fast-glob";
import { PROVIDER_COLUMNS, type AggregateResult, type CellValue, type FlatRow, type FlatTable, type RawProviderRecord, type SkippedFile } from "./types";
import { FatalError, InputError, errorMessage } from "./errors";
import { tableFromRows, writeCsv } from "./table";

const CANONICAL_ORDER = new Map<string, number>(PROVIDER_COLUMNS.map((c, i) => [c, i]));

export const LIST_JOINER = "; ";

/** Known canonical columns in canonical order, then everything else sorted. */
export function orderColumns(columns: Iterable<string>): string[] {
  const unique = [...new Set(columns)];
  const known = unique
    .filter((c) => CANONICAL_ORDER.has(c))
    .sort((a, b) => (CANONICAL_ORDER.get(a) ?? 0) - (CANONICAL_ORDER.get(b) ?? 0));
  const rest = unique.filter((c) => !CANONICAL_ORDER.has(c)).sort();
  return [...known, ...rest];
}

function isScalar(value: unknown): value is string | number | boolean | null {
  return value === null || ["string", "number", "boolean"].includes(typeof value);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Flatten one raw value into a single cell. */
export function flattenValue(value: unknown): CellValue {
  if (value === undefined || value === null) return null;
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value === "string" || typeof value === "boolean") return value;
  if (Array.isArray(value)) {
    if (value.every(isScalar)) {
      const parts = value.filter((v) => v !== null).map(String);
      return parts.length > 0 ? parts.join(LIST_JOINER) : null;
    }
    return JSON.stringify(value);
  }
  if (isPlainObject(value)) return JSON.stringify(value);
  return String(value);
}

export function flattenRecord(record: RawProviderRecord, sourceBatch: string): FlatRow {
  const row: FlatRow = {};
  for (const [key, value] of Object.entries(record)) {
    row[key] = flattenValue(value);
  }
  row.source_batch = sourceBatch;
  return row;
}

/**
 * Read the provider records out of a batch file's JSON text. Accepts a bare
 * array or an object with a `providers` (or `partners`) array.
 */
export function parseBatch(content: string, file: string): RawProviderRecord[] {
  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (err) {
    throw new InputError(file, `invalid JSON: ${errorMessage(err)}`, { cause: err });
  }

  let items: unknown[];
  if (Array.isArray(data)) {
    items = data;
  } else if (isPlainObject(data) && Array.isArray(data.providers)) {
    items = data.providers;
  } else if (isPlainObject(data) && Array.isArray(data.partners)) {
    items = data.partners;
  } else {
    throw new InputError(file, "expected an array of records or an object with a providers array");
  }

  return items.filter(isPlainObject);
}

export function buildTable(rows: FlatRow[]): FlatTable {
  return tableFromRows(rows, orderColumns(rows.flatMap((row) => Object.keys(row))));
}

/** Union of two flat tables: rows of `a` then `b`, columns unioned, gaps null. */
export function mergeTables(a: FlatTable, b: FlatTable): FlatTable {
  return tableFromRows([...a.rows, ...b.rows], orderColumns([...a.columns, ...b.columns]));
}

export interface AggregateOptions {
  pattern: string;
  keyword: string;
  /** Directory for `<keyword>_providers.csv`; nothing is written when omitted */
  outDir?: string;
}

export function providersCsvName(keyword: string): string {
  return `${keyword}_providers.csv`;
}

/**
 * Merge every batch file matching `pattern` into one flat table.
 * Bad files are skipped and reported; no files or no records is fatal.
 */
export function aggregateBatches(options: AggregateOptions): AggregateResult {
  const files = fg.sync(options.pattern, { onlyFiles: true }).sort();
  if (files.length === 0) {
    throw new FatalError(`No batch files match ${options.pattern}`);
  }
  console.log(`[aggregate] ${files.length} batch file(s) match ${options.pattern}`);

  const skipped: SkippedFile[] = [];
  const rows: FlatRow[] = [];

  for (const file of files) {
    try {
      const records = parseBatch(fs.readFileSync(file, "utf-8"), file);
      const batch = path.basename(file);
      for (const record of records) rows.push(flattenRecord(record, batch));
      console.log(`[aggregate] ${batch}: ${records.length} record(s)`);
    } catch (err) {
      const reason = err instanceof InputError ? err.reason : errorMessage(err);
      skipped.push({ file, reason });
      console.warn(`[aggregate] Skipping ${file}: ${reason}`);
    }
  }

  if (rows.length === 0) {
    throw new FatalError(`No valid records in ${files.length} batch file(s) matching ${options.pattern}`);
  }

  const table = buildTable(rows);
  let outputPath: string | null = null;
  if (options.outDir) {
    outputPath = path.join(options.outDir, providersCsvName(options.keyword));
    writeCsv(outputPath, table);
  }

  console.log(
    `[aggregate] ${table.rows.length} row(s), ${table.columns.length} column(s) from ` +
      `${files.length - skipped.length} file(s), ${skipped.length} skipped` +
      (outputPath ? ` → ${outputPath}` : "")
  );
  return { table, files, skipped, outputPath };
}
