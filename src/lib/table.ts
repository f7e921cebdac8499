import fs from "fs";
import path from "path";
import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";
import type { CellValue, FlatRow, FlatTable } from "./types";
import { FatalError, InputError, errorMessage } from "./errors";

export function cellToString(value: CellValue): string {
  if (value === null) return "";
  if (typeof value === "boolean") return value ? "true" : "false";
  return String(value);
}

function isStringMatrix(value: unknown): value is string[][] {
  return (
    Array.isArray(value) &&
    value.every((row) => Array.isArray(row) && row.every((cell) => typeof cell === "string"))
  );
}

/** Parse CSV text into a flat table; empty cells become null. */
export function parseCsv(content: string, source = "<csv>"): FlatTable {
  let parsed: unknown;
  try {
    parsed = parse(content, {
      bom: true,
      skip_empty_lines: true,
      relax_column_count: true,
    });
  } catch (err) {
    throw new InputError(source, `invalid CSV: ${errorMessage(err)}`, { cause: err });
  }
  if (!isStringMatrix(parsed)) {
    throw new InputError(source, "invalid CSV: unexpected parser output");
  }

  const [header, ...body] = parsed;
  if (!header) return { columns: [], rows: [] };

  const columns = header.map((h) => h.trim());
  const rows = body.map((cells) => {
    const row: FlatRow = {};
    columns.forEach((column, i) => {
      const cell = cells[i];
      row[column] = cell === undefined || cell === "" ? null : cell;
    });
    return row;
  });
  return { columns, rows };
}

export function readCsv(filePath: string): FlatTable {
  let content: string;
  try {
    content = fs.readFileSync(filePath, "utf-8");
  } catch (err) {
    throw new InputError(filePath, `cannot read file: ${errorMessage(err)}`, { cause: err });
  }
  return parseCsv(content, filePath);
}

export function formatCsv(table: FlatTable): string {
  const records = table.rows.map((row) => table.columns.map((column) => cellToString(row[column] ?? null)));
  return stringify([table.columns, ...records]);
}

export function writeCsv(filePath: string, table: FlatTable): void {
  try {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, formatCsv(table), "utf-8");
  } catch (err) {
    throw new FatalError(`Cannot write ${filePath}: ${errorMessage(err)}`, { cause: err });
  }
}

export function writeJsonFile(filePath: string, data: unknown): void {
  try {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, JSON.stringify(data, null, 2) + "\n", "utf-8");
  } catch (err) {
    throw new FatalError(`Cannot write ${filePath}: ${errorMessage(err)}`, { cause: err });
  }
}

/** Column union in first-seen order; missing cells are filled with null. */
export function tableFromRows(rows: FlatRow[], columns?: string[]): FlatTable {
  const ordered = columns ? [...columns] : [];
  const seen = new Set(ordered);
  for (const row of rows) {
    for (const key of Object.keys(row)) {
      if (!seen.has(key)) {
        seen.add(key);
        ordered.push(key);
      }
    }
  }
  return {
    columns: ordered,
    rows: rows.map((row) => {
      const filled: FlatRow = {};
      for (const column of ordered) filled[column] = row[column] ?? null;
      return filled;
    }),
  };
}
