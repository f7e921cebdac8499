import fs from "fs";
import path from "path";
import type { Cell, CellValue, Workbook, Worksheet } from "exceljs";
import { FatalError, errorMessage } from "../errors";

const HEADER_FILL = "FF1F4E78";
const HEADER_FONT = "FFFFFFFF";
const MAX_COLUMN_WIDTH = 50;
const MIN_COLUMN_WIDTH = 10;

export const PERCENT = "0.0%";
export const CURRENCY = "$#,##0.00";
export const SCORE = "0.00";
export const DECIMAL = "0.0";

export interface ColumnSpec {
  header: string;
  numFmt?: string;
}

function styleHeader(ws: Worksheet, rowNumber: number): void {
  ws.getRow(rowNumber).eachCell((cell: Cell) => {
    cell.font = { bold: true, color: { argb: HEADER_FONT } };
    cell.fill = { type: "pattern", pattern: "solid", fgColor: { argb: HEADER_FILL } };
    cell.alignment = { vertical: "middle" };
  });
}

/** Styled header row plus data rows; returns the header's row number. */
export function addTable(ws: Worksheet, columns: ColumnSpec[], rows: CellValue[][]): number {
  const headerRow = ws.addRow(columns.map((c) => c.header));
  styleHeader(ws, headerRow.number);
  for (const values of rows) {
    const row = ws.addRow(values);
    columns.forEach((column, i) => {
      if (column.numFmt) row.getCell(i + 1).numFmt = column.numFmt;
    });
  }
  return headerRow.number;
}

function cellText(value: CellValue): string {
  if (value === null || value === undefined) return "";
  if (typeof value === "number") return value.toFixed(2);
  return String(value);
}

export function fitColumns(ws: Worksheet): void {
  for (let i = 1; i <= ws.columnCount; i++) {
    const column = ws.getColumn(i);
    let longest = 0;
    column.eachCell({ includeEmpty: false }, (cell: Cell) => {
      longest = Math.max(longest, cellText(cell.value).length);
    });
    column.width = Math.min(Math.max(longest + 2, MIN_COLUMN_WIDTH), MAX_COLUMN_WIDTH);
  }
}

/** Worksheet with its first row frozen. */
export function addSheet(workbook: Workbook, name: string): Worksheet {
  return workbook.addWorksheet(name, { views: [{ state: "frozen", ySplit: 1 }] });
}

/** A filterable data sheet: one header row, one row per record. */
export function addDataSheet(workbook: Workbook, name: string, columns: ColumnSpec[], rows: CellValue[][]): Worksheet {
  const ws = addSheet(workbook, name);
  addTable(ws, columns, rows);
  ws.autoFilter = { from: { row: 1, column: 1 }, to: { row: 1, column: columns.length } };
  fitColumns(ws);
  return ws;
}

export async function saveWorkbook(workbook: Workbook, filePath: string): Promise<void> {
  try {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    await workbook.xlsx.writeFile(filePath);
  } catch (err) {
    throw new FatalError(`Cannot write report ${filePath}: ${errorMessage(err)}`, { cause: err });
  }
}
