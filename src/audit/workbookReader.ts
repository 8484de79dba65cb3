// src/audit/workbookReader.ts
// Turns a daily-monitoring workbook (one sheet per SAP system) into typed rows.

import * as XLSX from "xlsx";

import { WorkbookUnreadableError } from "./errors.js";
import type { CheckResponse, CheckType, Row, Sheet, SheetMetadata, Workbook } from "./types.js";

// Header block occupies rows 1-5; checks start on row 6
const METADATA_ROWS = 5;
const FIRST_DATA_ROW = 6;

// 0-indexed columns: D/E carry the Y/N answer, D-F the measured value, G the status text
const RESPONSE_COLS = [3, 4];
const NUMERIC_COLS = [3, 4, 5];
const JUSTIFICATION_COL = 6;

// Transaction sections, first match wins
const SECTION_PATTERNS: ReadonlyArray<[string, RegExp]> = [
  ["sm51", /SM51|application server.*running/i],
  ["sm50", /SM50|SM66|work process/i],
  ["smlg", /SMLG|response time/i],
  ["sm21", /SM21|system log/i],
  ["sm37", /SM37|cancelled.*job|failed.*job/i],
  ["sm12", /SM12|old lock/i],
  ["st22", /ST22|abap.*dump/i],
  ["dbacockpit", /DBACOCKPIT|database.*performance/i],
  ["sm13", /SM13|update.*monitoring|failed update/i],
  ["st02", /ST02|buffer/i],
  ["st03n", /ST03N|workload.*monitoring/i],
  ["spad", /SPAD|spool/i],
  ["sm58", /SM58|trfc/i],
  ["sost", /SOST|failed.*email/i],
  ["bop_cmc", /CMC|server.*status/i],
  ["nwa", /NWA|system overview/i],
];

type Cell = unknown;

function isBlank(v: Cell): boolean {
  return v == null || (typeof v === "string" && v.trim() === "");
}

const pad2 = (n: number) => String(n).padStart(2, "0");

// Spreadsheet dates carry no zone: read them back in the components they were typed in
function fmtDate(d: Date): string {
  return `${d.getFullYear()}-${pad2(d.getMonth() + 1)}-${pad2(d.getDate())}`;
}

function fmtTime(d: Date): string {
  return `${pad2(d.getHours())}:${pad2(d.getMinutes())}:${pad2(d.getSeconds())}`;
}

// Serial day 0 is 1899-12-30; UTC arithmetic keeps the machine zone out of it
const SERIAL_EPOCH_MS = Date.UTC(1899, 11, 30);

function serialParts(serial: number): { date: string; time: string } {
  const d = new Date(SERIAL_EPOCH_MS + Math.round(serial * 86400) * 1000);
  return {
    date: `${d.getUTCFullYear()}-${pad2(d.getUTCMonth() + 1)}-${pad2(d.getUTCDate())}`,
    time: `${pad2(d.getUTCHours())}:${pad2(d.getUTCMinutes())}:${pad2(d.getUTCSeconds())}`,
  };
}

function cellString(v: Cell): string {
  if (v == null) return "";
  if (v instanceof Date) return `${fmtDate(v)} ${fmtTime(v)}`;
  return String(v);
}

function rowText(cells: Cell[]): string {
  return cells
    .filter((c) => !isBlank(c))
    .map(cellString)
    .map((s) => s.trim())
    .join(" ");
}

export function identifySection(text: string): string | null {
  for (const [section, re] of SECTION_PATTERNS) {
    if (re.test(text)) return section;
  }
  return null;
}

export function classifyRow(text: string, section: string | null): CheckType {
  const t = text.toLowerCase();

  if (t.includes("cpicerr") || t.includes("sysfail")) return "tRFC";
  if (t.includes("failed update")) return "SM13";
  if (t.includes("old lock")) return "Locks";
  if (t.includes("dump") && t.includes("today")) return "DumpsToday";
  if (t.includes("dump") && t.includes("yesterday")) return "DumpsYesterday";
  if (/resp(\.|onse)? time/.test(t)) return "ResponseTime";
  if (/(cancell?ed|failed).*job/.test(t)) return "FailedJobs";
  if (section === "sm58") return "tRFC";
  return "Other";
}

function readResponse(cells: Cell[]): CheckResponse {
  const answers = RESPONSE_COLS.map((i) => cellString(cells[i]).trim().toUpperCase());
  if (answers.includes("N")) return "N";
  if (answers.includes("Y")) return "Y";
  return "";
}

/**
 * Numbers as entered by offshore teams: native numerics, or strings with a
 * decimal comma and stray spaces ("1 250,5"). Blank cells are not zero.
 */
export function toMetric(v: Cell): number | null {
  if (typeof v === "number") return Number.isFinite(v) ? v : null;
  if (typeof v !== "string") return null;
  const cleaned = v.replace(/,/g, ".").replace(/\s+/g, "");
  if (!/^[-+]?\d+(\.\d+)?$/.test(cleaned)) return null;
  const n = Number(cleaned);
  return Number.isFinite(n) ? n : null;
}

function readMetric(cells: Cell[]): number | null {
  for (const i of NUMERIC_COLS) {
    const n = toMetric(cells[i]);
    if (n != null) return n;
  }
  return null;
}

function fmtMetaValue(v: Cell, kind: "date" | "time" | "text"): string | null {
  if (isBlank(v)) return null;
  if (v instanceof Date) {
    if (kind === "date") return fmtDate(v);
    if (kind === "time") return fmtTime(v);
    return cellString(v);
  }
  // Date and time cells arrive as serial numbers
  if (typeof v === "number" && kind !== "text" && Number.isFinite(v) && v >= 0) {
    const parts = serialParts(v);
    return kind === "date" ? parts.date : parts.time;
  }
  const s = String(v).trim();
  if (kind === "date" && /^\d{4}-\d{2}-\d{2}[ T]/.test(s)) return s.slice(0, 10);
  return s;
}

export function extractMetadata(grid: Cell[][]): SheetMetadata {
  let systemName: string | null = null;
  let date: string | null = null;
  let time: string | null = null;
  let performer: string | null = null;

  for (const cells of grid.slice(0, METADATA_ROWS)) {
    const label = cellString(cells[0]).trim().toLowerCase();
    const value = cells[1];
    if (!label) continue;

    if (label.includes("system name")) systemName = fmtMetaValue(value, "text");
    else if (label.includes("date")) date = fmtMetaValue(value, "date");
    else if (label.includes("time")) time = fmtMetaValue(value, "time");
    else if (label.includes("performed by")) performer = fmtMetaValue(value, "text");
  }

  return { systemName, date, time, performer };
}

/**
 * Grid of cell values where grid[0] is sheet row 1 and grid[r][0] is column A,
 * regardless of where the sheet's used range starts.
 */
function sheetGrid(ws: XLSX.WorkSheet): Cell[][] {
  const ref = ws["!ref"];
  if (!ref) return [];
  const range = XLSX.utils.decode_range(ref);

  const body = XLSX.utils.sheet_to_json<Cell[]>(ws, {
    header: 1,
    defval: null,
    blankrows: true,
    raw: true,
  });

  const leadingRows: Cell[][] = Array.from({ length: range.s.r }, () => []);
  const leadingCols: Cell[] = new Array<Cell>(range.s.c).fill(null);
  return [...leadingRows, ...body.map((cells) => [...leadingCols, ...cells])];
}

/** Rows in the parsed grid form; `grid[0]` is sheet row 1. */
export function parseRows(grid: Cell[][]): Row[] {
  const rows: Row[] = [];
  let section: string | null = null;

  for (let idx = FIRST_DATA_ROW - 1; idx < grid.length; idx++) {
    const cells = grid[idx] ?? [];
    if (cells.every(isBlank)) continue;

    const text = rowText(cells);
    section = identifySection(text) ?? section;

    rows.push({
      rowNumber: idx + 1,
      checkResponse: readResponse(cells),
      justification: cellString(cells[JUSTIFICATION_COL]),
      numericMetric: readMetric(cells),
      checkType: classifyRow(text, section),
      text,
    });
  }

  return rows;
}

export function parseSheet(name: string, ws: XLSX.WorkSheet): Sheet {
  const grid = sheetGrid(ws);
  return { name, rows: parseRows(grid), metadata: extractMetadata(grid) };
}

export function parseWorkbook(wb: XLSX.WorkBook): Workbook {
  return wb.SheetNames.flatMap((name) => {
    const ws = wb.Sheets[name];
    return ws ? [parseSheet(name, ws)] : [];
  });
}

export function readWorkbookFile(path: string): Workbook {
  let wb: XLSX.WorkBook;
  try {
    wb = XLSX.readFile(path);
  } catch (err) {
    throw new WorkbookUnreadableError(path, err);
  }
  console.log(`[xlsx] Loaded ${path} (${wb.SheetNames.length} sheet(s))`);
  return parseWorkbook(wb);
}

export function readWorkbookBuffer(data: Buffer, label: string): Workbook {
  let wb: XLSX.WorkBook;
  try {
    wb = XLSX.read(data, { type: "buffer" });
  } catch (err) {
    throw new WorkbookUnreadableError(label, err);
  }
  return parseWorkbook(wb);
}
