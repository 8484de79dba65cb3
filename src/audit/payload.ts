// src/audit/payload.ts
// Validates workbooks handed over as JSON (API callers with their own parser).

import { EmptyWorkbookError, SheetMalformedError } from "./errors.js";
import { validateRow } from "./ruleEngine.js";
import type { Sheet, SheetMetadata, Workbook } from "./types.js";

function isRecord(x: unknown): x is Record<string, unknown> {
  return typeof x === "object" && x !== null && !Array.isArray(x);
}

function metaField(sheetName: string, raw: Record<string, unknown>, field: keyof SheetMetadata): string | null {
  const v = raw[field];
  if (v == null) return null;
  if (typeof v === "string") return v;
  if (typeof v === "number") return String(v);
  throw new SheetMalformedError(sheetName, `metadata.${field} must be a string`);
}

function metadataFromJson(sheetName: string, raw: unknown): SheetMetadata | undefined {
  if (raw == null) return undefined;
  if (!isRecord(raw)) throw new SheetMalformedError(sheetName, "metadata must be an object");
  return {
    systemName: metaField(sheetName, raw, "systemName"),
    date: metaField(sheetName, raw, "date"),
    time: metaField(sheetName, raw, "time"),
    performer: metaField(sheetName, raw, "performer"),
  };
}

export function workbookFromJson(raw: unknown): Workbook {
  if (!Array.isArray(raw) || raw.length === 0) throw new EmptyWorkbookError();

  return raw.map((entry: unknown, index): Sheet => {
    if (!isRecord(entry) || typeof entry.name !== "string" || !entry.name.trim()) {
      throw new SheetMalformedError(`#${index + 1}`, "sheet must be an object with a non-empty name");
    }
    const name = entry.name;
    const rows: unknown = entry.rows;
    if (!Array.isArray(rows)) throw new SheetMalformedError(name, "rows must be an array");

    return {
      name,
      rows: rows.map((row: unknown, i) => validateRow(name, row, i)),
      metadata: metadataFromJson(name, entry.metadata),
    };
  });
}
