// src/audit/auditor.ts
import { AuditError, EmptyWorkbookError, SheetMalformedError } from "./errors.js";
import { evaluateSheet } from "./ruleEngine.js";
import {
  EMPTY_METADATA,
  type AuditResult,
  type Configuration,
  type Finding,
  type IncompleteDataNote,
  type Row,
  type SheetEvaluation,
  type SheetMetadata,
  type Workbook,
} from "./types.js";

function evaluateStrict(name: string, rows: readonly Row[], config: Configuration): SheetEvaluation {
  try {
    return evaluateSheet(name, rows, config);
  } catch (err) {
    if (err instanceof AuditError) throw err;
    const detail = err instanceof Error ? err.message : String(err);
    throw new SheetMalformedError(name, detail);
  }
}

/**
 * Audit every sheet of a workbook, in the order supplied.
 * All-or-nothing: one malformed sheet fails the whole audit.
 */
export function auditWorkbook(workbook: Workbook, config: Configuration): AuditResult {
  if (!Array.isArray(workbook) || workbook.length === 0) {
    throw new EmptyWorkbookError();
  }

  const systems: string[] = [];
  const findings: Finding[] = [];
  const incompleteData: IncompleteDataNote[] = [];
  const metadata: Record<string, SheetMetadata> = {};

  workbook.forEach((sheet, index) => {
    const name = typeof sheet?.name === "string" ? sheet.name : `#${index + 1}`;
    if (typeof sheet?.name !== "string" || !sheet.name.trim()) {
      throw new SheetMalformedError(name, "sheet name must be a non-empty string");
    }
    if (systems.includes(name)) {
      throw new SheetMalformedError(name, "duplicate sheet name");
    }
    if (!Array.isArray(sheet.rows)) {
      throw new SheetMalformedError(name, "rows must be an array");
    }

    const evaluation = evaluateStrict(name, sheet.rows, config);
    systems.push(name);
    findings.push(...evaluation.findings);
    incompleteData.push(...evaluation.incompleteData);
    // Own key even for a sheet named "__proto__"
    Object.defineProperty(metadata, name, {
      value: sheet.metadata ?? EMPTY_METADATA,
      enumerable: true,
      writable: true,
      configurable: true,
    });
  });

  return {
    systems,
    findings,
    criticalCount: findings.filter((f) => f.severity === "critical").length,
    warningCount: findings.filter((f) => f.severity === "warning").length,
    passCount: findings.filter((f) => f.severity === "pass").length,
    incompleteData,
    metadata,
  };
}
