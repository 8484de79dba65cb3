// src/audit/ruleEngine.ts
import { SheetMalformedError } from "./errors.js";
import {
  CHECK_TYPES,
  type CheckResponse,
  type CheckType,
  type Configuration,
  type Finding,
  type IncompleteDataNote,
  type Row,
  type RuleId,
  type Severity,
  type SheetEvaluation,
} from "./types.js";

export const RULE_ENGINE_VERSION = "2026-10-19";

const TRFC_ERROR_CODES = ["CPICERR", "SYSFAIL"] as const;

// Small stable hash (for deterministic finding ids)
function hashString(s: string): string {
  let h = 2166136261;
  for (let i = 0; i < s.length; i++) {
    h ^= s.charCodeAt(i);
    h = Math.imul(h, 16777619);
  }
  return (h >>> 0).toString(16);
}

function makeFindingId(system: string, rowNumber: number, ruleId: RuleId) {
  return `${ruleId}:${hashString(`${system}|${rowNumber}|${ruleId}`)}`;
}

function isRecord(x: unknown): x is Record<string, unknown> {
  return typeof x === "object" && x !== null && !Array.isArray(x);
}

function isCheckType(x: unknown): x is CheckType {
  return typeof x === "string" && (CHECK_TYPES as readonly string[]).includes(x);
}

function isCheckResponse(x: unknown): x is CheckResponse {
  return x === "Y" || x === "N" || x === "";
}

/**
 * Structural check of one row as handed over by the parsing layer (or an API
 * caller). Throws SheetMalformedError rather than guessing.
 */
export function validateRow(sheetName: string, raw: unknown, index: number): Row {
  if (!isRecord(raw)) {
    throw new SheetMalformedError(sheetName, "row is not an object", index);
  }
  const { rowNumber, checkResponse, justification, numericMetric, checkType, text } = raw;

  if (typeof rowNumber !== "number" || !Number.isInteger(rowNumber) || rowNumber < 1) {
    throw new SheetMalformedError(sheetName, "rowNumber must be a positive integer", index);
  }
  if (!isCheckResponse(checkResponse)) {
    throw new SheetMalformedError(sheetName, `checkResponse must be "Y", "N" or "" (row ${rowNumber})`, index);
  }
  if (typeof justification !== "string") {
    throw new SheetMalformedError(sheetName, `justification must be a string (row ${rowNumber})`, index);
  }
  let metric: number | null = null;
  if (numericMetric != null) {
    if (typeof numericMetric !== "number" || !Number.isFinite(numericMetric)) {
      throw new SheetMalformedError(sheetName, `numericMetric must be a finite number or null (row ${rowNumber})`, index);
    }
    metric = numericMetric;
  }
  if (!isCheckType(checkType)) {
    throw new SheetMalformedError(sheetName, `unknown checkType ${JSON.stringify(checkType)} (row ${rowNumber})`, index);
  }
  if (text !== undefined && typeof text !== "string") {
    throw new SheetMalformedError(sheetName, `text must be a string (row ${rowNumber})`, index);
  }

  return {
    rowNumber,
    checkResponse,
    justification,
    numericMetric: metric,
    checkType,
    text: typeof text === "string" ? text : "",
  };
}

// \s also covers the non-breaking space left in "empty" exported cells
export function hasJustification(justification: string): boolean {
  return justification.replace(/\s+/g, "").length > 0;
}

type NumericRule = {
  ruleId: RuleId;
  severity: Exclude<Severity, "pass">;
  label: string;
  // A justification downgrades the finding to pass
  justifiable: boolean;
  triggered: (value: number) => boolean;
  message: (value: number, justified: boolean) => string;
};

function numericRuleFor(checkType: CheckType, config: Configuration): NumericRule | null {
  switch (checkType) {
    case "SM13":
      return {
        ruleId: "failed_update_nonzero",
        severity: "critical",
        label: "failed updates (SM13)",
        justifiable: false,
        triggered: (v) => v > 0,
        message: (v) => `Failed updates detected: ${v}`,
      };
    case "ResponseTime":
      return {
        ruleId: "response_time_exceeded",
        severity: "warning",
        label: "response time",
        justifiable: true,
        triggered: (v) => v > config.responseTimeMaxMs,
        message: (v) => `Response time ${v}ms exceeds ${config.responseTimeMaxMs}ms threshold`,
      };
    case "DumpsToday":
      return {
        ruleId: "dumps_today_high",
        severity: "warning",
        label: "dumps today",
        justifiable: true,
        triggered: (v) => v > config.dumpsTodayMax,
        message: (v) => `High dump count today: ${v} (threshold: ${config.dumpsTodayMax})`,
      };
    case "DumpsYesterday":
      return {
        ruleId: "dumps_yesterday_high",
        severity: "warning",
        label: "dumps yesterday",
        justifiable: true,
        triggered: (v) => v > config.dumpsYesterdayMax,
        message: (v) => `High dump count yesterday: ${v} (threshold: ${config.dumpsYesterdayMax})`,
      };
    case "FailedJobs":
      return {
        ruleId: "failed_jobs_high",
        severity: "warning",
        label: "failed jobs",
        justifiable: true,
        triggered: (v) => v > config.failedJobsMax,
        message: (v) => `High number of failed jobs: ${v} (threshold: ${config.failedJobsMax})`,
      };
    case "Locks":
      // Gated on any lock at all; oldLocksMax is context for the reader only.
      return {
        ruleId: "old_locks_unexplained",
        severity: "warning",
        label: "old locks",
        justifiable: true,
        triggered: (v) => v > 0,
        message: (v, justified) =>
          `Old locks present (${v})${justified ? "" : " without explanation"} (configured max: ${config.oldLocksMax})`,
      };
    case "tRFC":
    case "Other":
      return null;
    default: {
      const unreachable: never = checkType;
      throw new Error(`Unhandled check type: ${String(unreachable)}`);
    }
  }
}

function detectTrfcErrors(text: string): string[] {
  const upper = text.toUpperCase();
  return TRFC_ERROR_CODES.filter((code) => upper.includes(code));
}

/**
 * Evaluate one system sheet. Findings come out in row order, and within a
 * row in rule precedence order (see RULE_IDS).
 */
export function evaluateSheet(
  sheetName: string,
  rows: readonly Row[],
  config: Configuration
): SheetEvaluation {
  const findings: Finding[] = [];
  const incompleteData: IncompleteDataNote[] = [];
  const enabled = new Set<RuleId>(config.enabledRules);

  const push = (row: Row, ruleId: RuleId, severity: Severity, message: string) => {
    findings.push(
      Object.freeze({
        id: makeFindingId(sheetName, row.rowNumber, ruleId),
        severity,
        system: sheetName,
        rowNumber: row.rowNumber,
        checkType: row.checkType,
        ruleId,
        message,
      })
    );
  };

  rows.forEach((raw, index) => {
    const row = validateRow(sheetName, raw, index);
    const justified = hasJustification(row.justification);
    const justificationText = row.justification.trim();

    // 1) Negative answer must carry a justification
    if (row.checkResponse === "N" && enabled.has("missing_justification")) {
      if (justified) {
        push(row, "missing_justification", "pass", `Negative (N) response justified: "${justificationText}"`);
      } else {
        push(row, "missing_justification", "critical", "Negative (N) response without justification");
      }
    }

    // 2) tRFC error codes in the row text; a recorded count of 0 is healthy
    if (row.checkType === "tRFC" && enabled.has("trfc_error")) {
      const codes = detectTrfcErrors(row.text);
      if (codes.length && (row.numericMetric == null || row.numericMetric > 0)) {
        push(row, "trfc_error", "critical", `tRFC errors detected (${codes.join(", ")})`);
      }
    }

    // 3) Numeric threshold rules
    const rule = numericRuleFor(row.checkType, config);
    if (!rule || !enabled.has(rule.ruleId)) return;

    if (row.numericMetric == null) {
      incompleteData.push(
        Object.freeze({
          system: sheetName,
          rowNumber: row.rowNumber,
          checkType: row.checkType,
          ruleId: rule.ruleId,
          message: `No numeric value recorded for ${rule.label}; check not evaluated`,
        })
      );
      return;
    }

    const value = row.numericMetric;
    if (!rule.triggered(value)) return;

    if (rule.justifiable && justified) {
      push(row, rule.ruleId, "pass", `${rule.message(value, true)}; justified: "${justificationText}"`);
    } else {
      push(row, rule.ruleId, rule.severity, rule.message(value, false));
    }
  });

  return { findings, incompleteData };
}
