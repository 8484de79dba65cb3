// src/audit/service.ts
import { basename } from "node:path";

import { auditWorkbook } from "./auditor.js";
import { resolveConfig, type CustomerStore } from "./configStore.js";
import { detectCustomer } from "./customerDetect.js";
import { readWorkbookBuffer, readWorkbookFile } from "./workbookReader.js";
import type { AuditResult, Configuration, Workbook } from "./types.js";

export type AuditRun = {
  fileName: string;
  customerId: string | null;
  defaultApplied: boolean;
  config: Configuration;
  result: AuditResult;
};

function logSummary(run: AuditRun) {
  const { result } = run;
  console.log(`[audit] ${run.fileName}:`, {
    customer: run.customerId ?? "(none)",
    defaultApplied: run.defaultApplied,
    systems: result.systems.length,
    critical: result.criticalCount,
    warnings: result.warningCount,
    passed: result.passCount,
    incomplete: result.incompleteData.length,
  });
}

/**
 * Audit an already-parsed workbook for a known (or unknown) customer.
 * Config is resolved before the workbook is touched so a broken customer
 * config fails fast.
 */
export function runAudit(args: {
  fileName: string;
  customerId: string | null;
  workbook: Workbook | (() => Workbook);
  store: CustomerStore;
}): AuditRun {
  const resolved = resolveConfig(args.customerId, args.store.configs);
  if (resolved.defaultApplied) {
    console.warn(
      args.customerId
        ? `[config] No config found for ${args.customerId}, using defaults`
        : "[config] Unknown customer, using default thresholds"
    );
  }

  const workbook = typeof args.workbook === "function" ? args.workbook() : args.workbook;
  const result = auditWorkbook(workbook, resolved.config);

  const run: AuditRun = {
    fileName: args.fileName,
    customerId: resolved.customerId,
    defaultApplied: resolved.defaultApplied,
    config: resolved.config,
    result,
  };
  logSummary(run);
  return run;
}

export function runAuditForFile(path: string, store: CustomerStore): AuditRun {
  const fileName = basename(path);
  return runAudit({
    fileName,
    customerId: detectCustomer(fileName, store.customers),
    workbook: () => readWorkbookFile(path),
    store,
  });
}

export function runAuditForBuffer(data: Buffer, fileName: string, store: CustomerStore): AuditRun {
  return runAudit({
    fileName,
    customerId: detectCustomer(fileName, store.customers),
    workbook: () => readWorkbookBuffer(data, fileName),
    store,
  });
}
