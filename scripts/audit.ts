// scripts/audit.ts
// Usage: npm run audit -- <excel_file_path> [--out <report.md>]

import "../src/load-env.js";

import { existsSync, writeFileSync } from "node:fs";
import { dirname, join } from "node:path";

import { ENV } from "../src/env.js";
import { loadCustomerStore } from "../src/audit/configStore.js";
import { isAuditError } from "../src/audit/errors.js";
import { renderMarkdownReport } from "../src/audit/reportMarkdown.js";
import { runAuditForFile } from "../src/audit/service.js";

function reportPath(excelPath: string, now: Date): string {
  const stamp = now.toISOString().slice(0, 19).replace(/[-:]/g, "").replace("T", "_");
  const dir = ENV.AUDIT_REPORT_DIR || dirname(excelPath);
  return join(dir, `audit_report_${stamp}.md`);
}

function main(argv: string[]): number {
  const args = [...argv];
  const outIdx = args.indexOf("--out");
  const out = outIdx >= 0 ? args.splice(outIdx, 2)[1] : undefined;
  const excelPath = args[0];

  if (!excelPath) {
    console.log("Usage: npm run audit -- <excel_file_path> [--out <report.md>]");
    console.log("Example: npm run audit -- NORTHWIND_DAILY_MONITORING_20_JAN_2026.xlsx");
    return 1;
  }
  if (!existsSync(excelPath)) {
    console.error(`Error: File not found: ${excelPath}`);
    return 1;
  }

  console.log(`[audit] Auditing: ${excelPath}`);

  try {
    const store = loadCustomerStore(ENV.AUDIT_CONFIG_DIR);
    const run = runAuditForFile(excelPath, store);
    const now = new Date();

    const markdown = renderMarkdownReport(run.result, {
      fileName: run.fileName,
      generatedAt: now,
      customerId: run.customerId,
      defaultApplied: run.defaultApplied,
    });

    const target = out ?? reportPath(excelPath, now);
    writeFileSync(target, markdown, "utf-8");

    console.log("\n[RESULTS] Audit Results:");
    console.log(`   [!] Critical: ${run.result.criticalCount}`);
    console.log(`   [?] Warnings: ${run.result.warningCount}`);
    console.log(`   [+] Passed:   ${run.result.passCount}`);
    console.log(`\n[OK] Report saved to: ${target}`);
    return run.result.criticalCount > 0 ? 2 : 0;
  } catch (e) {
    if (isAuditError(e)) {
      console.error(`[audit] ${e.code}: ${e.message}`);
      return 1;
    }
    throw e;
  }
}

process.exitCode = main(process.argv.slice(2));
