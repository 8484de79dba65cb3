// src/audit/reportMarkdown.ts
import type { AuditResult, Finding } from "./types.js";

export type ReportOptions = {
  fileName: string;
  generatedAt: Date;
  customerId?: string | null;
  defaultApplied?: boolean;
};

function fmtTimestamp(d: Date): string {
  return d.toISOString().slice(0, 19).replace("T", " ");
}

function bySeverity(findings: readonly Finding[], severity: Finding["severity"]) {
  return findings.filter((f) => f.severity === severity);
}

export function renderMarkdownReport(result: AuditResult, opts: ReportOptions): string {
  const out: string[] = [];
  const issueCount = result.criticalCount + result.warningCount;

  out.push(`# Audit Report - ${opts.fileName}\n`);
  out.push(`**Generated**: ${fmtTimestamp(opts.generatedAt)}\n`);

  if (opts.customerId && !opts.defaultApplied) {
    out.push(`**Customer configuration**: ${opts.customerId}\n`);
  } else {
    out.push(`**Customer configuration**: default thresholds\n`);
  }

  // --- Executive summary
  out.push("## Executive Summary\n");
  out.push(`- **Systems Checked**: ${result.systems.length}`);
  out.push(`- **Total Issues**: ${issueCount}`);
  out.push(`- **Critical**: ${result.criticalCount} | **Warnings**: ${result.warningCount} | **Passed**: ${result.passCount}`);
  if (result.incompleteData.length) {
    out.push(`- **Incomplete data**: ${result.incompleteData.length} check(s) without a value`);
  }
  out.push("");

  if (issueCount === 0) {
    out.push("> **All checks passed validation!**\n");
  }

  // --- Metadata
  out.push("## Check Metadata\n");
  out.push("| System | Date | Time | Performed By |");
  out.push("|--------|------|------|--------------|");
  for (const system of result.systems) {
    const meta = result.metadata[system];
    out.push(`| ${system} | ${meta?.date ?? "N/A"} | ${meta?.time ?? "N/A"} | ${meta?.performer ?? "N/A"} |`);
  }
  out.push("");

  // --- Per-system breakdown
  out.push("## Per-System Findings\n");

  for (const system of result.systems) {
    const sheetFindings = result.findings.filter((f) => f.system === system);
    const critical = bySeverity(sheetFindings, "critical");
    const warnings = bySeverity(sheetFindings, "warning");
    const passed = bySeverity(sheetFindings, "pass");

    if (!critical.length && !warnings.length) {
      out.push(`### [OK] ${system}\n`);
      out.push(
        passed.length
          ? `All checks passed validation (${passed.length} justified exception(s)).\n`
          : "All checks passed validation.\n"
      );
      continue;
    }

    out.push(`### ${critical.length ? "[CRITICAL]" : "[WARNING]"} ${system}\n`);
    out.push(
      `**Issues Found**: ${critical.length + warnings.length} (${critical.length} critical, ${warnings.length} warnings)\n`
    );

    if (critical.length) {
      out.push("#### Critical Issues\n");
      for (const f of critical) out.push(`- **Row ${f.rowNumber}** [${f.ruleId}]: ${f.message}`);
      out.push("");
    }
    if (warnings.length) {
      out.push("#### Warnings\n");
      for (const f of warnings) out.push(`- **Row ${f.rowNumber}** [${f.ruleId}]: ${f.message}`);
      out.push("");
    }
  }

  if (result.incompleteData.length) {
    out.push("## Incomplete Data\n");
    for (const n of result.incompleteData) {
      out.push(`- **${n.system}** Row ${n.rowNumber} [${n.ruleId}]: ${n.message}`);
    }
    out.push("");
  }

  // --- Recommendations
  if (issueCount > 0) {
    out.push("## Recommendations\n");
    if (result.criticalCount > 0) {
      out.push("### Immediate Actions Required\n");
      out.push("1. Review all **critical** issues - these require immediate attention");
      out.push("2. Ensure negative responses have proper justifications with ticket numbers if applicable");
      out.push("3. Follow up with the team member who performed the checks\n");
    }
    if (result.warningCount > 0) {
      out.push("### Follow-up Items\n");
      out.push("1. Review warning items for potential issues");
      out.push("2. Consider adjusting thresholds if warnings are expected behavior");
      out.push("3. Document any recurring patterns for process improvement\n");
    }
  }

  return out.join("\n");
}
