// src/routes/audit.ts
import { Router, type Response } from "express";
import { existsSync } from "node:fs";
import { basename } from "node:path";

import { ENV } from "../env.js";
import { loadCustomerStore } from "../audit/configStore.js";
import { isAuditError } from "../audit/errors.js";
import { workbookFromJson } from "../audit/payload.js";
import { renderMarkdownReport } from "../audit/reportMarkdown.js";
import { RULE_ENGINE_VERSION } from "../audit/ruleEngine.js";
import { runAudit, runAuditForFile, type AuditRun } from "../audit/service.js";

function isRecord(x: unknown): x is Record<string, unknown> {
  return typeof x === "object" && x !== null && !Array.isArray(x);
}

function sendError(res: Response, e: unknown) {
  if (isAuditError(e)) {
    const status = e.code === "WORKBOOK_UNREADABLE" ? 400 : 422;
    return res.status(status).json({ ok: false, code: e.code, error: e.message });
  }
  console.error("[audit] Unexpected error:", e);
  return res.status(500).json({ ok: false, error: e instanceof Error ? e.message : "Unknown error" });
}

function sendRun(res: Response, run: AuditRun, format: unknown) {
  if (format === "markdown") {
    const markdown = renderMarkdownReport(run.result, {
      fileName: run.fileName,
      generatedAt: new Date(),
      customerId: run.customerId,
      defaultApplied: run.defaultApplied,
    });
    return res.type("text/markdown").send(markdown);
  }
  return res.json({
    ok: true,
    ruleEngineVersion: RULE_ENGINE_VERSION,
    ...run,
  });
}

const r = Router();

r.get("/customers", (_req, res) => {
  try {
    const store = loadCustomerStore(ENV.AUDIT_CONFIG_DIR);
    return res.json({ ok: true, customers: store.customers });
  } catch (e) {
    return sendError(res, e);
  }
});

// Audit a workbook already on the server's filesystem
r.post("/run", (req, res) => {
  const body: unknown = req.body;
  const excelPath = isRecord(body) && typeof body.excelPath === "string" ? body.excelPath.trim() : "";
  if (!excelPath) {
    return res.status(400).json({ ok: false, error: "excelPath is required" });
  }
  if (!existsSync(excelPath)) {
    return res.status(404).json({ ok: false, error: `File not found: ${basename(excelPath)}` });
  }

  try {
    const store = loadCustomerStore(ENV.AUDIT_CONFIG_DIR);
    const run = runAuditForFile(excelPath, store);
    return sendRun(res, run, isRecord(body) ? body.format : undefined);
  } catch (e) {
    return sendError(res, e);
  }
});

// Audit rows parsed by the caller
r.post("/evaluate", (req, res) => {
  const body: unknown = req.body;
  if (!isRecord(body)) {
    return res.status(400).json({ ok: false, error: "JSON body is required" });
  }
  const customerId = typeof body.customerId === "string" ? body.customerId : null;
  const fileName = typeof body.fileName === "string" ? body.fileName : "workbook";

  try {
    const store = loadCustomerStore(ENV.AUDIT_CONFIG_DIR);
    const run = runAudit({
      fileName,
      customerId,
      workbook: () => workbookFromJson(body.sheets),
      store,
    });
    return sendRun(res, run, body.format);
  } catch (e) {
    return sendError(res, e);
  }
});

export default r;
