// src/env.ts
import { join } from "node:path";

function opt(name: string, fallback = "") {
  return process.env[name] || fallback;
}

function num(name: string, fallback: number) {
  const raw = opt(name);
  if (!raw) return fallback;
  const n = Number(raw);
  if (!Number.isFinite(n)) throw new Error(`Env var ${name} must be a number (got "${raw}")`);
  return n;
}

export const ENV = {
  NODE_ENV: opt("NODE_ENV", "development"),

  // Server
  PORT: num("PORT", 8080),
  HOST: opt("HOST", "0.0.0.0"),
  JSON_LIMIT: opt("JSON_LIMIT", "5mb"),

  // Customer threshold configs (<ID>_config.json)
  AUDIT_CONFIG_DIR: opt("AUDIT_CONFIG_DIR", join(process.cwd(), "configs")),

  // Where the CLI writes markdown reports when no --out is given ("" = next to the workbook)
  AUDIT_REPORT_DIR: opt("AUDIT_REPORT_DIR", ""),
} as const;
