// src/server.ts

// CRITICAL: Load environment variables FIRST, before any other imports
import "./load-env.js";

import express from "express";
import cors from "cors";
import { ENV } from "./env.js";
import auditRoutes from "./routes/audit.js";
import { RULE_ENGINE_VERSION } from "./audit/ruleEngine.js";

console.log("[env] PORT=", ENV.PORT);
console.log("[env] AUDIT_CONFIG_DIR=", ENV.AUDIT_CONFIG_DIR);

process.on("unhandledRejection", (reason) => {
  console.error("UNHANDLED REJECTION:", reason);
});
process.on("uncaughtException", (err) => {
  console.error("UNCAUGHT EXCEPTION:", err);
});

const app = express();

app.set("trust proxy", 1);

// Body parsing (parsed workbooks can be large)
app.use(express.json({ limit: ENV.JSON_LIMIT }));

// Basic request logging
app.use((req, _res, next) => {
  console.log(`${req.method} ${req.path}`);
  next();
});

app.use(
  cors({
    origin: true,
    credentials: true,
  })
);

app.get("/api/health", (_req, res) => {
  res.status(200).json({
    ok: true,
    service: "daily-checks-audit-api",
    ruleEngineVersion: RULE_ENGINE_VERSION,
    pid: process.pid,
  });
});

app.use("/api/audit", auditRoutes);

app.listen(ENV.PORT, ENV.HOST, () => {
  console.log("API listening on", { host: ENV.HOST, port: ENV.PORT });
});
