// load-env.ts - Load environment variables BEFORE any other imports
import dotenv from "dotenv";
import { join } from "node:path";

const envPath = join(process.cwd(), ".env");
const envResult = dotenv.config({ path: envPath });

// Log environment loading diagnostics
console.log("[env] process.cwd() =", process.cwd());
console.log("[env] NODE_ENV =", process.env.NODE_ENV || "(not set)");
if (envResult.error) {
  // A missing .env is fine: everything has a default
  console.log("[env] No .env loaded from:", envPath);
} else {
  console.log("[env] Loaded .env from:", envPath);
}
