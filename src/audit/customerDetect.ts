// src/audit/customerDetect.ts
import { basename, extname } from "node:path";

import type { CustomerMatcher } from "./configStore.js";

function fileStem(fileName: string): string {
  const base = basename(fileName);
  return base.slice(0, base.length - extname(base).length).toUpperCase();
}

/**
 * Detect the customer from a report file name.
 * Prefix matches win over alias (contains) matches; customers are tried in store order.
 */
export function detectCustomer(fileName: string, customers: readonly CustomerMatcher[]): string | null {
  const stem = fileStem(fileName);
  if (!stem) return null;

  for (const c of customers) {
    if (c.prefixes.some((p) => stem.startsWith(p))) return c.customerId;
  }
  for (const c of customers) {
    if (c.aliases.some((a) => stem.includes(a))) return c.customerId;
  }
  return null;
}
