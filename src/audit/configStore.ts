// src/audit/configStore.ts
import { existsSync, readdirSync, readFileSync } from "node:fs";
import { join } from "node:path";

import { ConfigMalformedError } from "./errors.js";
import { RULE_IDS, type Configuration, type ResolvedConfiguration, type RuleId } from "./types.js";

const THRESHOLD_FIELDS = [
  "responseTimeMaxMs",
  "dumpsTodayMax",
  "dumpsYesterdayMax",
  "failedJobsMax",
  "oldLocksMax",
] as const;

type ThresholdField = (typeof THRESHOLD_FIELDS)[number];

export const DEFAULT_CONFIG: Configuration = Object.freeze({
  responseTimeMaxMs: 1000,
  dumpsTodayMax: 25,
  dumpsYesterdayMax: 40,
  failedJobsMax: 5,
  oldLocksMax: 10,
  enabledRules: Object.freeze([...RULE_IDS]),
});

export type CustomerMatcher = {
  customerId: string;
  // File stem must start with one of these
  prefixes: string[];
  // File stem must contain one of these (renamed companies etc.)
  aliases: string[];
};

export type CustomerStore = {
  configs: Record<string, unknown>;
  customers: CustomerMatcher[];
};

const CONFIG_FILE_RE = /^(.+)_config\.json$/i;

function isRecord(x: unknown): x is Record<string, unknown> {
  return typeof x === "object" && x !== null && !Array.isArray(x);
}

function isRuleId(x: unknown): x is RuleId {
  return typeof x === "string" && (RULE_IDS as readonly string[]).includes(x);
}

function cleanThreshold(customerId: string, raw: Record<string, unknown>, field: ThresholdField): number {
  const v = raw[field];
  if (v === undefined || v === null) {
    throw new ConfigMalformedError(customerId, field, "is missing");
  }
  if (typeof v !== "number" || !Number.isFinite(v)) {
    throw new ConfigMalformedError(customerId, field, `must be a number (got ${JSON.stringify(v)})`);
  }
  if (v < 0) {
    throw new ConfigMalformedError(customerId, field, `must be non-negative (got ${v})`);
  }
  return v;
}

function cleanEnabledRules(customerId: string, raw: unknown): readonly RuleId[] {
  if (raw === undefined) return DEFAULT_CONFIG.enabledRules;
  if (!Array.isArray(raw)) {
    throw new ConfigMalformedError(customerId, "enabledRules", "must be an array of rule ids");
  }
  const out: RuleId[] = [];
  for (const id of raw) {
    if (!isRuleId(id)) {
      throw new ConfigMalformedError(customerId, "enabledRules", `contains unknown rule ${JSON.stringify(id)}`);
    }
    if (!out.includes(id)) out.push(id);
  }
  return Object.freeze(out);
}

/**
 * Validates a stored customer config. Every threshold is required; a stored
 * config that is present but broken is an error, never a silent default.
 */
export function cleanConfig(customerId: string, raw: unknown): Configuration {
  if (!isRecord(raw)) {
    throw new ConfigMalformedError(customerId, "(root)", "must be an object");
  }
  return Object.freeze({
    responseTimeMaxMs: cleanThreshold(customerId, raw, "responseTimeMaxMs"),
    dumpsTodayMax: cleanThreshold(customerId, raw, "dumpsTodayMax"),
    dumpsYesterdayMax: cleanThreshold(customerId, raw, "dumpsYesterdayMax"),
    failedJobsMax: cleanThreshold(customerId, raw, "failedJobsMax"),
    oldLocksMax: cleanThreshold(customerId, raw, "oldLocksMax"),
    enabledRules: cleanEnabledRules(customerId, raw.enabledRules),
  });
}

function findStoredKey(configs: Record<string, unknown>, customerId: string): string | null {
  const wanted = customerId.trim().toUpperCase();
  if (!wanted) return null;
  for (const key of Object.keys(configs)) {
    if (key.toUpperCase() === wanted) return key;
  }
  return null;
}

export function resolveConfig(
  customerId: string | null | undefined,
  configs: Record<string, unknown>
): ResolvedConfiguration {
  const key = customerId ? findStoredKey(configs, customerId) : null;
  if (key == null) {
    return { customerId: customerId ?? null, config: DEFAULT_CONFIG, defaultApplied: true };
  }
  return { customerId: key, config: cleanConfig(key, configs[key]), defaultApplied: false };
}

function stringList(customerId: string, field: string, v: unknown): string[] {
  if (v === undefined) return [];
  if (!Array.isArray(v) || !v.every((x): x is string => typeof x === "string")) {
    throw new ConfigMalformedError(customerId, field, "must be an array of strings");
  }
  return v.map((s) => s.trim().toUpperCase()).filter(Boolean);
}

function matcherFor(customerId: string, raw: unknown): CustomerMatcher {
  const match: Record<string, unknown> = isRecord(raw) && isRecord(raw.match) ? raw.match : {};
  const prefixes = stringList(customerId, "match.prefixes", match.prefixes);
  return {
    customerId,
    // A customer with no explicit prefixes is detected by its own id
    prefixes: prefixes.length ? prefixes : [customerId.toUpperCase()],
    aliases: stringList(customerId, "match.aliases", match.aliases),
  };
}

/**
 * Loads every `<ID>_config.json` in `dir`, sorted by file name so detection
 * order is stable. Configs are kept raw; thresholds are validated on resolve.
 */
export function loadCustomerStore(dir: string): CustomerStore {
  if (!existsSync(dir)) {
    console.warn(`[config] Config directory not found: ${dir} (default thresholds only)`);
    return { configs: {}, customers: [] };
  }

  const files = readdirSync(dir)
    .filter((f) => CONFIG_FILE_RE.test(f))
    .sort();

  const store: CustomerStore = { configs: {}, customers: [] };

  for (const file of files) {
    const m = CONFIG_FILE_RE.exec(file);
    if (!m) continue;
    const customerId = m[1].toUpperCase();

    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(join(dir, file), "utf-8"));
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      throw new ConfigMalformedError(customerId, "(file)", `is not valid JSON: ${detail}`);
    }

    store.configs[customerId] = parsed;
    store.customers.push(matcherFor(customerId, parsed));
  }

  console.log(`[config] Loaded ${files.length} customer config(s) from ${dir}`);
  return store;
}
