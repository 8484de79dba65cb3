import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { DEFAULT_CONFIG, cleanConfig, loadCustomerStore, resolveConfig } from "../configStore";
import { ConfigMalformedError } from "../errors";
import { RULE_IDS } from "../types";

const CONFIG_DIR = join(__dirname, "..", "..", "..", "configs");

const stored = {
  ACME: {
    responseTimeMaxMs: 1500,
    dumpsTodayMax: 10,
    dumpsYesterdayMax: 20,
    failedJobsMax: 2,
    oldLocksMax: 4,
  },
  BROKEN: {
    responseTimeMaxMs: 1500,
    dumpsTodayMax: 10,
    dumpsYesterdayMax: 20,
    failedJobsMax: 2,
  },
};

const catchError = (fn: () => unknown): unknown => {
  try {
    fn();
  } catch (e) {
    return e;
  }
  return undefined;
};

beforeEach(() => {
  jest.spyOn(console, "log").mockImplementation(() => undefined);
  jest.spyOn(console, "warn").mockImplementation(() => undefined);
});

afterEach(() => {
  jest.restoreAllMocks();
});

describe("resolveConfig", () => {
  it("falls back to the default for an unknown customer", () => {
    const resolved = resolveConfig("GLOBEX", stored);

    expect(resolved.defaultApplied).toBe(true);
    expect(resolved.customerId).toBe("GLOBEX");
    expect(resolved.config).toEqual({
      responseTimeMaxMs: 1000,
      dumpsTodayMax: 25,
      dumpsYesterdayMax: 40,
      failedJobsMax: 5,
      oldLocksMax: 10,
      enabledRules: [...RULE_IDS],
    });
  });

  it("falls back to the default when detection failed", () => {
    expect(resolveConfig(null, stored)).toEqual({ customerId: null, config: DEFAULT_CONFIG, defaultApplied: true });
    expect(resolveConfig(undefined, stored).defaultApplied).toBe(true);
  });

  it("returns the stored thresholds for a known customer", () => {
    const resolved = resolveConfig("ACME", stored);

    expect(resolved.defaultApplied).toBe(false);
    expect(resolved.config).toEqual({ ...stored.ACME, enabledRules: [...RULE_IDS] });
  });

  it("matches customer ids case-insensitively", () => {
    expect(resolveConfig(" acme ", stored).customerId).toBe("ACME");
  });

  it("does not mutate the store", () => {
    const snapshot = JSON.parse(JSON.stringify(stored));
    resolveConfig("ACME", stored);
    expect(stored).toEqual(snapshot);
  });

  it("fails on a present but incomplete config instead of defaulting", () => {
    const err = catchError(() => resolveConfig("BROKEN", stored));

    expect(err).toBeInstanceOf(ConfigMalformedError);
    expect(err).toMatchObject({ code: "CONFIG_MALFORMED", customerId: "BROKEN", field: "oldLocksMax" });
  });
});

describe("cleanConfig", () => {
  const base = stored.ACME;

  it.each([
    ["numeric string", { ...base, dumpsTodayMax: "10" }, "dumpsTodayMax"],
    ["negative", { ...base, failedJobsMax: -1 }, "failedJobsMax"],
    ["infinite", { ...base, responseTimeMaxMs: Infinity }, "responseTimeMaxMs"],
    ["unknown rule", { ...base, enabledRules: ["missing_justification", "st99"] }, "enabledRules"],
    ["rules not a list", { ...base, enabledRules: "all" }, "enabledRules"],
    ["not an object", [1, 2], "(root)"],
  ])("rejects %s", (_label, raw, field) => {
    expect(catchError(() => cleanConfig("ACME", raw))).toMatchObject({ field });
  });

  it("keeps the listed rules, deduplicated", () => {
    const config = cleanConfig("ACME", {
      ...base,
      enabledRules: ["trfc_error", "missing_justification", "trfc_error"],
    });
    expect(config.enabledRules).toEqual(["trfc_error", "missing_justification"]);
  });

  it("accepts zero thresholds", () => {
    expect(cleanConfig("ACME", { ...base, oldLocksMax: 0 }).oldLocksMax).toBe(0);
  });
});

describe("loadCustomerStore", () => {
  it("reads the shipped customer configs in file-name order", () => {
    const store = loadCustomerStore(CONFIG_DIR);

    expect(store.customers).toEqual([
      { customerId: "CONTOSO", prefixes: ["CONTOSO"], aliases: ["FABRIKAM"] },
      { customerId: "NORTHWIND", prefixes: ["NORTHWIND", "NWD"], aliases: [] },
    ]);
    expect(resolveConfig("NORTHWIND", store.configs).config.responseTimeMaxMs).toBe(1200);
    expect(resolveConfig("CONTOSO", store.configs).config.enabledRules).not.toContain("failed_jobs_high");
  });

  it("returns an empty store when the directory is missing", () => {
    expect(loadCustomerStore(join(CONFIG_DIR, "does-not-exist"))).toEqual({ configs: {}, customers: [] });
  });

  describe("with a scratch directory", () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), "audit-configs-"));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it("detects a customer by its id when no match block is given", () => {
      writeFileSync(join(dir, "initech_config.json"), JSON.stringify(stored.ACME));
      writeFileSync(join(dir, "notes.txt"), "ignored");

      const store = loadCustomerStore(dir);

      expect(Object.keys(store.configs)).toEqual(["INITECH"]);
      expect(store.customers).toEqual([{ customerId: "INITECH", prefixes: ["INITECH"], aliases: [] }]);
    });

    it("rejects a config file that is not JSON", () => {
      writeFileSync(join(dir, "ACME_config.json"), "{ not json");

      const err = catchError(() => loadCustomerStore(dir));
      expect(err).toBeInstanceOf(ConfigMalformedError);
      expect(err).toMatchObject({ customerId: "ACME", field: "(file)" });
    });
  });
});
