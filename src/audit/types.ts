// src/audit/types.ts

export const CHECK_TYPES = [
  "ResponseTime",
  "DumpsToday",
  "DumpsYesterday",
  "SM13",
  "tRFC",
  "Locks",
  "FailedJobs",
  "Other",
] as const;

export type CheckType = (typeof CHECK_TYPES)[number];

// Order here is rule precedence within a row.
export const RULE_IDS = [
  "missing_justification",
  "failed_update_nonzero",
  "trfc_error",
  "response_time_exceeded",
  "dumps_today_high",
  "dumps_yesterday_high",
  "failed_jobs_high",
  "old_locks_unexplained",
] as const;

export type RuleId = (typeof RULE_IDS)[number];

export type Severity = "critical" | "warning" | "pass";

export type CheckResponse = "Y" | "N" | "";

export type Configuration = {
  readonly responseTimeMaxMs: number;
  readonly dumpsTodayMax: number;
  readonly dumpsYesterdayMax: number;
  readonly failedJobsMax: number;
  readonly oldLocksMax: number;
  readonly enabledRules: readonly RuleId[];
};

export type ResolvedConfiguration = {
  customerId: string | null;
  config: Configuration;
  // true when no stored config matched and DEFAULT_CONFIG was used
  defaultApplied: boolean;
};

export type Row = {
  readonly rowNumber: number;
  readonly checkResponse: CheckResponse;
  readonly justification: string;
  readonly numericMetric: number | null;
  readonly checkType: CheckType;
  // Cell text joined with spaces
  readonly text: string;
};

export type Finding = {
  readonly id: string;
  readonly severity: Severity;
  readonly system: string;
  readonly rowNumber: number;
  readonly checkType: CheckType;
  readonly ruleId: RuleId;
  readonly message: string;
};

export type IncompleteDataNote = {
  readonly system: string;
  readonly rowNumber: number;
  readonly checkType: CheckType;
  readonly ruleId: RuleId;
  readonly message: string;
};

export type SheetMetadata = {
  readonly systemName: string | null;
  readonly date: string | null;
  readonly time: string | null;
  readonly performer: string | null;
};

export type Sheet = {
  readonly name: string;
  readonly rows: readonly Row[];
  readonly metadata?: SheetMetadata;
};

export type Workbook = readonly Sheet[];

export type SheetEvaluation = {
  readonly findings: readonly Finding[];
  readonly incompleteData: readonly IncompleteDataNote[];
};

export type AuditResult = {
  readonly systems: readonly string[];
  readonly findings: readonly Finding[];
  readonly criticalCount: number;
  readonly warningCount: number;
  readonly passCount: number;
  readonly incompleteData: readonly IncompleteDataNote[];
  readonly metadata: Readonly<Record<string, SheetMetadata>>;
};

export const EMPTY_METADATA: SheetMetadata = Object.freeze({
  systemName: null,
  date: null,
  time: null,
  performer: null,
});
