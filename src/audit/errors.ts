// src/audit/errors.ts

export type AuditErrorCode =
  | "CONFIG_MALFORMED"
  | "EMPTY_WORKBOOK"
  | "SHEET_MALFORMED"
  | "WORKBOOK_UNREADABLE";

export class AuditError extends Error {
  readonly code: AuditErrorCode;

  constructor(code: AuditErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "AuditError";
    this.code = code;
  }
}

export class ConfigMalformedError extends AuditError {
  readonly customerId: string;
  readonly field: string;

  constructor(customerId: string, field: string, reason: string) {
    super("CONFIG_MALFORMED", `Config for customer "${customerId}" is malformed: ${field} ${reason}`);
    this.name = "ConfigMalformedError";
    this.customerId = customerId;
    this.field = field;
  }
}

export class EmptyWorkbookError extends AuditError {
  constructor() {
    super("EMPTY_WORKBOOK", "Workbook contains no sheets to audit");
    this.name = "EmptyWorkbookError";
  }
}

export class SheetMalformedError extends AuditError {
  readonly sheetName: string;
  readonly rowIndex: number | null;

  constructor(sheetName: string, reason: string, rowIndex: number | null = null) {
    const where = rowIndex == null ? "" : ` (row entry ${rowIndex})`;
    super("SHEET_MALFORMED", `Sheet "${sheetName}" is malformed${where}: ${reason}`);
    this.name = "SheetMalformedError";
    this.sheetName = sheetName;
    this.rowIndex = rowIndex;
  }
}

export class WorkbookUnreadableError extends AuditError {
  readonly source: string;

  constructor(source: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super("WORKBOOK_UNREADABLE", `Failed to load workbook ${source}: ${detail}`, { cause });
    this.name = "WorkbookUnreadableError";
    this.source = source;
  }
}

export function isAuditError(e: unknown): e is AuditError {
  return e instanceof AuditError;
}
