import { auditWorkbook } from "../auditor";
import { DEFAULT_CONFIG } from "../configStore";
import { EmptyWorkbookError, SheetMalformedError } from "../errors";
import { EMPTY_METADATA, type Row, type Sheet } from "../types";

const row = (over: Partial<Row>): Row => ({
  rowNumber: 1,
  checkResponse: "",
  justification: "",
  numericMetric: null,
  checkType: "Other",
  text: "",
  ...over,
});

const catchError = (fn: () => unknown): unknown => {
  try {
    fn();
  } catch (e) {
    return e;
  }
  return undefined;
};

const workbook: Sheet[] = [
  {
    name: "ERP",
    metadata: { systemName: "ERP", date: "2026-01-20", time: "08:30", performer: "Team A" },
    rows: [
      row({ rowNumber: 6, checkType: "SM13", numericMetric: 0 }),
      row({ rowNumber: 66, checkType: "Locks", numericMetric: 16 }),
      row({ rowNumber: 70, checkType: "DumpsToday", numericMetric: null }),
    ],
  },
  {
    name: "CRP",
    rows: [
      row({ rowNumber: 77, checkResponse: "N" }),
      row({ rowNumber: 80, checkResponse: "N", justification: "INC-42" }),
    ],
  },
  { name: "BWP", rows: [] },
];

describe("auditWorkbook", () => {
  it("fails on an empty workbook", () => {
    expect(() => auditWorkbook([], DEFAULT_CONFIG)).toThrow(EmptyWorkbookError);
  });

  it("concatenates findings in sheet order then row order", () => {
    const result = auditWorkbook(workbook, DEFAULT_CONFIG);

    expect(result.systems).toEqual(["ERP", "CRP", "BWP"]);
    expect(result.findings.map((f) => [f.system, f.rowNumber, f.ruleId, f.severity])).toEqual([
      ["ERP", 66, "old_locks_unexplained", "warning"],
      ["CRP", 77, "missing_justification", "critical"],
      ["CRP", 80, "missing_justification", "pass"],
    ]);
  });

  it("derives counts from the findings", () => {
    const result = auditWorkbook(workbook, DEFAULT_CONFIG);

    expect(result.criticalCount).toBe(1);
    expect(result.warningCount).toBe(1);
    expect(result.passCount).toBe(1);
    expect(result.criticalCount + result.warningCount + result.passCount).toBe(result.findings.length);
  });

  it("collects incomplete-data notes separately from findings", () => {
    const result = auditWorkbook(workbook, DEFAULT_CONFIG);

    expect(result.incompleteData).toHaveLength(1);
    expect(result.incompleteData[0]).toMatchObject({ system: "ERP", rowNumber: 70, ruleId: "dumps_today_high" });
    expect(result.findings.some((f) => f.rowNumber === 70)).toBe(false);
  });

  it("attaches per-sheet metadata as a side channel", () => {
    const result = auditWorkbook(workbook, DEFAULT_CONFIG);

    expect(result.metadata.ERP).toEqual({ systemName: "ERP", date: "2026-01-20", time: "08:30", performer: "Team A" });
    expect(result.metadata.CRP).toEqual(EMPTY_METADATA);
    expect(result.metadata.BWP).toEqual(EMPTY_METADATA);
  });

  it("keeps metadata for a sheet named like an object builtin", () => {
    const meta = { systemName: "P01", date: null, time: null, performer: null };
    const result = auditWorkbook([{ name: "__proto__", rows: [], metadata: meta }], DEFAULT_CONFIG);

    expect(Object.keys(result.metadata)).toEqual(["__proto__"]);
    expect(Object.getOwnPropertyDescriptor(result.metadata, "__proto__")?.value).toEqual(meta);
  });

  it("gives identical results for identical input", () => {
    expect(auditWorkbook(workbook, DEFAULT_CONFIG)).toEqual(auditWorkbook(workbook, DEFAULT_CONFIG));
  });

  it("fails the whole audit when one sheet is malformed", () => {
    const badRows: Row[] = JSON.parse('[{"rowNumber": 2, "checkResponse": "N", "justification": null, "checkType": "Other"}]');
    const err = catchError(() =>
      auditWorkbook([workbook[0], { name: "QAS", rows: badRows }, workbook[1]], DEFAULT_CONFIG)
    );

    expect(err).toBeInstanceOf(SheetMalformedError);
    expect(err).toMatchObject({ sheetName: "QAS" });
  });

  it("rejects a sheet whose rows are not a list", () => {
    const sheets: Sheet[] = JSON.parse('[{"name": "PRD", "rows": {"0": {}}}]');
    const err = catchError(() => auditWorkbook(sheets, DEFAULT_CONFIG));

    expect(err).toBeInstanceOf(SheetMalformedError);
    expect(err).toMatchObject({ sheetName: "PRD" });
  });

  it("rejects duplicate sheet names", () => {
    const err = catchError(() =>
      auditWorkbook([{ name: "ERP", rows: [] }, { name: "ERP", rows: [] }], DEFAULT_CONFIG)
    );
    expect(err).toMatchObject({ code: "SHEET_MALFORMED", sheetName: "ERP" });
  });
});
