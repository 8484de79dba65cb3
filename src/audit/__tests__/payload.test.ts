import { EmptyWorkbookError, SheetMalformedError } from "../errors";
import { workbookFromJson } from "../payload";

describe("workbookFromJson", () => {
  it("rejects missing or empty sheet lists", () => {
    expect(() => workbookFromJson(undefined)).toThrow(EmptyWorkbookError);
    expect(() => workbookFromJson([])).toThrow(EmptyWorkbookError);
  });

  it("validates rows and metadata", () => {
    const workbook = workbookFromJson([
      {
        name: "ERP",
        metadata: { date: "2026-01-20", performer: "Team A" },
        rows: [{ rowNumber: 66, checkResponse: "", justification: "", numericMetric: 16, checkType: "Locks" }],
      },
    ]);

    expect(workbook).toEqual([
      {
        name: "ERP",
        metadata: { systemName: null, date: "2026-01-20", time: null, performer: "Team A" },
        rows: [
          { rowNumber: 66, checkResponse: "", justification: "", numericMetric: 16, checkType: "Locks", text: "" },
        ],
      },
    ]);
  });

  it.each([
    ["a sheet without a name", [{ rows: [] }], "#1"],
    ["rows that are not a list", [{ name: "ERP", rows: "none" }], "ERP"],
    ["a bad row", [{ name: "CRP", rows: [{ rowNumber: "x" }] }], "CRP"],
    ["bad metadata", [{ name: "BWP", rows: [], metadata: { date: true } }], "BWP"],
  ])("rejects %s", (_label, raw, sheetName) => {
    let caught: unknown;
    try {
      workbookFromJson(raw);
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(SheetMalformedError);
    expect(caught).toMatchObject({ sheetName });
  });
});
