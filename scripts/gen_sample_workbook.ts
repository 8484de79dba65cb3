// scripts/gen_sample_workbook.ts
// Generate a sample daily-monitoring workbook for manual audit runs

import { mkdirSync } from "node:fs";
import { join } from "node:path";
import * as XLSX from "xlsx";

const OUTPUT_DIR = join(process.cwd(), "scripts", "output");

type SystemSample = {
  name: string;
  performer: string;
  rows: (string | number | null)[][];
};

const HEADER = ["Transaction", "Check", "Expected", "Response", "Value", "Unit", "Status"];

const SYSTEMS: SystemSample[] = [
  {
    name: "ERP",
    performer: "Offshore Team A",
    rows: [
      HEADER,
      ["SM51", "All application servers running", "Y", "Y", null, null, null],
      ["SMLG", "Avg resp time (ms)", null, 850, null, "ms", null],
      ["SM12", "Number of old locks", null, 16, null, null, null],
      ["ST22", "ABAP dumps today", null, 12, null, null, null],
      ["ST22", "ABAP dumps yesterday", null, 55, null, null, "Known issue, ticket INC-1001"],
      ["SM13", "Failed updates", null, 0, null, null, null],
    ],
  },
  {
    name: "CRP",
    performer: "Offshore Team B",
    rows: [
      HEADER,
      ["SM21", "System log free of errors", "Y", "N", null, null, null],
      ["SM58", "tRFC queue", null, null, null, null, "2 entries in SYSFAIL"],
      ["SM37", "Cancelled jobs", null, 3, null, null, null],
      ["SMLG", "Avg resp time (ms)", null, 1450, null, "ms", null],
    ],
  },
];

function buildSheet(s: SystemSample): XLSX.WorkSheet {
  const header = [
    ["System Name", s.name],
    ["Date", "2026-01-20"],
    ["Time", "08:30"],
    ["Performed By", s.performer],
    [],
  ];
  return XLSX.utils.aoa_to_sheet([...header, ...s.rows]);
}

mkdirSync(OUTPUT_DIR, { recursive: true });

const wb = XLSX.utils.book_new();
for (const s of SYSTEMS) XLSX.utils.book_append_sheet(wb, buildSheet(s), s.name);

const target = join(OUTPUT_DIR, "NORTHWIND_DAILY_MONITORING_20_JAN_2026.xlsx");
XLSX.writeFile(wb, target);

console.log("Generated sample workbook:");
console.log(`  ${target}`);
