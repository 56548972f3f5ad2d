import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import * as os from "node:os";
import ExcelJS from "exceljs";
import type { Worksheet } from "exceljs";
import {
  buildOutcomeWorkbook,
  buildReportFilename,
  writeOutcomeWorkbook,
  REPORT_SHEET,
  SUMMARY_SHEET,
} from "../../src/reporting/workbook.js";
import { computeOutcomeTable } from "../../src/reporting/score-calculator.js";
import { computeOutcomeStatistics } from "../../src/reporting/statistics.js";
import { collectReportData } from "../../src/reporting/data-collector.js";
import type { OutcomeReportTable, OutcomeStatistics } from "../../src/reporting/types.js";
import { DEFAULT_COLORS } from "../../src/utils/config.js";
import { twoSectionCanvas } from "../helpers/fixtures.js";
import { resolveSample } from "../helpers/pipeline.js";

const OPTIONS = { colors: { ...DEFAULT_COLORS }, includeSummarySheet: true };

async function sampleReport(): Promise<{ table: OutcomeReportTable; statistics: OutcomeStatistics[] }> {
  const canvas = twoSectionCanvas();
  const outcomes = await resolveSample(canvas);
  const table = computeOutcomeTable(outcomes, await collectReportData(canvas, outcomes, []), {
    borderlineRange: 5,
  });
  return { table, statistics: computeOutcomeStatistics(outcomes, table) };
}

function sheetNamed(workbook: ExcelJS.Workbook, name: string): Worksheet {
  const sheet = workbook.getWorksheet(name);
  if (!sheet) throw new Error(`missing sheet ${name}`);
  return sheet;
}

function fillArgb(sheet: Worksheet, address: string): string | undefined {
  const fill = sheet.getCell(address).fill;
  return fill?.type === "pattern" ? fill.fgColor?.argb : undefined;
}

describe("buildOutcomeWorkbook", () => {
  it("writes one row per student under a bold frozen header", async () => {
    const { table, statistics } = await sampleReport();
    const sheet = sheetNamed(buildOutcomeWorkbook(table, statistics, OPTIONS), REPORT_SHEET);

    expect(sheet.rowCount).toBe(4);
    expect(sheet.getCell("A1").value).toBe("Student ID");
    expect(sheet.getCell("D1").value).toBe("Scientific Reasoning - Lab Report");
    expect(sheet.getCell("A1").font).toEqual({ bold: true });
    expect(sheet.views).toEqual([{ state: "frozen", ySplit: 1 }]);

    // Rows follow sortable name: Moore, Rivers, Stone
    expect(sheet.getCell("B2").value).toBe("Moore, Casey");
    expect(sheet.getCell("F2").value).toBe(81);
    expect(sheet.getCell("G2").value).toBe("Met");
    expect(sheet.getCell("I3").value).toBeNull();
  });

  it("colours status cells by result", async () => {
    const { table, statistics } = await sampleReport();
    const sheet = sheetNamed(buildOutcomeWorkbook(table, statistics, OPTIONS), REPORT_SHEET);

    expect(fillArgb(sheet, "G2")).toBe("FF90EE90"); // Casey, met
    expect(fillArgb(sheet, "G3")).toBe("FFFFB6C1"); // Blake, 31% not met
    expect(fillArgb(sheet, "K4")).toBe("FFFFFFE0"); // Avery, 80% against 85, borderline
    expect(fillArgb(sheet, "F2")).toBeUndefined();
  });

  it("sizes columns to their longest value", async () => {
    const { table, statistics } = await sampleReport();
    const sheet = sheetNamed(buildOutcomeWorkbook(table, statistics, OPTIONS), REPORT_SHEET);

    expect(sheet.getColumn(1).width).toBe(12);
    expect(sheet.getColumn(4).width).toBe(35);
  });

  it("adds a summary sheet with formatted statistics", async () => {
    const { table, statistics } = await sampleReport();
    const sheet = sheetNamed(buildOutcomeWorkbook(table, statistics, OPTIONS), SUMMARY_SHEET);

    expect(sheet.getCell("A1").value).toBe("Outcome");
    expect(sheet.getCell("H1").value).toBe("% Meeting Threshold");
    expect(sheet.getCell("A2").value).toBe("Scientific Reasoning");
    expect(sheet.getCell("C2").value).toBe(70);
    expect(sheet.getCell("D2").value).toBe(3);
    expect(sheet.getCell("E2").value).toBe(68.75);
    expect(sheet.getCell("E2").numFmt).toBe("0.00");
    expect(sheet.getCell("D2").numFmt).toBeUndefined();
  });

  it("omits the summary sheet when disabled", async () => {
    const { table, statistics } = await sampleReport();
    const workbook = buildOutcomeWorkbook(table, statistics, { ...OPTIONS, includeSummarySheet: false });

    expect(workbook.worksheets.map((s) => s.name)).toEqual([REPORT_SHEET]);
  });
});

describe("writeOutcomeWorkbook", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "workbook-test-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("writes an xlsx file that reads back", async () => {
    const { table, statistics } = await sampleReport();
    const filePath = path.join(dir, "report.xlsx");

    await writeOutcomeWorkbook(filePath, table, statistics, OPTIONS);

    const workbook = new ExcelJS.Workbook();
    await workbook.xlsx.readFile(filePath);
    const sheet = sheetNamed(workbook, REPORT_SHEET);
    expect(sheet.getCell("B4").value).toBe("Stone, Avery");
    expect(sheet.getCell("J4").value).toBe(80);
    expect(sheet.getCell("K4").value).toBe("Not Met");
    expect(workbook.worksheets.map((s) => s.name)).toEqual([REPORT_SHEET, SUMMARY_SHEET]);
  });
});

describe("buildReportFilename", () => {
  const now = new Date(2025, 2, 7, 9, 5, 3);

  it("adds a local timestamp", () => {
    expect(buildReportFilename("PSY3421", now, true)).toBe("PSY3421_outcome_report_20250307_090503.xlsx");
  });

  it("leaves the timestamp out when disabled", () => {
    expect(buildReportFilename("PSY3421", now, false)).toBe("PSY3421_outcome_report.xlsx");
  });
});
