/**
 * Canvas Outcome Reporter
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

import ExcelJS from "exceljs";
import type { Fill, Workbook, Worksheet } from "exceljs";
import type { ReportColors } from "../types/index.js";
import { log } from "../utils/logger.js";
import type { CellValue, OutcomeReportTable, OutcomeStatistics } from "./types.js";

export const REPORT_SHEET = "Outcome Report";
export const SUMMARY_SHEET = "Outcome Summary";

const MAX_COLUMN_WIDTH = 50;

export const SUMMARY_COLUMNS = [
  "Outcome",
  "Description",
  "Threshold (%)",
  "Students Scored",
  "Mean (%)",
  "Median (%)",
  "Std Dev",
  "% Meeting Threshold",
] as const;

export interface WorkbookOptions {
  colors: ReportColors;
  includeSummarySheet: boolean;
}

function solidFill(hex: string): Fill {
  return { type: "pattern", pattern: "solid", fgColor: { argb: `FF${hex.toUpperCase()}` } };
}

function cellText(value: CellValue): string {
  return value === null ? "" : String(value);
}

function fitColumns(sheet: Worksheet, rows: ReadonlyArray<ReadonlyArray<CellValue>>, headers: readonly string[]): void {
  headers.forEach((header, i) => {
    let longest = header.length;
    for (const row of rows) {
      longest = Math.max(longest, cellText(row[i] ?? null).length);
    }
    sheet.getColumn(i + 1).width = Math.min(longest + 2, MAX_COLUMN_WIDTH);
  });
}

function addHeader(sheet: Worksheet, headers: readonly string[]): void {
  const header = sheet.addRow([...headers]);
  header.font = { bold: true };
  sheet.views = [{ state: "frozen", ySplit: 1 }];
}

function addReportSheet(workbook: Workbook, table: OutcomeReportTable, colors: ReportColors): void {
  const sheet = workbook.addWorksheet(REPORT_SHEET);
  addHeader(sheet, table.columns);

  const statusColumns = new Map<number, string>();
  for (const cols of table.outcomeColumns) {
    statusColumns.set(table.columns.indexOf(cols.statusColumn) + 1, cols.title);
  }

  const grid = table.rows.map((row) => table.columns.map((col) => row.values[col] ?? null));

  table.rows.forEach((row, i) => {
    // null leaves the cell empty
    const excelRow = sheet.addRow(grid[i]);

    for (const [columnNumber, title] of statusColumns) {
      const result = row.outcomes[title];
      if (!result) continue;
      const color = result.borderline ? colors.borderline : result.status === "Met" ? colors.met : colors.notMet;
      excelRow.getCell(columnNumber).fill = solidFill(color);
    }
  });

  fitColumns(sheet, grid, table.columns);
}

function addSummarySheet(workbook: Workbook, statistics: readonly OutcomeStatistics[]): void {
  const sheet = workbook.addWorksheet(SUMMARY_SHEET);
  addHeader(sheet, SUMMARY_COLUMNS);

  const grid: CellValue[][] = statistics.map((s) => [
    s.outcome,
    s.description,
    s.threshold,
    s.count,
    s.mean,
    s.median,
    s.stdDev,
    s.percentMeeting,
  ]);

  for (const values of grid) {
    const row = sheet.addRow(values);
    for (let col = 5; col <= 8; col++) {
      row.getCell(col).numFmt = "0.00";
    }
  }

  fitColumns(sheet, grid, SUMMARY_COLUMNS);
}

export function buildOutcomeWorkbook(
  table: OutcomeReportTable,
  statistics: readonly OutcomeStatistics[],
  options: WorkbookOptions,
): Workbook {
  const workbook = new ExcelJS.Workbook();
  workbook.creator = "Canvas Outcome Reporter";
  workbook.created = new Date();

  addReportSheet(workbook, table, options.colors);
  if (options.includeSummarySheet) {
    addSummarySheet(workbook, statistics);
  }
  return workbook;
}

export async function writeOutcomeWorkbook(
  filePath: string,
  table: OutcomeReportTable,
  statistics: readonly OutcomeStatistics[],
  options: WorkbookOptions,
): Promise<void> {
  const workbook = buildOutcomeWorkbook(table, statistics, options);
  await workbook.xlsx.writeFile(filePath);
  log("INFO", `Wrote ${table.rows.length} row(s) to ${filePath}`);
}

const pad = (n: number): string => String(n).padStart(2, "0");

/** `<courseCode>_outcome_report[_YYYYMMDD_HHMMSS].xlsx`, local time. */
export function buildReportFilename(courseCode: string, now: Date, timestamp: boolean): string {
  if (!timestamp) return `${courseCode}_outcome_report.xlsx`;
  const date = `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}`;
  const time = `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  return `${courseCode}_outcome_report_${date}_${time}.xlsx`;
}
