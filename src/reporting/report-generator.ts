/**
 * Canvas Outcome Reporter
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

import type { CanvasDataSource } from "../canvas/service.js";
import type { ReportSettings } from "../types/index.js";
import { ReportError } from "../utils/errors.js";
import { log } from "../utils/logger.js";
import { prepareOutputPath } from "../utils/output-path.js";
import { reportCourseCode } from "./course-selection.js";
import { increasingProgress } from "./progress.js";
import { collectReportData } from "./data-collector.js";
import { computeOutcomeTable } from "./score-calculator.js";
import { computeOutcomeStatistics } from "./statistics.js";
import type { OutcomeStatistics, ProgressCallback, ResolvedOutcome, SelectedCourse } from "./types.js";
import { buildReportFilename, writeOutcomeWorkbook } from "./workbook.js";

export interface ReportRequest {
  courses: SelectedCourse[];
  outcomes: ResolvedOutcome[];
  outputDir: string;
  /** Custom name; sanitized and given an .xlsx extension. */
  filename?: string;
}

export interface ReportContext {
  settings: ReportSettings;
  onProgress?: ProgressCallback;
  now?: () => Date;
}

export interface ReportResult {
  filePath: string;
  studentCount: number;
  outcomeCount: number;
  statistics: OutcomeStatistics[];
}

export async function generateOutcomeReport(
  source: CanvasDataSource,
  request: ReportRequest,
  context: ReportContext,
): Promise<ReportResult> {
  if (request.outcomes.length === 0) {
    throw new ReportError("No outcomes to report. Add at least one outcome with a matching assignment.");
  }

  const progress = increasingProgress(context.onProgress);
  const now = context.now ?? (() => new Date());
  const { settings } = context;

  log("INFO", `Generating outcome report for ${request.outcomes.length} outcome(s)`);

  const data = await collectReportData(
    source,
    request.outcomes,
    request.courses.map((c) => c.id),
    progress,
  );

  progress(70, "Calculating outcome scores...");
  const table = computeOutcomeTable(request.outcomes, data, {
    borderlineRange: settings.borderlineRange,
  });
  const statistics = computeOutcomeStatistics(request.outcomes, table);

  progress(90, "Creating Excel file...");
  const filename =
    request.filename?.trim() ||
    buildReportFilename(reportCourseCode(request.courses), now(), settings.timestampFiles);
  const filePath = await prepareOutputPath(request.outputDir, filename);

  await writeOutcomeWorkbook(filePath, table, statistics, {
    colors: settings.colors,
    includeSummarySheet: settings.includeSummarySheet,
  });

  progress(100, "Report complete");

  return {
    filePath,
    studentCount: data.students.size,
    outcomeCount: request.outcomes.length,
    statistics,
  };
}
