/**
 * Canvas Outcome Reporter
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { GenerateReportSchema, type GenerateReportInput } from "./schemas.js";
import { toolResponse, sanitizeError } from "./tool-helpers.js";
import { loadCourseContext, loadTemplateOutcomes } from "./outcome-source.js";
import { resolveOutcomes } from "../reporting/outcome-resolver.js";
import { generateOutcomeReport } from "../reporting/report-generator.js";
import type { ProgressCallback } from "../reporting/types.js";
import { expandTilde } from "../utils/paths.js";
import { log } from "../utils/logger.js";
import type { ToolContext } from "./context.js";

export interface GeneratedReport {
  filePath: string;
  studentCount: number;
  outcomeCount: number;
  summary: Array<{
    outcome: string;
    threshold: number;
    studentsScored: number;
    mean: number;
    median: number;
    stdDev: number;
    percentMeeting: number;
  }>;
  warnings: string[];
}

const round2 = (value: number): number => Math.round(value * 100) / 100;

export async function generateReport(
  ctx: ToolContext,
  input: GenerateReportInput,
  onProgress?: ProgressCallback,
  now?: () => Date,
): Promise<GeneratedReport> {
  const templateOutcomes = await loadTemplateOutcomes(ctx, input);
  const { courses, merged } = await loadCourseContext(ctx, input.courseIds);
  const { outcomes, warnings } = await resolveOutcomes(ctx.canvas, merged, templateOutcomes);

  const result = await generateOutcomeReport(
    ctx.canvas,
    {
      courses,
      outcomes,
      outputDir: expandTilde(input.outputDir ?? ctx.config.reportDir),
      filename: input.filename,
    },
    { settings: ctx.config.report, onProgress, now },
  );

  return {
    filePath: result.filePath,
    studentCount: result.studentCount,
    outcomeCount: result.outcomeCount,
    summary: result.statistics.map((s) => ({
      outcome: s.outcome,
      threshold: s.threshold,
      studentsScored: s.count,
      mean: round2(s.mean),
      median: round2(s.median),
      stdDev: round2(s.stdDev),
      percentMeeting: round2(s.percentMeeting),
    })),
    warnings,
  };
}

/**
 * Register generate_outcome_report tool
 */
export function registerGenerateReport(server: McpServer, ctx: ToolContext): void {
  server.registerTool(
    "generate_outcome_report",
    {
      title: "Generate Outcome Report",
      description:
        "Build the Excel outcome report for the selected sections: one row per student with " +
        "per-assignment scores, outcome totals and Met / Not Met status, plus a summary sheet. " +
        "Use a saved template or inline outcome definitions.",
      inputSchema: GenerateReportSchema.shape,
    },
    async (args, extra) => {
      try {
        log("DEBUG", "generate_outcome_report tool called", {
          courseIds: args.courseIds,
          templateName: args.templateName,
        });
        const input = GenerateReportSchema.parse(args);

        const progressToken = extra._meta?.progressToken;
        const onProgress: ProgressCallback | undefined =
          progressToken === undefined
            ? undefined
            : (progress, message) => {
                extra
                  .sendNotification({
                    method: "notifications/progress",
                    params: { progressToken, progress, total: 100, message },
                  })
                  .catch((error: unknown) => {
                    log("DEBUG", "Progress notification failed", error);
                  });
              };

        const report = await generateReport(ctx, input, onProgress);

        log("INFO", `generate_outcome_report: wrote ${report.filePath} (${report.studentCount} students)`);
        return toolResponse(report);
      } catch (error) {
        return sanitizeError(error);
      }
    }
  );
}
