/**
 * Canvas Outcome Reporter
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { PreviewOutcomesSchema, type PreviewOutcomesInput } from "./schemas.js";
import { toolResponse, sanitizeError } from "./tool-helpers.js";
import { loadCourseContext, loadTemplateOutcomes } from "./outcome-source.js";
import { resolveOutcomes } from "../reporting/outcome-resolver.js";
import type { AssignmentPart, ResolvedOutcome } from "../reporting/types.js";
import { log } from "../utils/logger.js";
import type { ToolContext } from "./context.js";

export interface OutcomePreview {
  outcomes: Array<{
    title: string;
    description: string;
    threshold: number;
    assignments: Array<{
      name: string;
      weight: number;
      sectionCount: number;
      pointsPossible: number;
      scoredOn: string[];
    }>;
  }>;
  warnings: string[];
}

function describePart(part: AssignmentPart): string {
  switch (part.type) {
    case "quiz_group":
      return `Question group: ${part.name}`;
    case "rubric_criterion":
      return `Rubric criterion: ${part.description} (${part.points} pts)`;
    case "all_questions":
      return "All questions";
  }
}

export function formatPreview(outcomes: readonly ResolvedOutcome[], warnings: string[]): OutcomePreview {
  return {
    outcomes: outcomes.map((o) => ({
      title: o.title,
      description: o.description,
      threshold: o.threshold,
      assignments: o.assignments.map(({ assignment, parts, weight }) => ({
        name: assignment.name,
        weight,
        sectionCount: assignment.courseIds.length,
        pointsPossible: assignment.pointsPossible,
        scoredOn: parts.length > 0 ? parts.map(describePart) : ["Whole assignment"],
      })),
    })),
    warnings,
  };
}

export async function previewOutcomes(ctx: ToolContext, input: PreviewOutcomesInput): Promise<OutcomePreview> {
  const templateOutcomes = await loadTemplateOutcomes(ctx, input);
  const { merged } = await loadCourseContext(ctx, input.courseIds);
  const { outcomes, warnings } = await resolveOutcomes(ctx.canvas, merged, templateOutcomes);
  return formatPreview(outcomes, warnings);
}

/**
 * Register preview_outcomes tool
 */
export function registerPreviewOutcomes(server: McpServer, ctx: ToolContext): void {
  server.registerTool(
    "preview_outcomes",
    {
      title: "Preview Outcomes",
      description:
        "Apply a saved template (or inline outcome definitions) to the selected sections and show " +
        "what each outcome will be scored on, with warnings for anything that did not match.",
      inputSchema: PreviewOutcomesSchema.shape,
    },
    async (args) => {
      try {
        log("DEBUG", "preview_outcomes tool called", { courseIds: args.courseIds, templateName: args.templateName });
        const input = PreviewOutcomesSchema.parse(args);

        const preview = await previewOutcomes(ctx, input);

        log("INFO", `preview_outcomes: ${preview.outcomes.length} outcome(s), ${preview.warnings.length} warning(s)`);
        return toolResponse(preview);
      } catch (error) {
        return sanitizeError(error);
      }
    }
  );
}
