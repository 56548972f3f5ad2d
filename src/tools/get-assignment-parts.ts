/**
 * Canvas Outcome Reporter
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { GetAssignmentPartsSchema } from "./schemas.js";
import { toolResponse, sanitizeError } from "./tool-helpers.js";
import { loadCourseContext } from "./outcome-source.js";
import { ALL_QUESTIONS, discoverParts } from "../reporting/parts-discovery.js";
import { ReportError } from "../utils/errors.js";
import { log } from "../utils/logger.js";
import type { PartsKind } from "../reporting/types.js";
import type { ToolContext } from "./context.js";

export interface AssignmentPartsListing {
  assignmentName: string;
  kind: PartsKind;
  questionGroups: Array<{ name: string; sectionCount: number; pickCount: number; questionPoints: number }>;
  rubricCriteria: Array<{ description: string; points: number; sectionCount: number }>;
  offersAllQuestions: boolean;
  note?: string;
}

export async function getAssignmentParts(
  ctx: ToolContext,
  courseIds: number[],
  assignmentName: string,
): Promise<AssignmentPartsListing> {
  const { merged } = await loadCourseContext(ctx, courseIds);
  const assignment = merged.find((a) => a.name === assignmentName);
  if (!assignment) {
    throw new ReportError(`Assignment "${assignmentName}" was not found in the selected courses`);
  }

  const parts = await discoverParts(ctx.canvas, assignment);

  const listing: AssignmentPartsListing = {
    assignmentName: parts.assignmentName,
    kind: parts.kind,
    // Display values come from the first section that has the group
    questionGroups: parts.questionGroups.map((g) => {
      const firstCourse = Object.keys(g.groupIdsByCourse)[0] ?? "";
      return {
        name: g.name,
        sectionCount: Object.keys(g.groupIdsByCourse).length,
        pickCount: g.pickCountByCourse[firstCourse] ?? 0,
        questionPoints: g.questionPointsByCourse[firstCourse] ?? 0,
      };
    }),
    rubricCriteria: parts.rubricCriteria.map((c) => ({
      description: c.description,
      points: c.points,
      sectionCount: Object.keys(c.criterionIdsByCourse).length,
    })),
    offersAllQuestions: parts.offersAllQuestions,
  };

  if (parts.kind === "whole") {
    listing.note = "This assignment has no quiz question groups or rubric; the entire assignment score is used.";
  } else if (parts.offersAllQuestions && parts.rubricCriteria.length === 0) {
    listing.note = `This quiz has no question groups; only the whole quiz (${ALL_QUESTIONS}) can be used.`;
  }

  return listing;
}

/**
 * Register get_assignment_parts tool
 */
export function registerGetAssignmentParts(server: McpServer, ctx: ToolContext): void {
  server.registerTool(
    "get_assignment_parts",
    {
      title: "Get Assignment Parts",
      description:
        "Show the quiz question groups and rubric criteria of a merged assignment, so an outcome " +
        "can be scored on just those parts. Groups match by name, criteria by description.",
      inputSchema: GetAssignmentPartsSchema.shape,
    },
    async (args) => {
      try {
        log("DEBUG", "get_assignment_parts tool called", { args });
        const { courseIds, assignmentName } = GetAssignmentPartsSchema.parse(args);

        const listing = await getAssignmentParts(ctx, courseIds, assignmentName);

        log(
          "INFO",
          `get_assignment_parts: ${listing.questionGroups.length} group(s), ${listing.rubricCriteria.length} criteria`
        );
        return toolResponse(listing);
      } catch (error) {
        return sanitizeError(error);
      }
    }
  );
}
