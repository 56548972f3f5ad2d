/**
 * Canvas Outcome Reporter
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { ListAssignmentsSchema } from "./schemas.js";
import { toolResponse, sanitizeError } from "./tool-helpers.js";
import { loadCourseContext } from "./outcome-source.js";
import { log } from "../utils/logger.js";
import type { SelectedCourse } from "../reporting/types.js";
import type { ToolContext } from "./context.js";

export interface AssignmentListing {
  courses: SelectedCourse[];
  assignments: Array<{
    name: string;
    pointsPossible: number;
    courseName: string;
    courseIds: number[];
    sectionCount: number;
    isQuiz: boolean;
    hasRubric: boolean;
  }>;
}

export async function listAssignments(ctx: ToolContext, courseIds: number[]): Promise<AssignmentListing> {
  const { courses, merged } = await loadCourseContext(ctx, courseIds);
  return {
    courses,
    assignments: merged.map((a) => ({
      name: a.name,
      pointsPossible: a.pointsPossible,
      courseName: a.courseName,
      courseIds: a.courseIds,
      sectionCount: a.courseIds.length,
      isQuiz: a.isQuiz,
      hasRubric: a.hasRubric,
    })),
  };
}

/**
 * Register list_assignments tool
 */
export function registerListAssignments(server: McpServer, ctx: ToolContext): void {
  server.registerTool(
    "list_assignments",
    {
      title: "List Assignments",
      description:
        "List assignments across the selected sections. Assignments with the same name in several " +
        "sections are merged into one entry, which is how outcomes refer to them.",
      inputSchema: ListAssignmentsSchema.shape,
    },
    async (args) => {
      try {
        log("DEBUG", "list_assignments tool called", { args });
        const { courseIds } = ListAssignmentsSchema.parse(args);

        const listing = await listAssignments(ctx, courseIds);

        log("INFO", `list_assignments: ${listing.assignments.length} merged assignment(s)`);
        return toolResponse(listing);
      } catch (error) {
        return sanitizeError(error);
      }
    }
  );
}
