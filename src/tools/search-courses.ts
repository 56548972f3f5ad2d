/**
 * Canvas Outcome Reporter
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { SearchCoursesSchema, type SearchCoursesInput } from "./schemas.js";
import { toolResponse, sanitizeError } from "./tool-helpers.js";
import { log } from "../utils/logger.js";
import { applyCourseFilter, courseDisplayName } from "../utils/course-filter.js";
import type { ToolContext } from "./context.js";

export interface CourseSummary {
  id: number;
  name: string;
  courseCode: string;
  term: string | null;
  totalStudents: number | null;
  display: string;
}

export async function searchCourses(ctx: ToolContext, input: SearchCoursesInput): Promise<CourseSummary[]> {
  const adminMode = input.adminMode ?? ctx.config.adminMode;
  const courses = await ctx.canvas.getCourses({ adminMode });

  return applyCourseFilter(courses, input, ctx.config.courseFilter).map((course) => ({
    id: course.id,
    name: course.name,
    courseCode: course.course_code,
    term: course.term?.name ?? null,
    totalStudents: course.total_students ?? null,
    display: courseDisplayName(course),
  }));
}

/**
 * Register search_courses tool
 */
export function registerSearchCourses(server: McpServer, ctx: ToolContext): void {
  server.registerTool(
    "search_courses",
    {
      title: "Search Courses",
      description:
        "Find the Canvas course sections you teach (or administer, with adminMode). " +
        "Filter by course code, year and semester. Use the returned IDs as courseIds in the other tools.",
      inputSchema: SearchCoursesSchema.shape,
    },
    async (args) => {
      try {
        log("DEBUG", "search_courses tool called", { args });
        const input = SearchCoursesSchema.parse(args);

        const courses = await searchCourses(ctx, input);

        log("INFO", `search_courses: ${courses.length} course(s) matched`);
        return toolResponse(courses);
      } catch (error) {
        return sanitizeError(error);
      }
    }
  );
}
