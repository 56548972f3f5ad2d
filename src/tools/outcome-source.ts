/**
 * Canvas Outcome Reporter
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

import { loadMergedAssignments } from "../reporting/assignment-merge.js";
import { loadSelectedCourses } from "../reporting/course-selection.js";
import type { MergedAssignment, SelectedCourse } from "../reporting/types.js";
import { outcomeFromInput, type TemplateOutcomeInput } from "../templates/schema.js";
import type { TemplateOutcome } from "../templates/types.js";
import { TemplateError } from "../utils/errors.js";
import { log } from "../utils/logger.js";
import type { ToolContext } from "./context.js";

export interface OutcomeSourceInput {
  templateName?: string;
  courseCode?: string;
  outcomes?: TemplateOutcomeInput[];
}

export interface CourseContext {
  courses: SelectedCourse[];
  merged: MergedAssignment[];
}

export async function loadCourseContext(ctx: ToolContext, courseIds: readonly number[]): Promise<CourseContext> {
  const courses = await loadSelectedCourses(ctx.canvas, courseIds);
  const merged = await loadMergedAssignments(ctx.canvas, courses);
  return { courses, merged };
}

/**
 * Outcome definitions from inline input, or from a saved template.
 *
 * @throws TemplateError when neither is given or the template does not exist
 */
export async function loadTemplateOutcomes(
  ctx: ToolContext,
  input: OutcomeSourceInput,
): Promise<TemplateOutcome[]> {
  if (input.outcomes && input.outcomes.length > 0) {
    const threshold = ctx.config.report.defaultThreshold;
    return input.outcomes.map((o) => outcomeFromInput(o, threshold));
  }

  if (input.templateName) {
    if (!input.courseCode) {
      throw new TemplateError("courseCode is required when applying a saved template");
    }
    const template = await ctx.templates.require(input.courseCode, input.templateName);
    log("DEBUG", `Applying template "${template.templateName}" (${template.outcomes.length} outcomes)`);
    return template.outcomes;
  }

  throw new TemplateError("Provide either outcomes or a saved templateName with its courseCode");
}
