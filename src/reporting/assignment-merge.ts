/**
 * Canvas Outcome Reporter
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

import type { CanvasDataSource } from "../canvas/service.js";
import type { Assignment } from "../canvas/types.js";
import { log } from "../utils/logger.js";
import type { MergedAssignment, SelectedCourse } from "./types.js";

export interface CourseAssignments {
  course: SelectedCourse;
  assignments: Assignment[];
}

/**
 * Group assignments across sections by exact name, in first-seen order.
 * The first occurrence supplies the id, points and course name.
 */
export function mergeAssignments(coursesWithAssignments: readonly CourseAssignments[]): MergedAssignment[] {
  const byName = new Map<string, MergedAssignment>();

  for (const { course, assignments } of coursesWithAssignments) {
    const courseKey = String(course.id);

    for (const assignment of assignments) {
      const name = assignment.name || "Unnamed";
      const hasRubric = Array.isArray(assignment.rubric) && assignment.rubric.length > 0;
      const quizId = assignment.quiz_id ?? null;

      const existing = byName.get(name);
      if (!existing) {
        byName.set(name, {
          id: assignment.id,
          name,
          pointsPossible: assignment.points_possible ?? 0,
          courseName: course.name,
          courseIds: [course.id],
          assignmentIdsByCourse: { [courseKey]: assignment.id },
          quizIdsByCourse: { [courseKey]: quizId },
          hasRubric,
          isQuiz: quizId !== null,
        });
        continue;
      }

      if (courseKey in existing.assignmentIdsByCourse) {
        log("DEBUG", `Duplicate assignment name "${name}" in course ${course.id}, keeping first`);
        continue;
      }

      existing.courseIds.push(course.id);
      existing.assignmentIdsByCourse[courseKey] = assignment.id;
      existing.quizIdsByCourse[courseKey] = quizId;
      existing.hasRubric ||= hasRubric;
      existing.isQuiz ||= quizId !== null;
    }
  }

  return [...byName.values()];
}

export async function loadMergedAssignments(
  source: Pick<CanvasDataSource, "getAssignments">,
  courses: readonly SelectedCourse[],
): Promise<MergedAssignment[]> {
  const loaded: CourseAssignments[] = [];
  for (const course of courses) {
    loaded.push({ course, assignments: await source.getAssignments(course.id) });
  }
  const merged = mergeAssignments(loaded);
  log("INFO", `Merged ${merged.length} assignment(s) across ${courses.length} course(s)`);
  return merged;
}
