/**
 * Canvas Outcome Reporter
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

import type { CourseFilterConfig } from "../types/index.js";
import type { Course } from "../canvas/types.js";
import { log } from "./logger.js";

export interface CourseSearchCriteria {
  courseCode?: string;
  year?: string;
  semester?: string;
}

/**
 * Filter courses for the search tool.
 *
 * Filter order:
 * 1. courseCode: case-insensitive substring of course_code
 * 2. year, semester: substrings of the term name
 * 3. includeCourseIds: whitelist from config
 * 4. excludeCourseIds: blacklist from config
 *
 * Blank criteria are ignored.
 */
export function applyCourseFilter<T extends Course>(
  courses: T[],
  criteria: CourseSearchCriteria,
  config: CourseFilterConfig = {}
): T[] {
  let filtered = courses;
  const originalCount = courses.length;

  const code = criteria.courseCode?.trim().toLowerCase();
  if (code) {
    filtered = filtered.filter(c => (c.course_code ?? "").toLowerCase().includes(code));
  }

  const year = criteria.year?.trim();
  if (year) {
    filtered = filtered.filter(c => (c.term?.name ?? "").includes(year));
  }

  const semester = criteria.semester?.trim();
  if (semester) {
    filtered = filtered.filter(c => (c.term?.name ?? "").includes(semester));
  }

  const include = config.includeCourseIds;
  if (include && include.length > 0) {
    filtered = filtered.filter(c => include.includes(c.id));
  }

  const exclude = config.excludeCourseIds;
  if (exclude && exclude.length > 0) {
    filtered = filtered.filter(c => !exclude.includes(c.id));
  }

  if (filtered.length !== originalCount) {
    log("DEBUG", `Course filter: ${originalCount} -> ${filtered.length} courses`, {
      criteria,
      include,
      exclude,
    });
  }

  return filtered;
}

export function courseDisplayName(course: Course): string {
  return `${course.name} (${course.term?.name ?? "No Term"})`;
}
