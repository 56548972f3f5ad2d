import type { CanvasDataSource } from "../canvas/service.js";
import type { Course } from "../canvas/types.js";
import type { SelectedCourse } from "./types.js";

export function toSelectedCourse(course: Course): SelectedCourse {
  return {
    id: course.id,
    name: course.name,
    courseCode: course.course_code ?? "",
    termName: course.term?.name ?? null,
  };
}

/** Fetch the selected sections in the order given, dropping repeated ids. */
export async function loadSelectedCourses(
  source: Pick<CanvasDataSource, "getCourse">,
  courseIds: readonly number[],
): Promise<SelectedCourse[]> {
  const unique = [...new Set(courseIds)];
  const courses: SelectedCourse[] = [];
  for (const id of unique) {
    courses.push(toSelectedCourse(await source.getCourse(id)));
  }
  return courses;
}

/**
 * Course code used in report file names: leading letters and digits of the
 * first course name ("PSY 3421 Research Methods" -> "PSY3421").
 */
export function reportCourseCode(courses: readonly SelectedCourse[]): string {
  const first = courses[0];
  if (!first) return "Course";
  const match = /^([A-Z]+\s*\d+)/.exec(first.name);
  return match ? match[1].replace(/\s+/g, "") : "Course";
}

/** Default course code for a new template. */
export function templateCourseCode(courses: readonly SelectedCourse[]): string {
  const first = courses[0];
  if (!first) return "";
  if (first.courseCode.trim()) return first.courseCode.trim();
  return first.name.trim().split(/\s+/)[0] ?? "";
}
