/**
 * Canvas Outcome Reporter
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

import type { CanvasDataSource } from "../canvas/service.js";
import type { QuizSubmissionQuestion, RubricAssessmentEntry } from "../canvas/types.js";
import { ReportError } from "../utils/errors.js";
import { log } from "../utils/logger.js";
import { increasingProgress } from "./progress.js";
import type { MergedAssignment, ProgressCallback, ResolvedOutcome, StudentRecord } from "./types.js";

type CollectorSource = Pick<
  CanvasDataSource,
  "getEnrollments" | "getSubmissions" | "getQuizSubmissions" | "getQuizSubmissionQuestions"
>;

export type RubricAssessment = Record<string, RubricAssessmentEntry>;

/** Questions a student received, grouped by stringified quiz_group_id. */
export type QuizAnswersByGroup = Map<string, QuizSubmissionQuestion[]>;

export interface CollectedData {
  /** Insertion order follows enrollment discovery. */
  students: Map<number, StudentRecord>;
  /** merged assignment id -> student id -> graded score */
  scores: Map<number, Map<number, number>>;
  /** dataKey(course, course assignment id, student) -> assessment */
  rubricAssessments: Map<string, RubricAssessment>;
  /** dataKey(course, quiz id, student) -> questions by group */
  quizAnswers: Map<string, QuizAnswersByGroup>;
}

export function dataKey(courseId: number, itemId: number, studentId: number): string {
  return `${courseId}:${itemId}:${studentId}`;
}

/** Every course the outcomes touch, or the selected courses when none do. */
export function reportCourseIds(
  outcomes: readonly ResolvedOutcome[],
  fallbackCourseIds: readonly number[],
): number[] {
  const ids = new Set<number>();
  for (const outcome of outcomes) {
    for (const { assignment } of outcome.assignments) {
      for (const id of assignment.courseIds) ids.add(id);
    }
  }
  return ids.size > 0 ? [...ids] : [...new Set(fallbackCourseIds)];
}

/**
 * Fetch enrollments, submissions, rubric assessments and quiz answers for a report.
 * Only data from students enrolled in the course it came from is kept.
 *
 * @throws ReportError when the courses have no active students
 */
export async function collectReportData(
  source: CollectorSource,
  outcomes: readonly ResolvedOutcome[],
  fallbackCourseIds: readonly number[],
  onProgress?: ProgressCallback,
): Promise<CollectedData> {
  const progress = increasingProgress(onProgress);
  const courseIds = reportCourseIds(outcomes, fallbackCourseIds);

  progress(10, "Fetching students...");
  const students = await collectStudents(source, courseIds);
  if (students.size === 0) {
    throw new ReportError(
      "No students found in the selected courses. Make sure students are enrolled in these courses.",
    );
  }
  log("INFO", `Found ${students.size} student(s) across ${courseIds.length} course(s)`);

  const isEnrolled = (studentId: number, courseId: number): boolean =>
    students.get(studentId)?.courseIds.includes(courseId) ?? false;

  // Distinct merged assignments, first use wins
  const assignments = new Map<number, MergedAssignment>();
  const quizAssignments = new Map<number, MergedAssignment>();
  for (const outcome of outcomes) {
    for (const { assignment, parts } of outcome.assignments) {
      if (!assignments.has(assignment.id)) assignments.set(assignment.id, assignment);
      if (parts.some((p) => p.type === "quiz_group") && !quizAssignments.has(assignment.id)) {
        quizAssignments.set(assignment.id, assignment);
      }
    }
  }

  progress(20, "Fetching assignment submissions...");
  const scores = new Map<number, Map<number, number>>();
  const rubricAssessments = new Map<string, RubricAssessment>();

  let index = 0;
  for (const assignment of assignments.values()) {
    const assignmentScores = new Map<number, number>();
    scores.set(assignment.id, assignmentScores);

    for (const courseId of assignment.courseIds) {
      const courseAssignmentId = assignment.assignmentIdsByCourse[String(courseId)] ?? assignment.id;
      const submissions = await source.getSubmissions(courseId, courseAssignmentId);

      for (const submission of submissions) {
        const studentId = submission.user_id;
        if (!isEnrolled(studentId, courseId)) continue;

        if (submission.workflow_state === "graded" && submission.score !== null && submission.score !== undefined) {
          assignmentScores.set(studentId, submission.score);
        }

        const assessment = submission.rubric_assessment;
        if (assessment && Object.keys(assessment).length > 0) {
          rubricAssessments.set(dataKey(courseId, courseAssignmentId, studentId), assessment);
        }
      }
    }

    index++;
    progress(
      20 + Math.floor((index / assignments.size) * 14),
      `Fetching submissions... (${index}/${assignments.size} assignments)`,
    );
  }

  progress(35, "Fetching quiz data...");
  const quizAnswers = new Map<string, QuizAnswersByGroup>();

  index = 0;
  for (const assignment of quizAssignments.values()) {
    for (const courseId of assignment.courseIds) {
      const quizId = assignment.quizIdsByCourse[String(courseId)];
      if (quizId === null || quizId === undefined) continue;

      const quizSubmissions = await source.getQuizSubmissions(courseId, quizId);
      for (const quizSubmission of quizSubmissions) {
        const studentId = quizSubmission.user_id;
        if (!isEnrolled(studentId, courseId)) continue;

        const questions = await source.getQuizSubmissionQuestions(quizSubmission.id);
        quizAnswers.set(dataKey(courseId, quizId, studentId), groupQuestions(questions));
      }
    }

    index++;
    progress(
      35 + Math.floor((index / quizAssignments.size) * 19),
      `Fetching quiz data... (${index}/${quizAssignments.size} quizzes)`,
    );
  }

  progress(55, "Student data collected");
  log(
    "DEBUG",
    `Collected ${rubricAssessments.size} rubric assessment(s) and ${quizAnswers.size} quiz submission(s)`,
  );

  return { students, scores, rubricAssessments, quizAnswers };
}

async function collectStudents(
  source: CollectorSource,
  courseIds: readonly number[],
): Promise<Map<number, StudentRecord>> {
  const students = new Map<number, StudentRecord>();

  for (const courseId of courseIds) {
    const enrollments = await source.getEnrollments(courseId);
    for (const enrollment of enrollments) {
      const studentId = enrollment.user?.id ?? enrollment.user_id;
      if (!studentId) continue;

      let student = students.get(studentId);
      if (!student) {
        student = {
          id: studentId,
          name: enrollment.user?.name ?? "Unknown",
          sortableName: enrollment.user?.sortable_name ?? "Unknown",
          courseIds: [],
        };
        students.set(studentId, student);
      }
      if (!student.courseIds.includes(courseId)) student.courseIds.push(courseId);
    }
  }

  return students;
}

function groupQuestions(questions: readonly QuizSubmissionQuestion[]): QuizAnswersByGroup {
  const byGroup: QuizAnswersByGroup = new Map();
  for (const question of questions) {
    if (!question.quiz_group_id) continue;
    const key = String(question.quiz_group_id);
    const list = byGroup.get(key);
    if (list) list.push(question);
    else byGroup.set(key, [question]);
  }
  return byGroup;
}
