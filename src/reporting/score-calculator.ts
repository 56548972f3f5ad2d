/**
 * Canvas Outcome Reporter
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

import type { QuizSubmissionQuestion } from "../canvas/types.js";
import { dataKey, type CollectedData } from "./data-collector.js";
import type {
  CellValue,
  OutcomeAssignment,
  OutcomeColumns,
  OutcomeReportTable,
  QuizGroupPart,
  ResolvedOutcome,
  RubricCriterionPart,
  ScoringOptions,
  StudentOutcomeResult,
  StudentRecord,
  StudentReportRow,
} from "./types.js";

export const STUDENT_ID_COLUMN = "Student ID";
export const STUDENT_NAME_COLUMN = "Student Name";
export const COURSE_ID_COLUMN = "Course ID";

interface PartTally {
  score: number;
  possible: number;
}

/** Round to the nearest integer, ties to even (62.5 -> 62, 63.5 -> 64). */
export function roundHalfEven(value: number): number {
  const floor = Math.floor(value);
  const diff = value - floor;
  if (diff > 0.5) return floor + 1;
  if (diff < 0.5) return floor;
  return floor % 2 === 0 ? floor : floor + 1;
}

export function isCorrect(question: QuizSubmissionQuestion): boolean {
  return question.correct === true || question.correct === "true";
}

export function assignmentColumn(outcome: ResolvedOutcome, assignmentName: string): string {
  return `${outcome.title} - ${assignmentName}`;
}

export function outcomeColumns(outcome: ResolvedOutcome): OutcomeColumns {
  return {
    title: outcome.title,
    assignmentColumns: outcome.assignments.map((a) => assignmentColumn(outcome, a.assignment.name)),
    totalColumn: `${outcome.title} Total (%)`,
    statusColumn: `${outcome.title} Status`,
  };
}

export function evaluateOutcome(
  earned: number,
  possible: number,
  threshold: number,
  options: ScoringOptions,
): StudentOutcomeResult {
  const percentage = possible > 0 ? (earned / possible) * 100 : 0;
  const met = percentage >= threshold;
  return {
    earned,
    possible,
    percentage,
    roundedPercentage: roundHalfEven(percentage),
    status: met ? "Met" : "Not Met",
    borderline: !met && percentage >= threshold - options.borderlineRange,
  };
}

/**
 * Build one report row per student with per-assignment cells, outcome totals
 * and Met / Not Met status. Rows are sorted by sortable name.
 */
export function computeOutcomeTable(
  outcomes: readonly ResolvedOutcome[],
  data: CollectedData,
  options: ScoringOptions,
): OutcomeReportTable {
  const perOutcome = outcomes.map(outcomeColumns);
  const columns = [STUDENT_ID_COLUMN, STUDENT_NAME_COLUMN, COURSE_ID_COLUMN];
  for (const cols of perOutcome) {
    columns.push(...cols.assignmentColumns, cols.totalColumn, cols.statusColumn);
  }

  const rows: StudentReportRow[] = [];

  for (const student of data.students.values()) {
    const values: Record<string, CellValue> = {
      [STUDENT_ID_COLUMN]: student.id,
      [STUDENT_NAME_COLUMN]: student.sortableName,
      [COURSE_ID_COLUMN]: student.courseIds[0] ?? null,
    };
    const results: Record<string, StudentOutcomeResult> = {};

    outcomes.forEach((outcome, i) => {
      const cols = perOutcome[i];
      let earned = 0;
      let possible = 0;

      outcome.assignments.forEach((outcomeAssignment, j) => {
        const tally = scoreAssignment(outcomeAssignment, student, data);
        values[cols.assignmentColumns[j]] = tally ? tally.score : null;
        if (tally) {
          earned += tally.score * outcomeAssignment.weight;
          possible += tally.possible * outcomeAssignment.weight;
        }
      });

      const result = evaluateOutcome(earned, possible, outcome.threshold, options);
      results[outcome.title] = result;
      values[cols.totalColumn] = result.roundedPercentage;
      values[cols.statusColumn] = result.status;
    });

    rows.push({
      studentId: student.id,
      studentName: student.sortableName,
      courseId: student.courseIds[0] ?? null,
      values,
      outcomes: results,
    });
  }

  rows.sort((a, b) => compareCodePoints(a.studentName, b.studentName));

  return { columns, outcomeColumns: perOutcome, rows };
}

/** Orders strings by Unicode code point, so characters outside the BMP sort after U+FFFF. */
export function compareCodePoints(a: string, b: string): number {
  const left = [...a];
  const right = [...b];
  const length = Math.min(left.length, right.length);
  for (let i = 0; i < length; i++) {
    const diff = (left[i].codePointAt(0) ?? 0) - (right[i].codePointAt(0) ?? 0);
    if (diff !== 0) return diff;
  }
  return left.length - right.length;
}

/** Unweighted score and possible points, or null when the student has no data. */
function scoreAssignment(
  { assignment, parts }: OutcomeAssignment,
  student: StudentRecord,
  data: CollectedData,
): PartTally | null {
  if (parts.length === 0 || parts.some((p) => p.type === "all_questions")) {
    const score = data.scores.get(assignment.id)?.get(student.id);
    if (score === undefined) return null;
    return { score, possible: assignment.pointsPossible };
  }

  // Sections carrying this assignment that the student is enrolled in, in assignment order
  const courses = assignment.courseIds.filter((id) => student.courseIds.includes(id));
  const total: PartTally = { score: 0, possible: 0 };

  for (const part of parts) {
    let tally: PartTally | null = null;
    if (part.type === "quiz_group") tally = scoreQuizGroup(part, assignment.quizIdsByCourse, courses, student, data);
    if (part.type === "rubric_criterion") {
      tally = scoreRubricCriterion(part, assignment.assignmentIdsByCourse, assignment.id, courses, student, data);
    }
    if (tally) {
      total.score += tally.score;
      total.possible += tally.possible;
    }
  }

  return total.possible > 0 || total.score > 0 ? total : null;
}

function scoreQuizGroup(
  part: QuizGroupPart,
  quizIdsByCourse: Record<string, number | null>,
  courses: readonly number[],
  student: StudentRecord,
  data: CollectedData,
): PartTally | null {
  for (const courseId of courses) {
    const key = String(courseId);
    const groupId: number | undefined = part.groupIdsByCourse[key];
    const quizId: number | null | undefined = quizIdsByCourse[key];
    if (!groupId || !quizId) continue;

    const questions = data.quizAnswers.get(dataKey(courseId, quizId, student.id))?.get(String(groupId));
    if (!questions) continue;

    // Possible points follow the questions the student actually received
    const questionPoints: number = part.questionPointsByCourse[key] ?? 0;
    const correct = questions.filter(isCorrect).length;
    return { score: correct * questionPoints, possible: questions.length * questionPoints };
  }
  return null;
}

function scoreRubricCriterion(
  part: RubricCriterionPart,
  assignmentIdsByCourse: Record<string, number>,
  fallbackAssignmentId: number,
  courses: readonly number[],
  student: StudentRecord,
  data: CollectedData,
): PartTally | null {
  for (const courseId of courses) {
    const key = String(courseId);
    const criterionId: string | undefined = part.criterionIdsByCourse[key];
    if (!criterionId) continue;

    const courseAssignmentId: number = assignmentIdsByCourse[key] ?? fallbackAssignmentId;
    const entry = data.rubricAssessments.get(dataKey(courseId, courseAssignmentId, student.id))?.[criterionId];
    if (!entry) continue;

    return { score: entry.points ?? 0, possible: part.points };
  }
  return null;
}
