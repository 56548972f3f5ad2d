/**
 * Canvas Outcome Reporter
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

// Per-course maps are keyed by the stringified Canvas course id.
export type ByCourse<T> = Record<string, T>;

export interface SelectedCourse {
  id: number;
  name: string;
  courseCode: string;
  termName: string | null;
}

/** Same-named assignments across the selected sections, treated as one. */
export interface MergedAssignment {
  id: number; // first occurrence
  name: string;
  pointsPossible: number;
  courseName: string;
  courseIds: number[];
  assignmentIdsByCourse: ByCourse<number>;
  quizIdsByCourse: ByCourse<number | null>;
  hasRubric: boolean;
  isQuiz: boolean;
}

export interface QuizGroupPart {
  type: "quiz_group";
  name: string;
  groupIdsByCourse: ByCourse<number>;
  pickCountByCourse: ByCourse<number>;
  questionPointsByCourse: ByCourse<number>;
}

export interface RubricCriterionPart {
  type: "rubric_criterion";
  description: string;
  points: number;
  criterionIdsByCourse: ByCourse<string>;
}

/** A quiz without question groups; scored as the whole assignment. */
export interface AllQuestionsPart {
  type: "all_questions";
}

export type AssignmentPart = QuizGroupPart | RubricCriterionPart | AllQuestionsPart;

export type PartsKind = "quiz" | "rubric" | "quiz_and_rubric" | "whole";

export interface DiscoveredParts {
  assignmentName: string;
  kind: PartsKind;
  questionGroups: QuizGroupPart[];
  rubricCriteria: RubricCriterionPart[];
  /** Quiz with no groups: only "All Questions" can be picked. */
  offersAllQuestions: boolean;
}

export interface OutcomeAssignment {
  assignment: MergedAssignment;
  /** Empty means the whole assignment score is used. */
  parts: AssignmentPart[];
  weight: number;
}

export interface ResolvedOutcome {
  title: string;
  description: string;
  threshold: number;
  assignments: OutcomeAssignment[];
}

export interface ResolutionResult {
  outcomes: ResolvedOutcome[];
  warnings: string[];
}

export interface StudentRecord {
  id: number;
  name: string;
  sortableName: string;
  /** Enrolled courses in discovery order. */
  courseIds: number[];
}

export type ProgressCallback = (percent: number, message: string) => void;

export type CellValue = number | string | null;

export type OutcomeStatus = "Met" | "Not Met";

export interface StudentOutcomeResult {
  earned: number;
  possible: number;
  percentage: number;
  roundedPercentage: number;
  status: OutcomeStatus;
  borderline: boolean;
}

export interface StudentReportRow {
  studentId: number;
  studentName: string;
  courseId: number | null;
  values: Record<string, CellValue>;
  outcomes: Record<string, StudentOutcomeResult>;
}

export interface OutcomeColumns {
  title: string;
  assignmentColumns: string[];
  totalColumn: string;
  statusColumn: string;
}

export interface OutcomeReportTable {
  columns: string[];
  outcomeColumns: OutcomeColumns[];
  rows: StudentReportRow[];
}

export interface OutcomeStatistics {
  outcome: string;
  description: string;
  threshold: number;
  count: number;
  mean: number;
  median: number;
  stdDev: number;
  percentMeeting: number;
}

export interface ScoringOptions {
  borderlineRange: number;
}
