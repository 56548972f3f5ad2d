/**
 * Canvas Outcome Reporter
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

// Canvas REST API shapes (only the fields this project reads)

export interface Term {
  id: number;
  name: string;
  start_at?: string | null;
  end_at?: string | null;
}

export interface Course {
  id: number;
  name: string;
  course_code: string;
  workflow_state?: string;
  account_id?: number;
  term?: Term | null;
  total_students?: number;
}

export interface User {
  id: number;
  name: string;
  sortable_name?: string;
  short_name?: string;
  login_id?: string;
}

export interface Account {
  id: number;
  name: string;
  parent_account_id?: number | null;
}

export interface RubricRating {
  id: string;
  description: string;
  points: number;
}

export interface RubricCriterion {
  id: string;
  description?: string | null;
  long_description?: string | null;
  points: number;
  ratings?: RubricRating[];
}

export interface Assignment {
  id: number;
  name: string;
  course_id: number;
  points_possible: number | null;
  quiz_id?: number | null;
  is_quiz_assignment?: boolean;
  submission_types?: string[];
  rubric?: RubricCriterion[] | null;
  due_at?: string | null;
  published?: boolean;
}

export interface Enrollment {
  id: number;
  user_id: number;
  course_id: number;
  type: string;
  enrollment_state: string;
  user?: User;
}

export interface RubricAssessmentEntry {
  points?: number | null;
  rating_id?: string | null;
  comments?: string | null;
}

export interface Submission {
  id: number;
  user_id: number;
  assignment_id: number;
  score: number | null;
  workflow_state: string;
  rubric_assessment?: Record<string, RubricAssessmentEntry> | null;
  user?: User;
}

export interface QuizQuestion {
  id: number;
  quiz_id: number;
  quiz_group_id: number | null;
  question_name?: string;
  points_possible?: number;
}

export interface QuizGroup {
  id: number;
  quiz_id: number;
  name: string | null;
  pick_count: number | null;
  question_points: number | null;
}

export interface QuizSubmission {
  id: number;
  quiz_id: number;
  user_id: number;
  submission_id?: number;
  workflow_state?: string;
  score?: number | null;
}

// Canvas sends `correct` as a boolean on most instances, as a string on some
export interface QuizSubmissionQuestion {
  id: number;
  quiz_group_id: number | null;
  correct?: boolean | string | null;
  flagged?: boolean;
}
