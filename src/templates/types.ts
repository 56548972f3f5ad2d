/**
 * Canvas Outcome Reporter
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

// Templates store names only, never Canvas ids, so they carry over between semesters.

export interface TemplateQuestionGroup {
  name: string;
  selected: boolean;
}

export interface TemplateRubricCriterion {
  description: string;
  selected: boolean;
}

export type TemplateAssignmentType = "quiz" | "assignment" | "discussion" | "external_tool";

export interface TemplateAssignment {
  name: string;
  assignmentType: TemplateAssignmentType;
  included: boolean;
  weight: number;
  questionGroups: TemplateQuestionGroup[];
  rubricCriteria: TemplateRubricCriterion[];
}

export interface TemplateOutcome {
  title: string;
  description: string;
  threshold: number;
  included: boolean;
  assignments: TemplateAssignment[];
}

export interface CourseTemplate {
  templateName: string;
  courseCode: string;
  createdDate: Date;
  lastModified: Date;
  createdBy: string;
  notes: string;
  outcomes: TemplateOutcome[];
}

/** Listing entry; outcomes are summarised rather than returned in full. */
export interface TemplateSummary {
  templateName: string;
  courseCode: string;
  createdBy: string;
  createdDate: string;
  lastModified: string;
  notes: string;
  outcomeCount: number;
  outcomeTitles: string[];
}
