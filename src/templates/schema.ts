/**
 * Canvas Outcome Reporter
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

import { z } from "zod";
import type { CourseTemplate, TemplateAssignment, TemplateOutcome } from "./types.js";

/**
 * On-disk template format. Field names are snake_case to stay compatible
 * with existing template files.
 */

const IsoDateSchema = z
  .string()
  .refine((value) => !Number.isNaN(Date.parse(value)), "expected an ISO date");

export const AssignmentTypeSchema = z.enum(["quiz", "assignment", "discussion", "external_tool"]);

const QuestionGroupFileSchema = z.object({
  name: z.string(),
  selected: z.boolean().default(true),
});

const RubricCriterionFileSchema = z.object({
  description: z.string(),
  selected: z.boolean().default(true),
});

const AssignmentFileSchema = z.object({
  name: z.string().min(1),
  assignment_type: AssignmentTypeSchema.default("assignment"),
  included: z.boolean().default(true),
  weight: z.number().min(0).default(1),
  question_groups: z.array(QuestionGroupFileSchema).default([]),
  rubric_criteria: z.array(RubricCriterionFileSchema).default([]),
});

const OutcomeFileSchema = z.object({
  title: z.string().min(1),
  description: z.string().default(""),
  threshold: z.number().min(0).max(100).default(70),
  included: z.boolean().default(true),
  assignments: z.array(AssignmentFileSchema).default([]),
});

export const TemplateFileSchema = z.object({
  template_name: z.string().min(1),
  course_code: z.string().min(1),
  created_date: IsoDateSchema,
  last_modified: IsoDateSchema,
  created_by: z.string().default("Unknown"),
  notes: z.string().default(""),
  outcomes: z.array(OutcomeFileSchema).default([]),
});

export type TemplateFile = z.infer<typeof TemplateFileSchema>;
type AssignmentFile = z.infer<typeof AssignmentFileSchema>;
type OutcomeFile = z.infer<typeof OutcomeFileSchema>;

function assignmentFromFile(file: AssignmentFile): TemplateAssignment {
  return {
    name: file.name,
    assignmentType: file.assignment_type,
    included: file.included,
    weight: file.weight,
    questionGroups: file.question_groups.map((g) => ({ name: g.name, selected: g.selected })),
    rubricCriteria: file.rubric_criteria.map((c) => ({ description: c.description, selected: c.selected })),
  };
}

function outcomeFromFile(file: OutcomeFile): TemplateOutcome {
  return {
    title: file.title,
    description: file.description,
    threshold: file.threshold,
    included: file.included,
    assignments: file.assignments.map(assignmentFromFile),
  };
}

export function templateFromFile(file: TemplateFile): CourseTemplate {
  return {
    templateName: file.template_name,
    courseCode: file.course_code,
    createdDate: new Date(file.created_date),
    lastModified: new Date(file.last_modified),
    createdBy: file.created_by,
    notes: file.notes,
    outcomes: file.outcomes.map(outcomeFromFile),
  };
}

export function templateToFile(template: CourseTemplate): TemplateFile {
  return {
    template_name: template.templateName,
    course_code: template.courseCode,
    created_date: template.createdDate.toISOString(),
    last_modified: template.lastModified.toISOString(),
    created_by: template.createdBy,
    notes: template.notes,
    outcomes: template.outcomes.map((outcome) => ({
      title: outcome.title,
      description: outcome.description,
      threshold: outcome.threshold,
      included: outcome.included,
      assignments: outcome.assignments.map((a) => ({
        name: a.name,
        assignment_type: a.assignmentType,
        included: a.included,
        weight: a.weight,
        question_groups: a.questionGroups.map((g) => ({ name: g.name, selected: g.selected })),
        rubric_criteria: a.rubricCriteria.map((c) => ({ description: c.description, selected: c.selected })),
      })),
    })),
  };
}

/** Parse untrusted JSON into a template; throws ZodError on a bad shape. */
export function parseTemplate(raw: unknown): CourseTemplate {
  return templateFromFile(TemplateFileSchema.parse(raw));
}

// Tool input shapes (camelCase), shared by save_template, preview and report tools

export const TemplateAssignmentInputSchema = z.object({
  name: z.string().min(1).describe("Assignment name, matched exactly across sections"),
  assignmentType: AssignmentTypeSchema.default("assignment"),
  included: z.boolean().default(true),
  weight: z.number().min(0).default(1).describe("Multiplier applied to earned and possible points"),
  questionGroups: z
    .array(z.object({ name: z.string(), selected: z.boolean().default(true) }))
    .default([])
    .describe('Quiz question groups to score, by group name. "All Questions" or empty uses the whole assignment.'),
  rubricCriteria: z
    .array(z.object({ description: z.string(), selected: z.boolean().default(true) }))
    .default([])
    .describe("Rubric criteria to score, by description. Empty uses the whole assignment."),
});

export const TemplateOutcomeInputSchema = z.object({
  title: z.string().min(1),
  description: z.string().default(""),
  threshold: z.number().min(0).max(100).optional().describe("Mastery threshold in percent (defaults to the configured threshold)"),
  included: z.boolean().default(true),
  assignments: z.array(TemplateAssignmentInputSchema).min(1),
});

export type TemplateOutcomeInput = z.infer<typeof TemplateOutcomeInputSchema>;

export function outcomeFromInput(input: TemplateOutcomeInput, defaultThreshold: number): TemplateOutcome {
  return {
    title: input.title,
    description: input.description,
    threshold: input.threshold ?? defaultThreshold,
    included: input.included,
    assignments: input.assignments.map((a) => ({
      name: a.name,
      assignmentType: a.assignmentType,
      included: a.included,
      weight: a.weight,
      questionGroups: a.questionGroups.map((g) => ({ name: g.name, selected: g.selected })),
      rubricCriteria: a.rubricCriteria.map((c) => ({ description: c.description, selected: c.selected })),
    })),
  };
}
