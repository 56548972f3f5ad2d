/**
 * Canvas Outcome Reporter
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

import { z } from "zod";
import { TemplateOutcomeInputSchema } from "../templates/schema.js";

/**
 * Zod schemas for MCP tool input validation.
 * Their .shape is passed to the MCP SDK as inputSchema.
 * Also used in tool handlers for runtime parsing via .parse(args).
 */

const CourseIdsSchema = z
  .array(z.number().int().positive())
  .min(1)
  .describe("Canvas course IDs of the sections to include (from search_courses)");

export const SearchCoursesSchema = z.object({
  courseCode: z.string().optional().describe("Case-insensitive substring of the course code, e.g. 'PSY 3421'"),
  year: z.string().optional().describe("Substring of the term name, e.g. '2025'"),
  semester: z.string().optional().describe("Substring of the term name, e.g. 'Fall'"),
  adminMode: z
    .boolean()
    .optional()
    .describe("List every course in the accounts you administer instead of courses you teach"),
});

export const ListAssignmentsSchema = z.object({
  courseIds: CourseIdsSchema,
});

export const GetAssignmentPartsSchema = z.object({
  courseIds: CourseIdsSchema,
  assignmentName: z.string().min(1).describe("Exact assignment name (from list_assignments)"),
});

export const ListTemplatesSchema = z.object({
  courseCode: z.string().optional().describe("Only templates saved for this course code"),
});

export const TemplateKeySchema = z.object({
  courseCode: z.string().min(1).describe("Course code the template was saved under"),
  templateName: z.string().min(1).describe("Template name"),
});

export const SaveTemplateSchema = z.object({
  templateName: z.string().min(1).describe("Name for the template"),
  courseCode: z
    .string()
    .optional()
    .describe("Course code to save under. Defaults to the first selected course's code when courseIds is given."),
  createdBy: z.string().optional(),
  notes: z.string().optional(),
  outcomes: z.array(TemplateOutcomeInputSchema).min(1),
  courseIds: z
    .array(z.number().int().positive())
    .optional()
    .describe("When given, outcomes are matched against these courses first and only matched names are saved"),
});

export const ImportTemplateSchema = z.object({
  filePath: z.string().min(1).describe("Absolute path of the template JSON file to import"),
});

export const ExportTemplateSchema = TemplateKeySchema.extend({
  filePath: z.string().min(1).describe("Absolute path to write the template JSON to"),
});

const OutcomeSourceFields = {
  templateName: z.string().optional().describe("Saved template to apply (requires courseCode)"),
  courseCode: z.string().optional().describe("Course code of the saved template"),
  outcomes: z
    .array(TemplateOutcomeInputSchema)
    .optional()
    .describe("Outcome definitions to use instead of a saved template"),
};

export const PreviewOutcomesSchema = z.object({
  courseIds: CourseIdsSchema,
  ...OutcomeSourceFields,
});

export const GenerateReportSchema = z.object({
  courseIds: CourseIdsSchema,
  ...OutcomeSourceFields,
  outputDir: z.string().optional().describe("Directory for the workbook. Defaults to the configured report directory."),
  filename: z
    .string()
    .optional()
    .describe("Custom file name. Defaults to <course>_outcome_report_<timestamp>.xlsx"),
});

export type SearchCoursesInput = z.infer<typeof SearchCoursesSchema>;
export type SaveTemplateInput = z.infer<typeof SaveTemplateSchema>;
export type PreviewOutcomesInput = z.infer<typeof PreviewOutcomesSchema>;
export type GenerateReportInput = z.infer<typeof GenerateReportSchema>;
