/**
 * Canvas Outcome Reporter
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import {
  ExportTemplateSchema,
  ImportTemplateSchema,
  ListTemplatesSchema,
  SaveTemplateSchema,
  TemplateKeySchema,
  type SaveTemplateInput,
} from "./schemas.js";
import { toolResponse, sanitizeError } from "./tool-helpers.js";
import { loadCourseContext, loadTemplateOutcomes } from "./outcome-source.js";
import { resolveOutcomes } from "../reporting/outcome-resolver.js";
import { templateCourseCode } from "../reporting/course-selection.js";
import { createTemplate, templateFromResolvedOutcomes } from "../templates/template-builder.js";
import { summarizeTemplate } from "../templates/template-store.js";
import type { CourseTemplate, TemplateSummary } from "../templates/types.js";
import { TemplateError } from "../utils/errors.js";
import { log } from "../utils/logger.js";
import type { ToolContext } from "./context.js";

export interface SavedTemplateResult {
  template: TemplateSummary;
  filePath: string;
  warnings: string[];
}

export async function listTemplates(ctx: ToolContext, courseCode?: string): Promise<TemplateSummary[]> {
  return (await ctx.templates.list(courseCode)).map(summarizeTemplate);
}

export async function getTemplate(ctx: ToolContext, courseCode: string, templateName: string): Promise<CourseTemplate> {
  return ctx.templates.require(courseCode, templateName);
}

/**
 * Save outcome definitions as a template. With courseIds the outcomes are
 * matched against those sections first and only the matched names are kept.
 */
export async function saveTemplate(ctx: ToolContext, input: SaveTemplateInput): Promise<SavedTemplateResult> {
  const outcomes = await loadTemplateOutcomes(ctx, { outcomes: input.outcomes });
  let template: CourseTemplate;
  let warnings: string[] = [];

  if (input.courseIds && input.courseIds.length > 0) {
    const { courses, merged } = await loadCourseContext(ctx, input.courseIds);
    const resolution = await resolveOutcomes(ctx.canvas, merged, outcomes);
    warnings = resolution.warnings;

    if (resolution.outcomes.length === 0) {
      throw new TemplateError("None of the outcomes matched assignments in the selected courses; nothing was saved");
    }

    const courseCode = input.courseCode?.trim() || templateCourseCode(courses);
    if (!courseCode) {
      throw new TemplateError("courseCode is required to save a template");
    }
    template = templateFromResolvedOutcomes(
      { templateName: input.templateName, courseCode, createdBy: input.createdBy, notes: input.notes },
      resolution.outcomes,
    );
  } else {
    const courseCode = input.courseCode?.trim();
    if (!courseCode) {
      throw new TemplateError("courseCode is required when courseIds is not given");
    }
    template = createTemplate(
      { templateName: input.templateName, courseCode, createdBy: input.createdBy, notes: input.notes },
      outcomes,
    );
  }

  // Overwriting keeps the original creation date
  const existing = await ctx.templates.get(template.courseCode, template.templateName);
  if (existing) {
    template = { ...template, createdDate: existing.createdDate };
  }

  const saved = await ctx.templates.save(template);
  return { template: summarizeTemplate(saved.template), filePath: saved.filePath, warnings };
}

/**
 * Register the template management tools:
 * list_templates, get_template, save_template, delete_template, import_template, export_template
 */
export function registerTemplateTools(server: McpServer, ctx: ToolContext): void {
  server.registerTool(
    "list_templates",
    {
      title: "List Templates",
      description:
        "List saved outcome templates, newest course code first. Templates store assignment, " +
        "question group and rubric criterion names so they can be reused in later semesters.",
      inputSchema: ListTemplatesSchema.shape,
    },
    async (args) => {
      try {
        log("DEBUG", "list_templates tool called", { args });
        const { courseCode } = ListTemplatesSchema.parse(args);
        const templates = await listTemplates(ctx, courseCode);
        log("INFO", `list_templates: ${templates.length} template(s)`);
        return toolResponse(templates);
      } catch (error) {
        return sanitizeError(error);
      }
    }
  );

  server.registerTool(
    "get_template",
    {
      title: "Get Template",
      description: "Show a saved template with all its outcomes, assignments and selected parts.",
      inputSchema: TemplateKeySchema.shape,
    },
    async (args) => {
      try {
        log("DEBUG", "get_template tool called", { args });
        const { courseCode, templateName } = TemplateKeySchema.parse(args);
        return toolResponse(await getTemplate(ctx, courseCode, templateName));
      } catch (error) {
        return sanitizeError(error);
      }
    }
  );

  server.registerTool(
    "save_template",
    {
      title: "Save Template",
      description:
        "Save outcome definitions as a reusable template. Pass courseIds to check the names " +
        "against those sections first; unmatched names are reported and left out.",
      inputSchema: SaveTemplateSchema.shape,
    },
    async (args) => {
      try {
        log("DEBUG", "save_template tool called", { templateName: args.templateName });
        const input = SaveTemplateSchema.parse(args);
        const result = await saveTemplate(ctx, input);
        log("INFO", `save_template: saved "${input.templateName}" with ${result.warnings.length} warning(s)`);
        return toolResponse(result);
      } catch (error) {
        return sanitizeError(error);
      }
    }
  );

  server.registerTool(
    "delete_template",
    {
      title: "Delete Template",
      description: "Delete a saved template.",
      inputSchema: TemplateKeySchema.shape,
    },
    async (args) => {
      try {
        log("DEBUG", "delete_template tool called", { args });
        const { courseCode, templateName } = TemplateKeySchema.parse(args);
        const deleted = await ctx.templates.delete(courseCode, templateName);
        return toolResponse({ deleted, courseCode, templateName });
      } catch (error) {
        return sanitizeError(error);
      }
    }
  );

  server.registerTool(
    "import_template",
    {
      title: "Import Template",
      description: "Validate a template JSON file and copy it into the template library.",
      inputSchema: ImportTemplateSchema.shape,
    },
    async (args) => {
      try {
        log("DEBUG", "import_template tool called", { args });
        const { filePath } = ImportTemplateSchema.parse(args);
        const saved = await ctx.templates.import(filePath);
        log("INFO", `import_template: imported "${saved.template.templateName}"`);
        return toolResponse({ template: summarizeTemplate(saved.template), filePath: saved.filePath });
      } catch (error) {
        return sanitizeError(error);
      }
    }
  );

  server.registerTool(
    "export_template",
    {
      title: "Export Template",
      description: "Write a saved template to a JSON file, e.g. to share it with a colleague.",
      inputSchema: ExportTemplateSchema.shape,
    },
    async (args) => {
      try {
        log("DEBUG", "export_template tool called", { args });
        const { courseCode, templateName, filePath } = ExportTemplateSchema.parse(args);
        const template = await ctx.templates.require(courseCode, templateName);
        const written = await ctx.templates.export(template, filePath);
        return toolResponse({ filePath: written });
      } catch (error) {
        return sanitizeError(error);
      }
    }
  );
}
