/**
 * Canvas Outcome Reporter
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { ZodError } from "zod";
import { TemplateError } from "../utils/errors.js";
import { log } from "../utils/logger.js";
import { parseTemplate, templateToFile } from "./schema.js";
import type { CourseTemplate, TemplateSummary } from "./types.js";

export interface StoredTemplate {
  template: CourseTemplate;
  filePath: string;
}

/** Letters, digits, space, "-" and "_" are kept; anything else becomes "_". */
export function safeTemplateName(name: string): string {
  return name.replace(/[^\p{L}\p{N} _-]/gu, "_");
}

export function templateFileName(courseCode: string, templateName: string): string {
  return `${safeTemplateName(courseCode)}_${safeTemplateName(templateName)}.json`;
}

export function summarizeTemplate(template: CourseTemplate): TemplateSummary {
  return {
    templateName: template.templateName,
    courseCode: template.courseCode,
    createdBy: template.createdBy,
    createdDate: template.createdDate.toISOString(),
    lastModified: template.lastModified.toISOString(),
    notes: template.notes,
    outcomeCount: template.outcomes.length,
    outcomeTitles: template.outcomes.map((o) => o.title),
  };
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

/**
 * Read a template file.
 *
 * @throws TemplateError when the file is missing, not JSON, or not a template
 */
export async function readTemplateFile(filePath: string): Promise<CourseTemplate> {
  let raw: unknown;
  try {
    raw = JSON.parse(await fs.readFile(filePath, "utf-8"));
  } catch (error) {
    throw new TemplateError(
      `Could not read template ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      error instanceof Error ? error : undefined,
    );
  }

  try {
    return parseTemplate(raw);
  } catch (error) {
    if (error instanceof ZodError) {
      const issues = error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
      throw new TemplateError(`Invalid template ${filePath}: ${issues.join(", ")}`, error);
    }
    throw error;
  }
}

export async function writeTemplateFile(filePath: string, template: CourseTemplate): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, JSON.stringify(templateToFile(template), null, 2) + "\n", "utf-8");
}

/**
 * Templates saved as one JSON file each, named `<course_code>_<name>.json`.
 */
export class TemplateStore {
  constructor(
    private readonly dir: string,
    private readonly now: () => Date = () => new Date(),
  ) {}

  get directory(): string {
    return this.dir;
  }

  /**
   * All readable templates, newest course code first, then most recently modified.
   * Unreadable files are skipped with a warning.
   */
  async listStored(courseCode?: string): Promise<StoredTemplate[]> {
    let files: string[];
    try {
      files = (await fs.readdir(this.dir)).filter((f) => f.endsWith(".json"));
    } catch (error) {
      if (isErrnoException(error) && error.code === "ENOENT") return [];
      throw error;
    }

    const stored: StoredTemplate[] = [];
    for (const file of files) {
      const filePath = path.join(this.dir, file);
      try {
        const template = await readTemplateFile(filePath);
        if (courseCode === undefined || template.courseCode === courseCode) {
          stored.push({ template, filePath });
        }
      } catch (error) {
        if (!(error instanceof TemplateError)) throw error;
        log("WARN", `Skipping template ${file}: ${error.message}`);
      }
    }

    stored.sort((a, b) => {
      if (a.template.courseCode !== b.template.courseCode) {
        return a.template.courseCode < b.template.courseCode ? 1 : -1;
      }
      return b.template.lastModified.getTime() - a.template.lastModified.getTime();
    });
    return stored;
  }

  async list(courseCode?: string): Promise<CourseTemplate[]> {
    return (await this.listStored(courseCode)).map((s) => s.template);
  }

  async get(courseCode: string, templateName: string): Promise<CourseTemplate | null> {
    const found = (await this.listStored(courseCode)).find((s) => s.template.templateName === templateName);
    return found?.template ?? null;
  }

  /** Like get, but a missing template is an error. */
  async require(courseCode: string, templateName: string): Promise<CourseTemplate> {
    const template = await this.get(courseCode, templateName);
    if (!template) {
      throw new TemplateError(`Template "${templateName}" for course ${courseCode} not found`);
    }
    return template;
  }

  /** Write the template, stamping last modified. Returns the saved copy and its path. */
  async save(template: CourseTemplate): Promise<StoredTemplate> {
    const saved: CourseTemplate = { ...template, lastModified: this.now() };
    const filePath = path.join(this.dir, templateFileName(saved.courseCode, saved.templateName));
    await writeTemplateFile(filePath, saved);
    log("INFO", `Saved template "${saved.templateName}" (${saved.courseCode}) to ${filePath}`);
    return { template: saved, filePath };
  }

  async delete(courseCode: string, templateName: string): Promise<boolean> {
    const found = (await this.listStored(courseCode)).find((s) => s.template.templateName === templateName);
    if (!found) return false;

    try {
      await fs.unlink(found.filePath);
    } catch (error) {
      if (isErrnoException(error) && error.code === "ENOENT") return false;
      throw error;
    }
    log("INFO", `Deleted template "${templateName}" (${courseCode})`);
    return true;
  }

  /** Write the template to exactly `filePath`, outside the store. */
  async export(template: CourseTemplate, filePath: string): Promise<string> {
    const target = path.resolve(filePath);
    await writeTemplateFile(target, template);
    log("INFO", `Exported template "${template.templateName}" to ${target}`);
    return target;
  }

  /** Validate a template file and save a copy into the store. */
  async import(filePath: string): Promise<StoredTemplate> {
    const template = await readTemplateFile(path.resolve(filePath));
    return this.save(template);
  }
}
