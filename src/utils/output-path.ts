/**
 * Canvas Outcome Reporter
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

import fs from "node:fs/promises";
import path from "node:path";
import sanitizeFilename from "sanitize-filename";
import { ReportError } from "./errors.js";
import { log } from "./logger.js";

const MAX_CONFLICT_ATTEMPTS = 100;

/**
 * Sanitize a user-provided filename and resolve it inside baseDir.
 *
 * @param baseDir - Directory the file must stay in
 * @param filename - User-provided filename (potentially malicious)
 * @returns Validated absolute path within baseDir
 * @throws ReportError if nothing is left after sanitizing or the path escapes baseDir
 */
export function validateOutputPath(baseDir: string, filename: string): string {
  const sanitized = sanitizeFilename(filename.trim());

  if (!sanitized || sanitized === "." || sanitized === "..") {
    throw new ReportError(`Invalid report filename: "${filename}"`);
  }

  const fullPath = path.resolve(baseDir, sanitized);
  const resolvedBase = path.resolve(baseDir);

  if (!fullPath.startsWith(resolvedBase + path.sep)) {
    throw new ReportError("Report path must stay inside the output directory");
  }

  return fullPath;
}

export function withXlsxExtension(filename: string): string {
  return filename.toLowerCase().endsWith(".xlsx") ? filename : `${filename}.xlsx`;
}

async function exists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Resolve filename conflicts by appending (1), (2), etc.
 *
 * @returns First available filename (may be the original)
 */
export async function resolveFilenameConflict(dir: string, filename: string): Promise<string> {
  if (!(await exists(path.join(dir, filename)))) {
    return filename;
  }

  const ext = path.extname(filename);
  const basename = path.basename(filename, ext);

  for (let i = 1; i <= MAX_CONFLICT_ATTEMPTS; i++) {
    const candidate = `${basename} (${i})${ext}`;
    if (!(await exists(path.join(dir, candidate)))) {
      return candidate;
    }
  }

  throw new ReportError(`Could not find a free file name for ${filename} after ${MAX_CONFLICT_ATTEMPTS} attempts`);
}

/**
 * Create the output directory if needed and return a free .xlsx path in it.
 */
export async function prepareOutputPath(outputDir: string, filename: string): Promise<string> {
  const dir = path.resolve(outputDir);
  await fs.mkdir(dir, { recursive: true });

  const validated = validateOutputPath(dir, withXlsxExtension(filename));
  const resolved = await resolveFilenameConflict(dir, path.basename(validated));
  const finalPath = path.join(dir, resolved);

  log("DEBUG", `Report output path resolved to ${finalPath}`);
  return finalPath;
}
