/**
 * Canvas Outcome Reporter
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { z } from "zod";
import { ConfigError } from "./errors.js";

const HexColorSchema = z.string().regex(/^[0-9A-Fa-f]{6}$/, "expected 6 hex digits");

/** JSON schema for <dataDir>/config.json */
export const ConfigStoreSchema = z.object({
  baseUrl: z.string().url().optional(),
  adminMode: z.boolean().optional(),
  includeCourses: z.array(z.number().int().positive()).optional(),
  excludeCourses: z.array(z.number().int().positive()).optional(),
  templateDir: z.string().min(1).optional(),
  reportDir: z.string().min(1).optional(),
  defaultThreshold: z.number().min(0).max(100).optional(),
  borderlineRange: z.number().min(0).max(100).optional(),
  timestampFiles: z.boolean().optional(),
  includeSummarySheet: z.boolean().optional(),
  colors: z
    .object({
      met: HexColorSchema.optional(),
      notMet: HexColorSchema.optional(),
      borderline: HexColorSchema.optional(),
    })
    .optional(),
});

export type ConfigStoreData = z.infer<typeof ConfigStoreSchema>;

export function configStoreExists(configFile: string): boolean {
  return fs.existsSync(configFile);
}

export function loadConfigStore(configFile: string): ConfigStoreData {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configFile, "utf-8"));
  } catch (error) {
    throw new ConfigError(
      `could not read ${configFile}`,
      error instanceof Error ? error : undefined,
    );
  }

  const parsed = ConfigStoreSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new ConfigError(`invalid ${configFile}: ${issues.join(", ")}`);
  }
  return parsed.data;
}

export function saveConfigStore(configFile: string, config: ConfigStoreData): void {
  const isWindows = process.platform === "win32";
  const configDir = path.dirname(configFile);
  if (!fs.existsSync(configDir)) {
    fs.mkdirSync(configDir, { recursive: true, ...(isWindows ? {} : { mode: 0o700 }) });
  }
  fs.writeFileSync(configFile, JSON.stringify(config, null, 2) + "\n", {
    ...(isWindows ? {} : { mode: 0o600 }),
  });
}

/** Merge a partial update into the stored config, creating the file if needed. */
export function updateConfigStore(
  configFile: string,
  update: Partial<ConfigStoreData>,
): ConfigStoreData {
  const current = configStoreExists(configFile) ? loadConfigStore(configFile) : {};
  const next = { ...current, ...update };
  saveConfigStore(configFile, next);
  return next;
}
