/**
 * Canvas Outcome Reporter
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

import * as path from "node:path";
import type { AppConfig, LogLevel } from "../types/index.js";
import { configStoreExists, loadConfigStore } from "./config-store.js";
import type { ConfigStoreData } from "./config-store.js";
import { ConfigError } from "./errors.js";
import { isLogLevel } from "./logger.js";
import { defaultDataDir, expandTilde } from "./paths.js";

export const DEFAULT_COLORS = {
  met: "90EE90",
  notMet: "FFB6C1",
  borderline: "FFFFE0",
} as const;

/**
 * Build the application config. Environment variables win over the JSON
 * config store, which wins over defaults.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const dataDir = env.CANVAS_DATA_DIR ? expandTilde(env.CANVAS_DATA_DIR) : defaultDataDir();
  const configFile = env.CANVAS_CONFIG_FILE
    ? expandTilde(env.CANVAS_CONFIG_FILE)
    : path.join(dataDir, "config.json");

  const store: ConfigStoreData = configStoreExists(configFile) ? loadConfigStore(configFile) : {};

  const templateDir = env.CANVAS_TEMPLATE_DIR ?? store.templateDir;
  const reportDir = env.CANVAS_REPORT_DIR ?? store.reportDir;

  return {
    baseUrl: env.CANVAS_BASE_URL || store.baseUrl,
    apiToken: env.CANVAS_API_TOKEN || undefined,
    dataDir,
    configFile,
    sessionDir: env.CANVAS_SESSION_DIR
      ? expandTilde(env.CANVAS_SESSION_DIR)
      : path.join(dataDir, "session"),
    templateDir: templateDir ? expandTilde(templateDir) : path.join(dataDir, "templates"),
    reportDir: reportDir ? expandTilde(reportDir) : path.join(dataDir, "reports"),
    timeoutMs: parseNumber(env.CANVAS_TIMEOUT_MS, "CANVAS_TIMEOUT_MS") ?? 30_000,
    adminMode: parseBoolean(env.CANVAS_ADMIN_MODE) ?? store.adminMode ?? false,
    logLevel: parseLogLevel(env.LOG_LEVEL),
    courseFilter: {
      includeCourseIds: parseIdList(env.CANVAS_INCLUDE_COURSES) ?? store.includeCourses,
      excludeCourseIds: parseIdList(env.CANVAS_EXCLUDE_COURSES) ?? store.excludeCourses,
    },
    report: {
      defaultThreshold:
        parseNumber(env.REPORT_DEFAULT_THRESHOLD, "REPORT_DEFAULT_THRESHOLD") ??
        store.defaultThreshold ??
        70,
      borderlineRange:
        parseNumber(env.REPORT_BORDERLINE_RANGE, "REPORT_BORDERLINE_RANGE") ??
        store.borderlineRange ??
        5,
      timestampFiles: parseBoolean(env.REPORT_TIMESTAMP_FILES) ?? store.timestampFiles ?? true,
      includeSummarySheet:
        parseBoolean(env.REPORT_SUMMARY_SHEET) ?? store.includeSummarySheet ?? true,
      colors: { ...DEFAULT_COLORS, ...store.colors },
    },
  };
}

function parseNumber(value: string | undefined, name: string): number | undefined {
  if (value === undefined || value.trim() === "") return undefined;
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new ConfigError(`${name} must be a number, got "${value}"`);
  }
  return parsed;
}

function parseBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined || value.trim() === "") return undefined;
  return value.trim().toLowerCase() === "true";
}

function parseIdList(value: string | undefined): number[] | undefined {
  if (!value) return undefined;
  return value
    .split(",")
    .map((s) => parseInt(s.trim(), 10))
    .filter((n) => !isNaN(n));
}

function parseLogLevel(value: string | undefined): LogLevel {
  const level = value?.trim().toUpperCase();
  return level && isLogLevel(level) ? level : "INFO";
}

export type { AppConfig };
