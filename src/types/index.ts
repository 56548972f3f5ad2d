/**
 * Canvas Outcome Reporter
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

// Canvas API token plus the instance it was issued for
export interface TokenData {
  accessToken: string;
  baseUrl: string;
  capturedAt: number; // Unix timestamp ms
  expiresAt: number | null; // Unix timestamp ms, null for tokens without expiry
  source: "prompt" | "env" | "cache";
}

// Encrypted token stored on disk
export interface EncryptedData {
  iv: string; // hex-encoded initialization vector
  authTag: string; // hex-encoded GCM auth tag
  data: string; // hex-encoded ciphertext
}

// Session file persisted to <dataDir>/session/
export interface SessionFile {
  version: 1;
  encrypted: EncryptedData;
  createdAt: number; // Unix timestamp ms
  expiresAt: number | null;
}

// Excel fill colors (RGB hex, no leading #)
export interface ReportColors {
  met: string;
  notMet: string;
  borderline: string;
}

export interface ReportSettings {
  defaultThreshold: number; // percent
  borderlineRange: number; // percentage points below threshold
  timestampFiles: boolean;
  includeSummarySheet: boolean;
  colors: ReportColors;
}

// Application configuration
export interface AppConfig {
  baseUrl?: string;
  apiToken?: string;
  dataDir: string;
  configFile: string;
  sessionDir: string;
  templateDir: string;
  reportDir: string;
  timeoutMs: number;
  adminMode: boolean;
  logLevel: LogLevel;
  courseFilter: CourseFilterConfig;
  report: ReportSettings;
}

// Log levels
export type LogLevel = "DEBUG" | "INFO" | "WARN" | "ERROR";

// Course filtering configuration from environment variables / config store
export interface CourseFilterConfig {
  includeCourseIds?: number[];
  excludeCourseIds?: number[];
}
