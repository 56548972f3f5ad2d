/**
 * Canvas Outcome Reporter
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

import type { LogLevel } from "../types/index.js";

let currentLevel: LogLevel = "INFO";

const LEVEL_ORDER: Record<LogLevel, number> = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3,
};

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

/**
 * Redact sensitive patterns from log output.
 * Tokens are replaced with their first 8 chars + "...REDACTED".
 */
export function redact(value: string): string {
  // Bearer headers
  value = value.replace(
    /Bearer\s+([A-Za-z0-9._~+/=-]{8})[A-Za-z0-9._~+/=-]*/g,
    "Bearer $1...REDACTED",
  );
  // Canvas access tokens look like "<account digits>~<secret>"
  value = value.replace(
    /\b(\d+~[A-Za-z0-9]{4})[A-Za-z0-9]{12,}/g,
    "$1...REDACTED",
  );
  // Anything else that looks like a long opaque token
  value = value.replace(
    /(?<![\w/.])([A-Za-z0-9_+=-]{40,})/g,
    (match) => match.substring(0, 8) + "...REDACTED",
  );
  return value;
}

export function log(
  level: LogLevel,
  message: string,
  ...args: unknown[]
): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[currentLevel]) return;
  const timestamp = new Date().toISOString();
  const safeMessage = redact(message);
  console.error(`[${timestamp}] [${level}] ${safeMessage}`, ...args);
}

// Override console.log while serving stdio so stray writes cannot corrupt the transport
export function enableStdoutGuard(): void {
  console.log = (...args: unknown[]) => {
    console.error(
      "[WARN] console.log intercepted (would corrupt stdio):",
      ...args,
    );
  };
}
