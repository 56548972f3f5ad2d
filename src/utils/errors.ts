/**
 * Canvas Outcome Reporter
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

export class ReporterError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    cause?: Error,
  ) {
    super(`[${code}] ${message}`, cause ? { cause } : undefined);
    this.name = "ReporterError";
  }
}

export class AuthError extends ReporterError {
  constructor(message: string, cause?: Error) {
    super("COR-1001", message, cause);
    this.name = "AuthError";
  }
}

export class SessionStoreError extends ReporterError {
  constructor(message: string, cause?: Error) {
    super("COR-1004", `Session store error: ${message}`, cause);
    this.name = "SessionStoreError";
  }
}

export class ConfigError extends ReporterError {
  constructor(message: string, cause?: Error) {
    super("COR-1005", `Configuration error: ${message}`, cause);
    this.name = "ConfigError";
  }
}

// Missing, malformed or duplicate report templates
export class TemplateError extends ReporterError {
  constructor(message: string, cause?: Error) {
    super("COR-1006", message, cause);
    this.name = "TemplateError";
  }
}

// Report cannot be produced from the selected data (no students, no outcomes, ...)
export class ReportError extends ReporterError {
  constructor(message: string, cause?: Error) {
    super("COR-1007", message, cause);
    this.name = "ReportError";
  }
}
