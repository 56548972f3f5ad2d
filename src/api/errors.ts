/**
 * Canvas Outcome Reporter
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

import { ReporterError } from "../utils/errors.js";

// Base class for all HTTP API errors
export class ApiError extends ReporterError {
  constructor(
    public readonly status: number,
    public readonly endpoint: string,
    message: string,
    public readonly responseBody?: string,
    cause?: Error,
  ) {
    super("COR-1100", `API error (${status}) at ${endpoint}: ${message}`, cause);
    this.name = "ApiError";
  }
}

// Rate limit error (429, or Canvas's 403 "Rate Limit Exceeded") after retries ran out
export class RateLimitError extends ApiError {
  constructor(
    endpoint: string,
    public readonly retryAfter?: number, // seconds
  ) {
    const message = retryAfter
      ? `Rate limited, retry after ${retryAfter}s`
      : "Rate limited";
    super(429, endpoint, message);
    this.name = "RateLimitError";
  }
}

// Network-level error (no HTTP status code)
// For fetch failures, timeouts, DNS errors
export class NetworkError extends ReporterError {
  constructor(message: string, cause?: Error) {
    super("COR-1101", `Network error: ${message}`, cause);
    this.name = "NetworkError";
  }
}

// A Link header pointed somewhere other than the configured Canvas host
export class PaginationError extends ReporterError {
  constructor(
    public readonly endpoint: string,
    public readonly nextUrl: string,
  ) {
    super("COR-1102", `Refusing to follow pagination link off the Canvas host at ${endpoint}: ${nextUrl}`);
    this.name = "PaginationError";
  }
}
