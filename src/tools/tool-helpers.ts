/**
 * Canvas Outcome Reporter
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { ZodError } from "zod";
import { ApiError, RateLimitError, NetworkError, PaginationError } from "../api/index.js";
import { ReportError, TemplateError } from "../utils/errors.js";
import { log } from "../utils/logger.js";

/**
 * Wrap data as MCP-compatible tool result
 */
export function toolResponse(data: unknown): CallToolResult {
  return {
    content: [
      {
        type: "text",
        text: JSON.stringify(data, null, 2),
      },
    ],
  };
}

/**
 * Wrap error message as MCP-compatible tool result
 */
export function errorResponse(message: string): CallToolResult {
  return {
    content: [
      {
        type: "text",
        text: message,
      },
    ],
    isError: true,
  };
}

/**
 * Sanitize errors for user-friendly messages
 *
 * SECURITY: Never include stack traces, raw API responses, or token values
 */
export function sanitizeError(error: unknown): CallToolResult {
  // Log full error to stderr for debugging (token redaction handled by logger)
  log("ERROR", "Tool error", error);

  if (error instanceof RateLimitError) {
    return errorResponse(
      "Rate limited by Canvas. Please wait a minute and try again."
    );
  }

  if (error instanceof ApiError) {
    if (error.status === 404) {
      return errorResponse(
        "Resource not found. The course or item may not exist, or you may not have access."
      );
    }
    if (error.status === 401) {
      return errorResponse(
        "Authentication failed. Please run `canvas-outcome-reporter-auth` in your terminal to store a valid API token, then try again."
      );
    }
    if (error.status === 403) {
      return errorResponse(
        "Access denied. You may not have permission to access this resource."
      );
    }
  }

  if (error instanceof NetworkError) {
    return errorResponse(
      "Could not connect to Canvas. Check your internet connection and Canvas URL, then try again."
    );
  }

  if (error instanceof PaginationError) {
    return errorResponse(
      "Canvas returned a pagination link to another host, so the request was stopped."
    );
  }

  if (error instanceof ZodError) {
    const issues = error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    return errorResponse(`Invalid input: ${issues.join(", ")}`);
  }

  if (error instanceof TemplateError || error instanceof ReportError) {
    return errorResponse(error.message);
  }

  // Default fallback
  return errorResponse("An unexpected error occurred. Please try again.");
}
