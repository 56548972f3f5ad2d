#!/usr/bin/env node
/**
 * Canvas Outcome Reporter
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

import "dotenv/config";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { enableStdoutGuard, log, setLogLevel } from "./utils/logger.js";
import { loadConfig } from "./utils/config.js";
import { seedTemplateDir } from "./utils/paths.js";
import { TokenManager } from "./auth/index.js";
import { CanvasApiClient } from "./api/index.js";
import { CanvasService } from "./canvas/index.js";
import { TemplateStore } from "./templates/index.js";
import {
  registerCheckAuth,
  registerSearchCourses,
  registerListAssignments,
  registerGetAssignmentParts,
  registerTemplateTools,
  registerPreviewOutcomes,
  registerGenerateReport,
} from "./tools/index.js";
import type { ToolContext } from "./tools/index.js";

// CRITICAL: Enable stdout guard IMMEDIATELY to prevent corruption of stdio transport
enableStdoutGuard();

// Unhandled rejection handler
process.on("unhandledRejection", (reason) => {
  log("ERROR", "Unhandled promise rejection", reason);
});

async function main(): Promise<void> {
  try {
    // Load configuration
    const config = loadConfig();
    setLogLevel(config.logLevel);
    log("DEBUG", "Configuration loaded", {
      dataDir: config.dataDir,
      templateDir: config.templateDir,
      reportDir: config.reportDir,
    });

    const tokenManager = new TokenManager({
      sessionDir: config.sessionDir,
      envToken: config.apiToken,
      baseUrl: config.baseUrl,
    });

    // The auth CLI stores the URL with the token; the environment can override it
    const storedToken = await tokenManager.getToken();
    const baseUrl = config.baseUrl || storedToken?.baseUrl;
    if (!baseUrl) {
      log("ERROR", "No Canvas URL configured. Run `canvas-outcome-reporter-auth` or set CANVAS_BASE_URL.");
      process.exit(1);
    }

    const apiClient = new CanvasApiClient({
      baseUrl,
      tokenSource: tokenManager,
      timeoutMs: config.timeoutMs,
    });
    const canvas = new CanvasService(apiClient);

    const seeded = await seedTemplateDir(config.templateDir);
    log("DEBUG", `Template directory ready (${seeded} bundled template(s) copied)`);

    const ctx: ToolContext = {
      canvas,
      templates: new TemplateStore(config.templateDir),
      config,
    };

    // Create MCP server instance
    const server = new McpServer({
      name: "canvas-outcome-reporter",
      version: "1.0.0",
    });
    log("DEBUG", "MCP Server instance created");

    if (config.courseFilter.includeCourseIds || config.courseFilter.excludeCourseIds) {
      log("DEBUG", "Course filter config", {
        include: config.courseFilter.includeCourseIds,
        exclude: config.courseFilter.excludeCourseIds,
      });
    }

    // Register MCP tools
    registerCheckAuth(server, tokenManager, canvas);
    registerSearchCourses(server, ctx);
    registerListAssignments(server, ctx);
    registerGetAssignmentParts(server, ctx);
    registerTemplateTools(server, ctx);
    registerPreviewOutcomes(server, ctx);
    registerGenerateReport(server, ctx);
    log("DEBUG", "MCP tools registered (11 tools)");

    // Connect stdio transport
    const transport = new StdioServerTransport();
    await server.connect(transport);

    log("INFO", `Canvas Outcome Reporter running on stdio for ${baseUrl}`);
    if (!storedToken) {
      log("WARN", "No API token stored yet. Run `canvas-outcome-reporter-auth` before using the tools.");
    }
  } catch (error) {
    log("ERROR", "MCP Server failed to start", error);
    process.exit(1);
  }
}

// Graceful shutdown
process.on("SIGINT", () => {
  log("INFO", "Shutting down MCP server");
  process.exit(0);
});
process.on("SIGTERM", () => {
  log("INFO", "Shutting down MCP server");
  process.exit(0);
});

void main();
