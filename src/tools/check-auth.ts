/**
 * Canvas Outcome Reporter
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { ApiError } from "../api/index.js";
import type { TokenManager } from "../auth/index.js";
import type { CanvasService } from "../canvas/service.js";
import { log } from "../utils/logger.js";
import { sanitizeError } from "./tool-helpers.js";

export interface AuthStatus {
  authenticated: boolean;
  message: string;
}

const AUTH_COMMAND = "canvas-outcome-reporter-auth";

export async function checkAuth(
  tokenManager: Pick<TokenManager, "getToken" | "clearToken">,
  canvas: Pick<CanvasService, "getSelf">,
): Promise<AuthStatus> {
  const token = await tokenManager.getToken();
  if (!token) {
    return {
      authenticated: false,
      message: `Not authenticated. Run \`${AUTH_COMMAND}\` in your terminal to store a Canvas API token.`,
    };
  }

  try {
    const user = await canvas.getSelf(false);
    log("INFO", `check_auth: token valid for user ${user.id}`);
    return {
      authenticated: true,
      message: `Authenticated with Canvas as ${user.name}. Token source: ${token.source}.`,
    };
  } catch (error) {
    if (error instanceof ApiError && error.status === 401) {
      if (token.source === "env") {
        return {
          authenticated: false,
          message: "The CANVAS_API_TOKEN environment variable holds a token Canvas rejected. Replace it and restart.",
        };
      }
      await tokenManager.clearToken();
      log("INFO", "check_auth: stored token rejected by Canvas and cleared");
      return {
        authenticated: false,
        message: `Canvas rejected the stored API token, so it was removed. Run \`${AUTH_COMMAND}\` to store a new one.`,
      };
    }
    throw error;
  }
}

/**
 * Register check_auth tool (zero-argument)
 */
export function registerCheckAuth(
  server: McpServer,
  tokenManager: TokenManager,
  canvas: CanvasService,
): void {
  server.registerTool(
    "check_auth",
    {
      title: "Check Authentication Status",
      description:
        "Check whether a valid Canvas API token is stored. " +
        `Run the ${AUTH_COMMAND} CLI first to authenticate. ` +
        "Use this when the user asks if they're logged in, or when other tools return auth errors.",
    },
    async () => {
      try {
        log("DEBUG", "check_auth tool called");
        const status = await checkAuth(tokenManager, canvas);
        return { content: [{ type: "text", text: status.message }] };
      } catch (error) {
        return sanitizeError(error);
      }
    }
  );
}
