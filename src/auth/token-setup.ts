/**
 * Canvas Outcome Reporter
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

import { loadConfig } from "../utils/config.js";
import { updateConfigStore } from "../utils/config-store.js";
import { TokenManager } from "./token-manager.js";
import type { TokenSource } from "./token-manager.js";
import { CanvasApiClient } from "../api/index.js";
import { CanvasService } from "../canvas/index.js";
import type { TokenData } from "../types/index.js";

/** Terminal seam for the token setup flow. */
export interface SetupConsole {
  question(prompt: string): Promise<string>;
  out(line: string): void;
  err(line: string): void;
}

function normalizeBaseUrl(input: string): string {
  const trimmed = input.trim().replace(/\/+$/, "");
  if (!/^https:\/\/[^/\s]+/.test(trimmed)) {
    throw new Error(`Canvas URL must start with https:// (got "${input.trim()}")`);
  }
  return trimmed;
}

/**
 * Prompt for a Canvas URL and token, verify them against /users/self and
 * store them. With --logout, remove the stored token instead.
 * Resolves to the process exit code.
 */
export async function runTokenSetup(
  args: readonly string[],
  io: SetupConsole,
  env: NodeJS.ProcessEnv = process.env,
): Promise<number> {
  try {
    const config = loadConfig(env);
    const tokenManager = new TokenManager({ sessionDir: config.sessionDir });

    if (args.includes("--logout")) {
      await tokenManager.clearToken();
      io.out(`Stored token removed from ${tokenManager.sessionFilePath}`);
      return 0;
    }

    io.out("\n=== Canvas Outcome Reporter Authentication ===\n");
    io.out("Create a token in Canvas under Account > Settings > Approved Integrations > New Access Token.\n");

    const urlPrompt = config.baseUrl ? `Canvas URL [${config.baseUrl}]: ` : "Canvas URL (e.g. https://canvas.example.edu): ";
    const urlAnswer = (await io.question(urlPrompt)).trim();
    const baseUrl = normalizeBaseUrl(urlAnswer || config.baseUrl || "");

    const accessToken = (await io.question("API token: ")).trim();
    if (!accessToken) {
      throw new Error("No token entered");
    }

    const token: TokenData = {
      accessToken,
      baseUrl,
      capturedAt: Date.now(),
      expiresAt: null,
      source: "prompt",
    };

    // Verify against Canvas before anything is written to disk
    io.out("\nVerifying token...");
    const candidate: TokenSource = { getToken: async () => token };
    const canvas = new CanvasService(
      new CanvasApiClient({ baseUrl, tokenSource: candidate, timeoutMs: config.timeoutMs }),
    );
    const user = await canvas.getSelf(false);

    await tokenManager.setToken(token);
    updateConfigStore(config.configFile, { baseUrl });

    io.out("\n=== Authentication successful! ===");
    io.out(`Signed in as ${user.name}`);
    io.out(`Session saved to ${tokenManager.sessionFilePath}`);
    io.out(`Canvas URL saved to ${config.configFile}`);
    io.out("\nThe MCP server will use this token automatically.\n");
    return 0;
  } catch (error) {
    io.err("\n=== Authentication failed ===");
    io.err(`\nError: ${error instanceof Error ? error.message : String(error)}`);
    io.err("\nTroubleshooting tips:");
    io.err("1. Check the Canvas URL; it is the address you see when logged in to Canvas");
    io.err("2. Copy the whole token; Canvas only shows it once when it is created");
    io.err("3. Make sure the token has not been deleted or expired in Canvas settings");
    io.err("4. Check that you have a stable internet connection");
    io.err("\nFor more details, check the error message above.\n");
    return 1;
  }
}
