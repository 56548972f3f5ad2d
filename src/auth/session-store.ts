/**
 * Canvas Outcome Reporter
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

import * as crypto from "node:crypto";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import * as os from "node:os";
import { z } from "zod";
import type { TokenData, EncryptedData, SessionFile } from "../types/index.js";
import { SessionStoreError } from "../utils/errors.js";
import { log } from "../utils/logger.js";

const SESSION_FILE_NAME = "session.json";
const SESSION_VERSION = 1;

// Encryption constants
const ALGORITHM = "aes-256-gcm";
const IV_LENGTH = 12; // GCM recommended IV length
const SALT = "canvas-outcome-reporter-salt";

const SessionFileSchema = z.object({
  version: z.literal(SESSION_VERSION),
  encrypted: z.object({
    iv: z.string(),
    authTag: z.string(),
    data: z.string(),
  }),
  createdAt: z.number(),
  expiresAt: z.number().nullable(),
});

const TokenDataSchema = z.object({
  accessToken: z.string().min(1),
  baseUrl: z.string().min(1),
  capturedAt: z.number(),
  expiresAt: z.number().nullable(),
  source: z.enum(["prompt", "env", "cache"]),
});

/**
 * SessionStore keeps the Canvas API token encrypted on disk.
 * Uses AES-256-GCM with a key derived from the OS username + hostname, so the
 * file is useless when copied to another account or machine.
 */
export class SessionStore {
  private readonly sessionDir: string;
  private readonly sessionFilePath: string;

  constructor(sessionDir: string) {
    this.sessionDir = sessionDir;
    this.sessionFilePath = path.join(this.sessionDir, SESSION_FILE_NAME);
  }

  get filePath(): string {
    return this.sessionFilePath;
  }

  private deriveKey(): Buffer {
    const keyMaterial = os.userInfo().username + os.hostname();
    return crypto.scryptSync(keyMaterial, SALT, 32);
  }

  encrypt(plaintext: string): EncryptedData {
    const key = this.deriveKey();
    const iv = crypto.randomBytes(IV_LENGTH);

    const cipher = crypto.createCipheriv(ALGORITHM, key, iv);

    let encrypted = cipher.update(plaintext, "utf8", "hex");
    encrypted += cipher.final("hex");

    return {
      iv: iv.toString("hex"),
      authTag: cipher.getAuthTag().toString("hex"),
      data: encrypted,
    };
  }

  /**
   * Throws if the auth tag does not verify (tampered or foreign file).
   */
  decrypt(encrypted: EncryptedData): string {
    const key = this.deriveKey();
    const iv = Buffer.from(encrypted.iv, "hex");
    const authTag = Buffer.from(encrypted.authTag, "hex");

    const decipher = crypto.createDecipheriv(ALGORITHM, key, iv);
    decipher.setAuthTag(authTag);

    let decrypted = decipher.update(encrypted.data, "hex", "utf8");
    decrypted += decipher.final("utf8");

    return decrypted;
  }

  async save(token: TokenData): Promise<void> {
    try {
      const isWindows = process.platform === "win32";
      await fs.mkdir(this.sessionDir, {
        recursive: true,
        ...(isWindows ? {} : { mode: 0o700 }),
      });

      const sessionFile: SessionFile = {
        version: SESSION_VERSION,
        encrypted: this.encrypt(JSON.stringify(token)),
        createdAt: Date.now(),
        expiresAt: token.expiresAt,
      };

      await fs.writeFile(this.sessionFilePath, JSON.stringify(sessionFile, null, 2), {
        encoding: "utf-8",
        ...(isWindows ? {} : { mode: 0o600 }),
      });

      log("DEBUG", `Session saved to ${this.sessionFilePath}`);
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      log("ERROR", `Failed to save session: ${err.message}`);
      throw new SessionStoreError("Failed to save session", err);
    }
  }

  /**
   * Load and decrypt the stored token.
   * Returns null if the file is missing, corrupted or cannot be decrypted.
   */
  async load(): Promise<TokenData | null> {
    let fileContent: string;
    try {
      fileContent = await fs.readFile(this.sessionFilePath, "utf-8");
    } catch {
      log("DEBUG", "No session file found");
      return null;
    }

    try {
      const sessionFile = SessionFileSchema.parse(JSON.parse(fileContent));
      const token = TokenDataSchema.parse(JSON.parse(this.decrypt(sessionFile.encrypted)));

      log("DEBUG", `Session loaded from ${this.sessionFilePath}`);
      return { ...token, source: "cache" };
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      log("WARN", `Failed to load session: ${err.message}`);
      return null;
    }
  }

  async clear(): Promise<void> {
    try {
      await fs.unlink(this.sessionFilePath);
      log("DEBUG", `Session cleared: ${this.sessionFilePath}`);
    } catch (error) {
      if (isErrnoException(error) && error.code === "ENOENT") return;
      const err = error instanceof Error ? error : new Error(String(error));
      log("WARN", `Failed to clear session: ${err.message}`);
    }
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}
