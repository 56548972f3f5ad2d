import type { TokenData } from "../types/index.js";
import { SessionStore } from "./session-store.js";
import { log } from "../utils/logger.js";

/**
 * Tokens within this time of expiry are considered invalid so they cannot
 * lapse halfway through a multi-request report run.
 */
const REFRESH_BUFFER_MS = 5 * 60 * 1000; // 5 minutes

/** Anything that can hand the API client a token. */
export interface TokenSource {
  getToken(): Promise<TokenData | null>;
}

export interface TokenManagerOptions {
  sessionDir: string;
  /** Token supplied via CANVAS_API_TOKEN; takes precedence over the session file. */
  envToken?: string;
  /** Base URL paired with the env token. */
  baseUrl?: string;
}

/**
 * TokenManager manages the Canvas token with in-memory caching and
 * encrypted disk persistence.
 */
export class TokenManager implements TokenSource {
  private cachedToken: TokenData | null = null;
  private readonly sessionStore: SessionStore;
  private readonly envToken: TokenData | null;

  constructor(options: TokenManagerOptions) {
    this.sessionStore = new SessionStore(options.sessionDir);
    this.envToken = options.envToken
      ? {
          accessToken: options.envToken,
          baseUrl: options.baseUrl ?? "",
          capturedAt: Date.now(),
          expiresAt: null,
          source: "env",
        }
      : null;
  }

  get sessionFilePath(): string {
    return this.sessionStore.filePath;
  }

  /**
   * Get the current token if valid, otherwise null.
   * Order: environment token, memory cache, session file.
   */
  async getToken(): Promise<TokenData | null> {
    if (this.envToken) {
      return this.envToken;
    }

    if (this.cachedToken && this.isValid(this.cachedToken)) {
      log("DEBUG", "Returning cached token");
      return this.cachedToken;
    }

    const storedToken = await this.sessionStore.load();
    if (storedToken && this.isValid(storedToken)) {
      log("DEBUG", "Loaded valid token from session store");
      this.cachedToken = storedToken;
      return storedToken;
    }

    log("DEBUG", "No valid token available");
    return null;
  }

  async setToken(token: TokenData): Promise<void> {
    this.cachedToken = token;
    await this.sessionStore.save(token);
    log("DEBUG", "Token cached and persisted");
  }

  async clearToken(): Promise<void> {
    this.cachedToken = null;
    await this.sessionStore.clear();
    log("DEBUG", "Token cleared from memory and disk");
  }

  /**
   * Tokens without an expiry (the Canvas default for manual tokens) are
   * always valid; others must expire more than REFRESH_BUFFER_MS from now.
   */
  isValid(token: TokenData): boolean {
    if (token.expiresAt === null) return true;

    const timeUntilExpiry = token.expiresAt - Date.now();
    const valid = timeUntilExpiry > REFRESH_BUFFER_MS;

    if (!valid) {
      log(
        "DEBUG",
        `Token invalid: expires in ${Math.round(timeUntilExpiry / 1000)}s (buffer: ${REFRESH_BUFFER_MS / 1000}s)`,
      );
    }

    return valid;
  }
}
