/**
 * Canvas Outcome Reporter
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

import type {
  CanvasApiClientOptions,
  CacheTTLs,
  PaginatedRequestOptions,
  QueryParams,
  RequestOptions,
  TokenData,
} from "./types.js";
import { DEFAULT_CACHE_TTLS } from "./types.js";
import { ResponseCache } from "./cache.js";
import { TokenBucket } from "./rate-limiter.js";
import { nextPageUrl } from "./link-header.js";
import { ApiError, RateLimitError, NetworkError, PaginationError } from "./errors.js";
import { log } from "../utils/logger.js";

const PER_PAGE = 100; // Canvas maximum
const MAX_RETRY_AFTER_SECONDS = 120;

const AUTH_HINT =
  "Invalid API token or expired session. Run canvas-outcome-reporter-auth to store a new token.";

interface FetchedPage {
  text: string;
  link: string | null;
}

/**
 * Canvas REST client with bearer auth, caching, rate limiting and Link-header pagination.
 *
 * - HTTPS-only; pagination never follows links off the configured host
 * - Client-side token bucket, plus server-directed back-off on 429 /
 *   403 "Rate Limit Exceeded" (Canvas throttling)
 * - In-memory response cache with per-call TTLs
 * - 401: retry once if the token source has a different token, then throw
 * - Raw JSON passthrough; shaping happens in CanvasService
 */
export class CanvasApiClient {
  private readonly baseUrl: string;
  private readonly origin: string;
  private readonly tokenSource: CanvasApiClientOptions["tokenSource"];
  private readonly cache: ResponseCache<string>; // raw JSON text, parsed per caller
  private readonly rateLimiter: TokenBucket;
  private readonly ttls: CacheTTLs;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly defaultRetryAfterSeconds: number;

  constructor(options: CanvasApiClientOptions) {
    if (!options.baseUrl.startsWith("https://")) {
      throw new Error(
        "HTTPS is required for the Canvas API client. HTTP URLs are not allowed for security reasons.",
      );
    }

    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.origin = new URL(this.baseUrl).origin;
    this.tokenSource = options.tokenSource;
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.maxRetries = options.maxRetries ?? 3;
    this.defaultRetryAfterSeconds = options.defaultRetryAfterSeconds ?? 60;
    this.ttls = { ...DEFAULT_CACHE_TTLS, ...options.cacheTTLs };

    this.cache = new ResponseCache<string>();
    const rateLimitConfig = options.rateLimitConfig ?? {
      capacity: 10,
      refillRate: 3,
    };
    this.rateLimiter = new TokenBucket(rateLimitConfig.capacity, rateLimitConfig.refillRate);

    log("DEBUG", `CanvasApiClient initialized for ${this.baseUrl}`);
  }

  get host(): string {
    return this.baseUrl;
  }

  get cacheTTLs(): CacheTTLs {
    return this.ttls;
  }

  /**
   * GET a single JSON resource.
   *
   * @param path - API path (e.g., "/api/v1/users/self")
   * @throws ApiError on HTTP errors, RateLimitError when retries run out
   * @throws NetworkError on fetch failures and timeouts
   */
  async get<T>(path: string, options?: RequestOptions): Promise<T> {
    const url = this.buildUrl(path, options?.params);
    const load = async (): Promise<string> => {
      const page = await this.fetchPage(url, path);
      parseJson(page.text, path);
      return page.text;
    };

    const text = options?.ttl ? await this.cache.getOrLoad(url, options.ttl, load) : await load();
    const data: T = JSON.parse(text);
    return data;
  }

  /**
   * GET every page of a list endpoint, following rel="next" links.
   * per_page=100 is added unless the caller sets it.
   */
  async getAll<T>(path: string, options?: PaginatedRequestOptions): Promise<T[]> {
    const params: QueryParams = { per_page: PER_PAGE, ...options?.params };
    const url = this.buildUrl(path, params);
    const load = async (): Promise<string> => {
      const items: unknown[] = [];
      let next: string | null = url;
      let pages = 0;

      while (next) {
        const page = await this.fetchPage(next, path);
        appendItems(items, parseJson(page.text, path), path, options?.itemsKey);
        pages++;

        const link = nextPageUrl(page.link);
        next = null;
        if (link) {
          // Canvas may send a path relative to the API host
          const nextUrl = new URL(link, this.baseUrl);
          if (nextUrl.origin !== this.origin) {
            throw new PaginationError(path, link);
          }
          next = nextUrl.toString();
        }
      }

      log("DEBUG", `Fetched ${items.length} item(s) from ${path} in ${pages} page(s)`);
      return JSON.stringify(items);
    };

    const text = options?.ttl ? await this.cache.getOrLoad(url, options.ttl, load) : await load();
    const items: T[] = JSON.parse(text);
    return items;
  }

  private buildUrl(path: string, params?: QueryParams): string {
    const url = new URL(`${this.baseUrl}${path}`);
    for (const [key, value] of Object.entries(params ?? {})) {
      if (value === undefined) continue;
      if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
        url.searchParams.append(key, String(value));
      } else {
        for (const item of value) url.searchParams.append(key, String(item));
      }
    }
    return url.toString();
  }

  private async fetchPage(url: string, endpoint: string): Promise<FetchedPage> {
    const token = await this.tokenSource.getToken();
    if (!token) {
      throw new ApiError(401, endpoint, "Not authenticated. Run canvas-outcome-reporter-auth first.");
    }
    return this.request(url, endpoint, token, 0, false);
  }

  private async request(
    url: string,
    endpoint: string,
    token: TokenData,
    attempt: number,
    isAuthRetry: boolean,
  ): Promise<FetchedPage> {
    if (this.rateLimiter.availableTokens < 1) {
      log("DEBUG", `Rate limiter empty, ${endpoint} waits for a token`);
    }
    await this.rateLimiter.consume();

    let response: Response;
    try {
      log("DEBUG", `${attempt > 0 || isAuthRetry ? "Retrying" : "Requesting"} GET ${endpoint}`);
      response = await fetch(url, {
        method: "GET",
        headers: {
          Authorization: `Bearer ${token.accessToken}`,
          Accept: "application/json",
        },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new NetworkError(
        `Request to ${endpoint} failed: ${message}`,
        error instanceof Error ? error : undefined,
      );
    }

    if (response.status === 401) {
      if (!isAuthRetry) {
        const freshToken = await this.tokenSource.getToken();
        if (freshToken && freshToken.accessToken !== token.accessToken) {
          log("DEBUG", "401 response, retrying with updated token");
          return this.request(url, endpoint, freshToken, attempt, true);
        }
      }
      const body = await response.text();
      throw new ApiError(401, endpoint, AUTH_HINT, body);
    }

    if (response.status === 429 || response.status === 403) {
      const body = await response.text();
      const throttled = response.status === 429 || /rate limit exceeded/i.test(body);

      if (!throttled) {
        throw new ApiError(403, endpoint, "Insufficient permissions to access this resource", body);
      }

      const retryAfter = this.retryAfterSeconds(response.headers.get("Retry-After"));
      if (attempt >= this.maxRetries) {
        throw new RateLimitError(endpoint, retryAfter);
      }

      log("WARN", `Rate limited at ${endpoint}, waiting ${retryAfter}s (attempt ${attempt + 1}/${this.maxRetries})`);
      this.rateLimiter.pause(retryAfter * 1000);
      return this.request(url, endpoint, token, attempt + 1, isAuthRetry);
    }

    if (response.status === 404) {
      const body = await response.text();
      throw new ApiError(404, endpoint, "Resource not found", body);
    }

    if (!response.ok) {
      const body = await response.text();
      throw new ApiError(response.status, endpoint, response.statusText || "Request failed", body);
    }

    return { text: await response.text(), link: response.headers.get("Link") };
  }

  private retryAfterSeconds(header: string | null): number {
    const parsed = header ? Number.parseFloat(header) : NaN;
    const seconds = Number.isFinite(parsed) && parsed >= 0 ? parsed : this.defaultRetryAfterSeconds;
    return Math.min(seconds, MAX_RETRY_AFTER_SECONDS);
  }
}

function parseJson(text: string, endpoint: string): unknown {
  try {
    const body: unknown = JSON.parse(text);
    return body;
  } catch (error) {
    throw new NetworkError(
      `Invalid JSON from ${endpoint}`,
      error instanceof Error ? error : undefined,
    );
  }
}

function appendItems(items: unknown[], body: unknown, endpoint: string, itemsKey?: string): void {
  if (Array.isArray(body)) {
    items.push(...body);
    return;
  }
  if (itemsKey && isRecord(body)) {
    const wrapped = body[itemsKey];
    if (Array.isArray(wrapped)) {
      items.push(...wrapped);
      return;
    }
    log("WARN", `Page from ${endpoint} has no "${itemsKey}" array`);
    return;
  }
  if (body !== null) items.push(body);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
