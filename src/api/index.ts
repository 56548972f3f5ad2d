/**
 * Canvas Outcome Reporter
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

// Canvas API client and infrastructure

export { CanvasApiClient } from "./client.js";

// Cache, rate limiting, pagination
export { ResponseCache } from "./cache.js";
export { TokenBucket } from "./rate-limiter.js";
export { parseLinkHeader, nextPageUrl } from "./link-header.js";

// Errors
export { ApiError, RateLimitError, NetworkError, PaginationError } from "./errors.js";

// Types
export type {
  CacheTTLs,
  RateLimitConfig,
  CanvasApiClientOptions,
  QueryParams,
  QueryValue,
  RequestOptions,
  PaginatedRequestOptions,
} from "./types.js";
export { DEFAULT_CACHE_TTLS } from "./types.js";
