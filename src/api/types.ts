/**
 * Canvas Outcome Reporter
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

import type { TokenData } from "../types/index.js";
import type { TokenSource } from "../auth/token-manager.js";

// Cache TTL configuration in milliseconds
export interface CacheTTLs {
  profile: number; // ms - 1 hour
  courses: number; // ms - 10 min
  assignments: number; // ms - 10 min (includes rubrics)
  enrollments: number; // ms - 10 min
  quizStructure: number; // ms - 30 min (questions and groups)
}

// Submissions are deliberately absent: grades change while a report is being prepared
export const DEFAULT_CACHE_TTLS: CacheTTLs = {
  profile: 3_600_000, // 1 hour
  courses: 600_000, // 10 min
  assignments: 600_000, // 10 min
  enrollments: 600_000, // 10 min
  quizStructure: 1_800_000, // 30 min
};

// Token bucket rate limiter configuration
export interface RateLimitConfig {
  capacity: number; // max burst size (e.g., 10)
  refillRate: number; // tokens per second (e.g., 3)
}

// Query values; arrays become repeated keys (include[]=a&include[]=b)
export type QueryValue = string | number | boolean | ReadonlyArray<string | number>;
export type QueryParams = Record<string, QueryValue | undefined>;

export interface RequestOptions {
  params?: QueryParams;
  ttl?: number;
}

export interface PaginatedRequestOptions extends RequestOptions {
  /** Property holding the items when Canvas wraps the page in an object. */
  itemsKey?: string;
}

// Canvas API client constructor options
export interface CanvasApiClientOptions {
  baseUrl: string;
  tokenSource: TokenSource;
  cacheTTLs?: Partial<CacheTTLs>;
  rateLimitConfig?: RateLimitConfig;
  timeoutMs?: number; // default 30_000
  maxRetries?: number; // rate-limit retries, default 3
  defaultRetryAfterSeconds?: number; // when Retry-After is absent, default 60
}

export type { TokenData };
