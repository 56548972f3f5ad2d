/**
 * Canvas Outcome Reporter
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

// In-memory response cache keyed by request URL. No disk persistence.
// Entries expire lazily on read; concurrent loads of one key share a promise.

interface CacheEntry<T> {
  data: T;
  expiresAt: number; // Unix timestamp ms
}

export class ResponseCache<T = unknown> {
  private entries = new Map<string, CacheEntry<T>>();
  private inFlight = new Map<string, Promise<T>>();

  set(key: string, value: T, ttlMs: number): void {
    this.entries.set(key, { data: value, expiresAt: Date.now() + ttlMs });
  }

  get(key: string): T | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (entry.expiresAt <= Date.now()) {
      this.entries.delete(key);
      return undefined;
    }
    return entry.data;
  }

  /**
   * Return the cached value, or run the loader once and cache its result.
   * Callers arriving while a load is pending share it. Rejections are not cached.
   */
  async getOrLoad(key: string, ttlMs: number, loader: () => Promise<T>): Promise<T> {
    const cached = this.get(key);
    if (cached !== undefined) return cached;

    const pending = this.inFlight.get(key);
    if (pending) return pending;

    const load = loader()
      .then((value) => {
        this.set(key, value, ttlMs);
        return value;
      })
      .finally(() => {
        this.inFlight.delete(key);
      });
    this.inFlight.set(key, load);
    return load;
  }
}
