/**
 * Canvas Outcome Reporter
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

import type { ProgressCallback } from "./types.js";

/** Forwards a progress value only when it is above the last one sent. */
export function increasingProgress(onProgress?: ProgressCallback): ProgressCallback {
  let last = Number.NEGATIVE_INFINITY;
  return (progress, message) => {
    if (progress <= last) return;
    last = progress;
    onProgress?.(progress, message);
  };
}
