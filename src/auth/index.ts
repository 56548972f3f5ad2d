/**
 * Canvas Outcome Reporter
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

export { TokenManager } from "./token-manager.js";
export type { TokenSource, TokenManagerOptions } from "./token-manager.js";
export { SessionStore } from "./session-store.js";
