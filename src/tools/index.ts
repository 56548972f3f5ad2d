/**
 * Canvas Outcome Reporter
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

// Tool registration functions - barrel export
export { registerCheckAuth } from "./check-auth.js";
export { registerSearchCourses } from "./search-courses.js";
export { registerListAssignments } from "./list-assignments.js";
export { registerGetAssignmentParts } from "./get-assignment-parts.js";
export { registerTemplateTools } from "./manage-templates.js";
export { registerPreviewOutcomes } from "./preview-outcomes.js";
export { registerGenerateReport } from "./generate-report.js";
export type { ToolContext, CanvasReader } from "./context.js";

// Re-export shared helpers and schemas for convenience
export { toolResponse, errorResponse, sanitizeError } from "./tool-helpers.js";
export * from "./schemas.js";
