import type { CanvasDataSource, CanvasService } from "../canvas/service.js";
import type { TemplateStore } from "../templates/template-store.js";
import type { AppConfig } from "../types/index.js";

export type CanvasReader = CanvasDataSource & Pick<CanvasService, "getCourses">;

/** Dependencies shared by every tool handler. */
export interface ToolContext {
  canvas: CanvasReader;
  templates: TemplateStore;
  config: AppConfig;
}
