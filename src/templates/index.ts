export { TemplateStore, safeTemplateName, templateFileName, summarizeTemplate, readTemplateFile } from "./template-store.js";
export type { StoredTemplate } from "./template-store.js";
export { createTemplate, templateFromResolvedOutcomes } from "./template-builder.js";
export type { TemplateMeta } from "./template-builder.js";
export {
  TemplateFileSchema,
  TemplateOutcomeInputSchema,
  parseTemplate,
  templateToFile,
  templateFromFile,
  outcomeFromInput,
} from "./schema.js";
export type { TemplateFile, TemplateOutcomeInput } from "./schema.js";
export type * from "./types.js";
