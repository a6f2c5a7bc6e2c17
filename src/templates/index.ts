/**
 * Text templates for generated documents.
 */

export {
  parseTemplate,
  extractVariables,
  TemplateParseError,
  type ParsedTemplate,
  type ConditionalBlock,
} from "./template.js";
export {
  renderTemplate,
  resolveConditionals,
  TemplateRenderError,
  type TemplateContext,
} from "./renderer.js";
export {
  TemplateLoader,
  TemplateLoadError,
  BUNDLED_TEMPLATE_DIR,
  bundledTemplates,
} from "./loader.js";
