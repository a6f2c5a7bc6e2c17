/**
 * Template renderer.
 *
 * Processing order:
 *   1. Resolve `{{#if …}}` blocks against the context
 *   2. Every placeholder left in the text must have a value in the context
 *   3. Substitute
 *
 * Purely mechanical text substitution; no escaping is applied.
 */

import { StudyFolderError } from "../errors.js";
import { PLACEHOLDER_RE, extractVariables, type ParsedTemplate } from "./template.js";

/** Values available to a template. Undefined means "no value". */
export type TemplateContext = Readonly<Record<string, string | undefined>>;

export class TemplateRenderError extends StudyFolderError {
  constructor(
    public readonly templateName: string,
    public readonly missingVariables: string[]
  ) {
    super(
      `Cannot render template "${templateName}": context is missing ` +
        `value(s) for: ${missingVariables.join(", ")}`
    );
  }
}

function hasValue(value: string | undefined): value is string {
  return value !== undefined && value !== "";
}

/**
 * Resolve conditional blocks: keep the body when the variable has a value,
 * drop the whole block otherwise.
 */
export function resolveConditionals(template: ParsedTemplate, context: TemplateContext): string {
  let text = template.source;
  for (const block of template.conditionals) {
    const keep = hasValue(context[block.variable]);
    text = text.replace(block.raw, () => (keep ? block.body : ""));
  }
  return text;
}

/**
 * Render a parsed template.
 *
 * @throws TemplateRenderError if a placeholder in the resolved text has no value
 */
export function renderTemplate(template: ParsedTemplate, context: TemplateContext): string {
  const resolved =
    template.conditionals.length > 0 ? resolveConditionals(template, context) : template.source;

  const missing = extractVariables(resolved).filter((name) => context[name] === undefined);
  if (missing.length > 0) {
    throw new TemplateRenderError(template.name, missing);
  }

  return resolved.replace(PLACEHOLDER_RE, (_match, name: string) => context[name] ?? "");
}
