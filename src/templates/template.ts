/**
 * Document template parsing.
 *
 * A template is plain text with `{{variable}}` placeholders and optional
 * `{{#if variable}}…{{/if}}` blocks. A block is kept when its variable has
 * a non-empty value and dropped otherwise. When the opening and closing
 * tags sit on lines of their own, those lines disappear from the output.
 *
 * Rules:
 *   - Variable names are alphanumeric with `_` and `.`
 *   - Whitespace inside braces is trimmed: {{ studyTitle }} is valid
 *   - No nested blocks and no `{{#else}}`
 */

import { StudyFolderError } from "../errors.js";

// ---------------------------------------------------------------------------
// Regex
// ---------------------------------------------------------------------------

const NAME = "[a-zA-Z][a-zA-Z0-9_.]*";

/** Matches `{{variable}}`; group 1 is the name. */
export const PLACEHOLDER_RE = new RegExp(`\\{\\{\\s*(${NAME})\\s*\\}\\}`, "g");

/** Block whose tags are on their own lines. */
const STANDALONE_BLOCK_RE = new RegExp(
  `^[ \\t]*\\{\\{#if\\s+(${NAME})\\s*\\}\\}[ \\t]*\\r?\\n([\\s\\S]*?)^[ \\t]*\\{\\{\\/if\\}\\}[ \\t]*(?:\\r?\\n|$)`,
  "gm"
);

/** Block written inline within a line. */
const INLINE_BLOCK_RE = new RegExp(
  `\\{\\{#if\\s+(${NAME})\\s*\\}\\}([\\s\\S]*?)\\{\\{\\/if\\}\\}`,
  "g"
);

const OPEN_TAG_RE = /\{\{#if\b/g;
const CLOSE_TAG_RE = /\{\{\/if\}\}/g;

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ConditionalBlock {
  /** Variable tested for a non-empty value. */
  variable: string;
  /** Text inside the block. */
  body: string;
  /** Full block text including tags. */
  raw: string;
  standalone: boolean;
}

export interface ParsedTemplate {
  name: string;
  source: string;
  /** Unique placeholder names, sorted. */
  variables: string[];
  conditionals: ConditionalBlock[];
}

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export class TemplateParseError extends StudyFolderError {
  constructor(
    public readonly templateName: string,
    public readonly issues: string[]
  ) {
    super(`Template "${templateName}" is invalid:\n  - ${issues.join("\n  - ")}`);
  }
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

/**
 * Extract unique placeholder names from text, sorted.
 */
export function extractVariables(text: string): string[] {
  const names = new Set<string>();
  for (const match of text.matchAll(PLACEHOLDER_RE)) {
    if (match[1] !== undefined) names.add(match[1]);
  }
  return [...names].sort();
}

function collectBlocks(source: string): ConditionalBlock[] {
  const blocks: ConditionalBlock[] = [];
  for (const match of source.matchAll(STANDALONE_BLOCK_RE)) {
    blocks.push({ variable: match[1] ?? "", body: match[2] ?? "", raw: match[0], standalone: true });
  }
  const remainder = source.replace(STANDALONE_BLOCK_RE, "");
  for (const match of remainder.matchAll(INLINE_BLOCK_RE)) {
    blocks.push({ variable: match[1] ?? "", body: match[2] ?? "", raw: match[0], standalone: false });
  }
  return blocks;
}

/**
 * Parse and validate a template.
 *
 * @throws TemplateParseError on unbalanced or nested blocks
 */
export function parseTemplate(source: string, name: string): ParsedTemplate {
  const issues: string[] = [];

  const opens = source.match(OPEN_TAG_RE)?.length ?? 0;
  const closes = source.match(CLOSE_TAG_RE)?.length ?? 0;
  if (opens !== closes) {
    issues.push(`${opens} {{#if}} tag(s) but ${closes} {{/if}} tag(s)`);
  }

  const conditionals = collectBlocks(source);
  for (const block of conditionals) {
    if (OPEN_TAG_RE.test(block.body)) {
      issues.push(`nested block inside {{#if ${block.variable}}}`);
    }
    OPEN_TAG_RE.lastIndex = 0;
  }

  if (issues.length > 0) {
    throw new TemplateParseError(name, issues);
  }

  return {
    name,
    source,
    variables: extractVariables(source),
    conditionals,
  };
}
