/**
 * ISA (Investigation, Study, Assay) directory templates.
 *
 * A template is a YAML mapping from names to:
 *   - null               → an empty directory
 *   - "text"             → a file with that content when the name contains
 *                          a dot, otherwise a directory whose README.md holds
 *                          the text
 *   - { _readme, … }     → a directory; `_readme` becomes its README.md and
 *                          the other keys are its children
 *
 * Labels are substituted into names and text before validation.
 */

import { z } from "zod";

export interface IsaLabels {
  readonly investigation: string;
  readonly study: string;
  readonly assay: string;
}

export const DEFAULT_ISA_LABELS: IsaLabels = {
  investigation: "My Investigation",
  study: "My Study",
  assay: "My Assay",
};

export const README_KEY = "_readme";
export const README_FILE_NAME = "README.md";

export type IsaNode =
  | { readonly kind: "empty" }
  | { readonly kind: "file"; readonly content: string }
  | { readonly kind: "directory"; readonly readme?: string; readonly children: IsaStructure };

export interface IsaEntry {
  readonly name: string;
  readonly node: IsaNode;
}

export type IsaStructure = readonly IsaEntry[];

// ---------------------------------------------------------------------------
// Labels
// ---------------------------------------------------------------------------

/**
 * Substitute `${INVESTIGATION_LABEL}`, `${STUDY_LABEL}` and `${ASSAY_LABEL}`,
 * then the `*_LABEL_SLUG` identifiers (`i_{inv}`, `s_{inv}{study}`,
 * `a_{inv}{study}{assay}`).
 */
export function interpolateLabels(text: string, labels: IsaLabels): string {
  const replacements: [string, string][] = [
    ["${INVESTIGATION_LABEL}", labels.investigation],
    ["${STUDY_LABEL}", labels.study],
    ["${ASSAY_LABEL}", labels.assay],
    ["INVESTIGATION_LABEL_SLUG", `i_${labels.investigation}`],
    ["STUDY_LABEL_SLUG", `s_${labels.investigation}${labels.study}`],
    ["ASSAY_LABEL_SLUG", `a_${labels.investigation}${labels.study}${labels.assay}`],
  ];
  return replacements.reduce((result, [token, value]) => result.replaceAll(token, () => value), text);
}

/**
 * Apply label substitution to every key and string in a parsed document.
 */
export function interpolateDocument(value: unknown, labels: IsaLabels): unknown {
  if (typeof value === "string") {
    return interpolateLabels(value, labels);
  }
  if (Array.isArray(value)) {
    return value.map((item: unknown) => interpolateDocument(item, labels));
  }
  if (typeof value === "object" && value !== null) {
    return Object.fromEntries(
      Object.entries(value).map(([key, item]: [string, unknown]) => [
        interpolateLabels(key, labels),
        interpolateDocument(item, labels),
      ])
    );
  }
  return value;
}

// ---------------------------------------------------------------------------
// Document schema
// ---------------------------------------------------------------------------

type IsaValue = null | string | { [name: string]: IsaValue };

const entryName = z
  .string()
  .min(1, "Name must not be empty")
  .refine((name) => name.trim() === name, "Name must not start or end with spaces")
  .refine((name) => !/[\\/]/.test(name), "Name must not contain a path separator")
  .refine((name) => name !== "." && name !== ".." && name !== "__proto__", "Name is not allowed");

function checkReadme(value: Record<string, IsaValue>, ctx: z.RefinementCtx): void {
  const readme = value[README_KEY];
  if (readme !== undefined && typeof readme !== "string") {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: [README_KEY], message: `${README_KEY} must be text` });
  }
}

const IsaValueSchema: z.ZodType<IsaValue> = z.lazy(() =>
  z.union([z.null(), z.string(), z.record(entryName, IsaValueSchema).superRefine(checkReadme)])
);

export const IsaDocumentSchema = z.record(entryName, IsaValueSchema).superRefine((document, ctx) => {
  if (README_KEY in document) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: [README_KEY],
      message: `${README_KEY} is only allowed inside a folder`,
    });
  }
});

export type IsaDocument = z.infer<typeof IsaDocumentSchema>;

// ---------------------------------------------------------------------------
// Conversion
// ---------------------------------------------------------------------------

const EMPTY: IsaNode = { kind: "empty" };

function toNode(name: string, value: IsaValue): IsaNode {
  if (value === null) {
    return EMPTY;
  }
  if (typeof value === "string") {
    return name.includes(".")
      ? { kind: "file", content: value }
      : { kind: "directory", readme: value, children: [] };
  }
  const { [README_KEY]: readme, ...children } = value;
  const structure = toIsaStructure(children);
  return typeof readme === "string"
    ? { kind: "directory", readme, children: structure }
    : { kind: "directory", children: structure };
}

/**
 * Convert a validated document to the tagged form, in document order.
 */
export function toIsaStructure(document: Readonly<Record<string, IsaValue>>): IsaStructure {
  return Object.entries(document).map(([name, value]) => ({ name, node: toNode(name, value) }));
}
