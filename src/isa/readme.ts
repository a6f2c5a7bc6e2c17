/**
 * Project README for an ISA structure.
 */

import { bundledTemplates, renderTemplate, type TemplateLoader } from "../templates/index.js";
import { formatDate } from "../types/index.js";
import { DEFAULT_ISA_LABELS, type IsaLabels, type IsaNode, type IsaStructure } from "./schema.js";

export const ISA_README_TEMPLATE = "isa-readme.md";

export interface IsaReadmeInput {
  readonly structure: IsaStructure;
  readonly labels?: IsaLabels;
  readonly now?: Date;
  readonly templates?: TemplateLoader;
}

function describe(node: IsaNode): string {
  switch (node.kind) {
    case "empty":
      return "";
    case "file":
      return " - File";
    case "directory":
      return node.readme === undefined ? " - Directory" : " - Directory with README";
    default: {
      const unreachable: never = node;
      throw new Error(`Unknown ISA node: ${JSON.stringify(unreachable)}`);
    }
  }
}

/**
 * Markdown list of the structure, two spaces of indent per level.
 */
export function structureOverview(structure: IsaStructure, level = 0): string[] {
  const indent = "  ".repeat(level);
  return structure.flatMap((entry) => [
    `${indent}- \`${entry.name}\`${describe(entry.node)}`,
    ...(entry.node.kind === "directory" ? structureOverview(entry.node.children, level + 1) : []),
  ]);
}

export function renderProjectReadme(input: IsaReadmeInput): string {
  const labels = input.labels ?? DEFAULT_ISA_LABELS;
  const template = (input.templates ?? bundledTemplates()).load(ISA_README_TEMPLATE);
  return renderTemplate(template, {
    investigationLabel: labels.investigation,
    studyLabel: labels.study,
    assayLabel: labels.assay,
    dateCreated: formatDate(input.now ?? new Date()),
    structureOverview: structureOverview(input.structure).join("\n"),
  });
}
