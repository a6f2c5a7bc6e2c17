/**
 * ISA template loader: YAML text → labelled, validated IsaStructure.
 */

import * as yaml from "js-yaml";

import { ConfigParseError } from "../errors.js";
import { readTextFile } from "../study/loader.js";
import {
  DEFAULT_ISA_LABELS,
  IsaDocumentSchema,
  interpolateDocument,
  toIsaStructure,
  type IsaLabels,
  type IsaStructure,
} from "./schema.js";

/**
 * Parse template text.
 *
 * @param source - Where the text came from, used in error messages
 * @throws ConfigParseError on invalid YAML or an unsupported shape
 */
export function parseIsaTemplate(
  text: string,
  labels: IsaLabels = DEFAULT_ISA_LABELS,
  source = "ISA template"
): IsaStructure {
  let document: unknown;
  try {
    document = yaml.load(text);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigParseError(source, [{ path: "", message: `invalid YAML: ${message}` }], err);
  }

  const result = IsaDocumentSchema.safeParse(interpolateDocument(document, labels));
  if (!result.success) {
    throw new ConfigParseError(
      source,
      result.error.issues.map((issue) => ({
        path: issue.path.map(String).join("."),
        message: issue.message,
      }))
    );
  }
  return toIsaStructure(result.data);
}

/**
 * Load a template file.
 */
export function loadIsaTemplate(file: string, labels: IsaLabels = DEFAULT_ISA_LABELS): IsaStructure {
  return parseIsaTemplate(readTextFile(file), labels, file);
}
