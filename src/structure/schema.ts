/**
 * Folder structure definitions.
 *
 * A structure document is a JSON object mapping folder names to:
 *   - null (or {})       → a folder with no children
 *   - ["a", "b"]         → a folder with one child folder per name
 *   - { "x": …, "y": … } → a folder whose children are described recursively
 *
 * Documents are parsed into the tagged FolderNode variant so every walk over
 * a structure handles each case explicitly.
 */

import { z } from "zod";

import { ConfigParseError } from "../errors.js";
import { readJsonFile } from "../study/loader.js";

export type FolderNode =
  | { readonly kind: "leaf" }
  | { readonly kind: "list"; readonly children: readonly string[] }
  | { readonly kind: "nested"; readonly children: FolderStructure };

export interface FolderEntry {
  readonly name: string;
  readonly node: FolderNode;
}

/** Ordered as in the source document. */
export type FolderStructure = readonly FolderEntry[];

const LEAF: FolderNode = { kind: "leaf" };

/** Structure used when no structure file is given. */
export const DEFAULT_FOLDER_STRUCTURE: FolderStructure = [
  { name: "raw", node: LEAF },
  { name: "processed", node: LEAF },
  { name: "metadata", node: LEAF },
];

// ---------------------------------------------------------------------------
// Document schema
// ---------------------------------------------------------------------------

type StructureValue = null | string[] | { [name: string]: StructureValue };

const folderName = z.string().trim().min(1, "Folder name must not be empty");

/**
 * Keys are checked on the raw object: trimming would merge "raw" and "raw "
 * and the record parser drops `__proto__`.
 */
function checkFolderKeys(value: unknown, ctx: z.RefinementCtx): void {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return;
  }
  const seen = new Map<string, string>();
  for (const key of Object.keys(value)) {
    const name = key.trim();
    if (name === "__proto__") {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: [key], message: `Folder name "${key}" is not allowed` });
      continue;
    }
    const first = seen.get(name);
    if (first === undefined) {
      seen.set(name, key);
    } else {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [key],
        message: `Folder name "${key}" duplicates "${first}"`,
      });
    }
  }
}

function folderMap(values: z.ZodType<StructureValue, z.ZodTypeDef, unknown>) {
  return z.unknown().superRefine(checkFolderKeys).pipe(z.record(folderName, values));
}

const StructureValueSchema: z.ZodType<StructureValue, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.union([z.null(), z.array(folderName), folderMap(StructureValueSchema)])
);

export const StructureDocumentSchema = folderMap(StructureValueSchema);

export type StructureDocument = z.infer<typeof StructureDocumentSchema>;

// ---------------------------------------------------------------------------
// Conversion
// ---------------------------------------------------------------------------

function toNode(value: StructureValue): FolderNode {
  if (value === null) {
    return LEAF;
  }
  if (Array.isArray(value)) {
    return { kind: "list", children: [...value] };
  }
  const children = toFolderStructure(value);
  return children.length === 0 ? LEAF : { kind: "nested", children };
}

/**
 * Convert a validated structure document to the tagged form.
 */
export function toFolderStructure(document: StructureDocument): FolderStructure {
  return Object.entries(document).map(([name, value]) => ({ name, node: toNode(value) }));
}

/**
 * Validate and convert a raw structure document.
 *
 * @param source - Where the document came from, used in error messages
 * @throws ConfigParseError if the document has the wrong shape
 */
export function parseFolderStructure(input: unknown, source = "folder structure"): FolderStructure {
  const result = StructureDocumentSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigParseError(
      source,
      result.error.issues.map((issue) => ({
        path: issue.path.map(String).join("."),
        message: issue.message,
      }))
    );
  }
  return toFolderStructure(result.data);
}

/**
 * Load a structure file.
 */
export function loadFolderStructure(file: string): FolderStructure {
  return parseFolderStructure(readJsonFile(file), file);
}
