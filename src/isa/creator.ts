/**
 * Creates an ISA directory structure.
 *
 * Creation is additive, as for study folders: directories are created when
 * missing, and files (README.md files included) are written only when
 * nothing exists at their path. Nothing is overwritten or removed.
 */

import { join, resolve } from "node:path";

import { silentLogger, type Logger } from "../logging/index.js";
import { ensureDirectory, ensureFile, type EntryStatus } from "../structure/index.js";
import type { TemplateLoader } from "../templates/index.js";
import { renderProjectReadme } from "./readme.js";
import { DEFAULT_ISA_LABELS, README_FILE_NAME, type IsaLabels, type IsaStructure } from "./schema.js";

export interface IsaRecord {
  readonly path: string;
  readonly kind: "directory" | "file";
  readonly status: EntryStatus;
}

export interface CreateIsaStructureOptions {
  readonly structure: IsaStructure;
  /** Base directory, created when missing; defaults to the working directory */
  readonly targetPath?: string;
  readonly labels?: IsaLabels;
  readonly now?: Date;
  readonly logger?: Logger;
  readonly templates?: TemplateLoader;
}

export interface IsaStructureResult {
  readonly targetPath: string;
  /** Every directory and file visited, in creation order */
  readonly records: readonly IsaRecord[];
  readonly readme: IsaRecord;
}

function walk(parent: string, structure: IsaStructure, records: IsaRecord[], logger: Logger): void {
  for (const entry of structure) {
    const path = join(parent, entry.name);
    const node = entry.node;

    switch (node.kind) {
      case "empty":
        records.push({ ...ensureDirectory(path, logger), kind: "directory" });
        break;
      case "file":
        records.push({ ...ensureFile(path, node.content, logger), kind: "file" });
        break;
      case "directory":
        records.push({ ...ensureDirectory(path, logger), kind: "directory" });
        if (node.readme !== undefined) {
          records.push({ ...ensureFile(join(path, README_FILE_NAME), node.readme, logger), kind: "file" });
        }
        walk(path, node.children, records, logger);
        break;
      default: {
        const unreachable: never = node;
        throw new Error(`Unknown ISA node: ${JSON.stringify(unreachable)}`);
      }
    }
  }
}

/**
 * Create the structure below the target and add a project README.
 *
 * @throws FilesystemError if a create or write fails; entries made before
 *   the failure stay
 */
export function createIsaStructure(options: CreateIsaStructureOptions): IsaStructureResult {
  const logger = options.logger ?? silentLogger;
  const labels = options.labels ?? DEFAULT_ISA_LABELS;
  const targetPath = resolve(options.targetPath ?? process.cwd());

  const readmeContent = renderProjectReadme({
    structure: options.structure,
    labels,
    now: options.now,
    templates: options.templates,
  });

  logger.info("Creating ISA structure", { investigation: labels.investigation, targetPath });

  const records: IsaRecord[] = [{ ...ensureDirectory(targetPath, logger), kind: "directory" }];
  walk(targetPath, options.structure, records, logger);

  const readme: IsaRecord = {
    ...ensureFile(join(targetPath, README_FILE_NAME), readmeContent, logger),
    kind: "file",
  };
  records.push(readme);

  logger.info("ISA structure ready", {
    targetPath,
    created: records.filter((record) => record.status === "created").length,
    existing: records.filter((record) => record.status === "existing").length,
  });

  return { targetPath, records, readme };
}
