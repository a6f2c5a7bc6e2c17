/**
 * Directory materialization.
 *
 * Creation is additive: a directory is created only when missing, and
 * existing directories and their contents are never modified or removed.
 * The first failure aborts the walk; directories created before it stay.
 */

import { mkdirSync, statSync, writeFileSync, type Stats } from "node:fs";
import { join } from "node:path";

import { FilesystemError } from "../errors.js";
import { silentLogger, type Logger } from "../logging/index.js";
import type { FolderStructure } from "./schema.js";

export type EntryStatus = "created" | "existing";

export interface DirectoryRecord {
  readonly path: string;
  readonly status: EntryStatus;
}

export interface FileRecord {
  readonly path: string;
  readonly status: EntryStatus;
}

function statPath(path: string): Stats | undefined {
  try {
    return statSync(path, { throwIfNoEntry: false });
  } catch (err) {
    throw FilesystemError.from(path, "stat", err);
  }
}

/**
 * Create a directory unless it already exists. The parent must exist.
 *
 * @throws FilesystemError if the path is taken by a file or mkdir fails
 */
export function ensureDirectory(path: string, logger: Logger = silentLogger): DirectoryRecord {
  const stats = statPath(path);
  if (stats) {
    if (!stats.isDirectory()) {
      throw new FilesystemError(path, "mkdir", `Cannot create directory ${path}: a file with that name exists`);
    }
    logger.info("Directory already exists, leaving it untouched", { path });
    return { path, status: "existing" };
  }

  try {
    mkdirSync(path);
  } catch (err) {
    throw FilesystemError.from(path, "mkdir", err);
  }
  logger.info("Created directory", { path });
  return { path, status: "created" };
}

/**
 * Write a file unless something already exists at the path. An existing
 * file keeps its content.
 *
 * @throws FilesystemError if the path is taken by a directory or the write fails
 */
export function ensureFile(path: string, content: string, logger: Logger = silentLogger): FileRecord {
  const stats = statPath(path);
  if (stats) {
    if (!stats.isFile()) {
      throw new FilesystemError(path, "write", `Cannot write file ${path}: a directory with that name exists`);
    }
    logger.info("File already exists, leaving it untouched", { path });
    return { path, status: "existing" };
  }

  try {
    writeFileSync(path, content, { encoding: "utf-8", flag: "wx" });
  } catch (err) {
    throw FilesystemError.from(path, "write", err);
  }
  logger.info("Created file", { path });
  return { path, status: "created" };
}

/**
 * Check that a base path exists and is a directory.
 *
 * @throws FilesystemError otherwise
 */
export function requireDirectory(path: string): void {
  const stats = statPath(path);
  if (!stats) {
    throw new FilesystemError(path, "stat", `Target directory does not exist: ${path}`);
  }
  if (!stats.isDirectory()) {
    throw new FilesystemError(path, "stat", `Target is not a directory: ${path}`);
  }
}

function walk(
  parent: string,
  structure: FolderStructure,
  nameOf: (name: string) => string,
  records: DirectoryRecord[],
  logger: Logger
): void {
  for (const entry of structure) {
    const path = join(parent, nameOf(entry.name));
    records.push(ensureDirectory(path, logger));

    const node = entry.node;
    switch (node.kind) {
      case "leaf":
        break;
      case "list":
        for (const child of node.children) {
          records.push(ensureDirectory(join(path, child), logger));
        }
        break;
      case "nested":
        walk(path, node.children, (name) => name, records, logger);
        break;
      default: {
        const unreachable: never = node;
        throw new Error(`Unknown folder node: ${JSON.stringify(unreachable)}`);
      }
    }
  }
}

/**
 * Create a folder structure inside a study folder.
 *
 * First-level folders are named `{dataFolderPrefix}{key}`; deeper levels use
 * their names unchanged.
 *
 * @returns Every directory visited, in creation order
 */
export function materializeStructure(
  studyPath: string,
  structure: FolderStructure,
  dataFolderPrefix: string,
  logger: Logger = silentLogger
): DirectoryRecord[] {
  const records: DirectoryRecord[] = [];
  walk(studyPath, structure, (name) => `${dataFolderPrefix}${name}`, records, logger);
  return records;
}
