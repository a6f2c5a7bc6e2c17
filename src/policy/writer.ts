/**
 * Writes FOLDER_POLICY.md into a study folder.
 *
 * An existing policy file is authoritative: without `overwrite` it is left
 * byte-for-byte unchanged. With `overwrite` it is first copied to
 * `FOLDER_POLICY.md.bak.{YYYYMMDD_HHMMSS}` and the new content is then
 * written over it, so a failed write still leaves the old file in place.
 */

import { constants, copyFileSync, existsSync, writeFileSync } from "node:fs";
import { join } from "node:path";

import { FilesystemError } from "../errors.js";
import { silentLogger, type Logger } from "../logging/index.js";
import { formatTimestamp } from "../types/index.js";
import { POLICY_FILE_NAME } from "./document.js";

export type PolicyWriteStatus = "created" | "skipped" | "replaced";

export interface PolicyWriteOutcome {
  readonly status: PolicyWriteStatus;
  readonly path: string;
  /** Where the previous file went, when it was replaced */
  readonly backupPath?: string;
}

export interface WritePolicyOptions {
  readonly overwrite?: boolean;
  /** Clock for the backup suffix; defaults to now */
  readonly now?: Date;
  readonly logger?: Logger;
}

/**
 * First free backup name for a policy file. A `-N` counter is appended
 * when a backup from the same second already exists.
 */
export function backupPathFor(policyPath: string, now: Date): string {
  const base = `${policyPath}.bak.${formatTimestamp(now)}`;
  let candidate = base;
  for (let counter = 1; existsSync(candidate); counter++) {
    candidate = `${base}-${counter}`;
  }
  return candidate;
}

function writeContent(path: string, content: string): void {
  try {
    writeFileSync(path, content, "utf-8");
  } catch (err) {
    throw FilesystemError.from(path, "write", err);
  }
}

/**
 * Write the policy document into a folder.
 *
 * @throws FilesystemError if the backup copy or the write fails
 */
export function writePolicyDocument(
  folderPath: string,
  content: string,
  options: WritePolicyOptions = {}
): PolicyWriteOutcome {
  const logger = options.logger ?? silentLogger;
  const policyPath = join(folderPath, POLICY_FILE_NAME);

  if (!existsSync(policyPath)) {
    writeContent(policyPath, content);
    logger.info("Created policy file", { path: policyPath });
    return { status: "created", path: policyPath };
  }

  if (!options.overwrite) {
    logger.warn("Policy file already exists and overwrite is off; leaving it unchanged", {
      path: policyPath,
    });
    return { status: "skipped", path: policyPath };
  }

  const backupPath = backupPathFor(policyPath, options.now ?? new Date());
  try {
    copyFileSync(policyPath, backupPath, constants.COPYFILE_EXCL);
  } catch (err) {
    throw FilesystemError.from(policyPath, "copy", err);
  }
  logger.info("Backed up existing policy file", { path: policyPath, backupPath });

  writeContent(policyPath, content);
  logger.info("Replaced policy file", { path: policyPath });
  return { status: "replaced", path: policyPath, backupPath };
}
