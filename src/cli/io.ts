/**
 * Process boundary shared by the command-line tools, so tests can run a
 * command in-process and capture what it prints.
 */

import type { Env } from "../config/index.js";
import type { Logger } from "../logging/index.js";

export interface CliIO {
  stdout(text: string): void;
  stderr(text: string): void;
  readonly env: Env;
  /** Replaces the logger built from the environment */
  readonly logger?: Logger;
}

/** The real process streams and environment. */
export const processIO: CliIO = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
  env: process.env,
};
