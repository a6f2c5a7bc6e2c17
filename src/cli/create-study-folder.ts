#!/usr/bin/env node
/**
 * CLI command to create a study folder with its FOLDER_POLICY.md.
 *
 * Usage:
 *   npx tsx src/cli/create-study-folder.ts --study-config study.json [options]
 *   npx tsx src/cli/create-study-folder.ts -i CXRP001 -s CXRS001 --workpackage WP001 [options]
 *
 * When --study-config is given, the file is authoritative for study fields
 * and discrete study options passed alongside it are ignored (with a
 * warning). Operational options always apply.
 *
 * Exit codes:
 *   0 - Folder created (an existing policy file left alone still counts)
 *   1 - Validation, filesystem or configuration error
 *   2 - Invalid command-line usage
 */

import { parseArgs } from "node:util";

import { loadUsersFile, type AccessEntry } from "../access/index.js";
import { createStudyFolder, type StudyFolderResult } from "../builder/index.js";
import { ConfigError, loadAppConfig, type AppConfig } from "../config/index.js";
import { MissingFieldError, StudyFolderError } from "../errors.js";
import { createLogger, generateRunId, type Logger } from "../logging/index.js";
import { renderNotification } from "../notification/index.js";
import { loadFolderStructure, type FolderStructure } from "../structure/index.js";
import { buildStudyConfig, loadStudyConfig } from "../study/loader.js";
import type { StudyConfig } from "../study/schema.js";
import { processIO, type CliIO } from "./io.js";

export type { CliIO } from "./io.js";

// ============================================================
// CLI Parsing
// ============================================================

const OPTIONS = {
  "study-config": { type: "string" },
  investigation: { type: "string", short: "i" },
  study: { type: "string", short: "s" },
  workpackage: { type: "string" },
  "study-title": { type: "string" },
  slug: { type: "string" },
  sensitivity: { type: "string" },
  "pi-first-name": { type: "string" },
  "pi-last-name": { type: "string" },
  "pi-email": { type: "string" },
  "admin-first-name": { type: "string" },
  "admin-last-name": { type: "string" },
  "admin-email": { type: "string" },
  target: { type: "string", short: "t" },
  "folder-name": { type: "string" },
  "structure-file": { type: "string" },
  "users-file": { type: "string" },
  overwrite: { type: "boolean", default: false },
  "create-investigation-folder": { type: "boolean", default: false },
  "no-notification": { type: "boolean", default: false },
  json: { type: "boolean", default: false },
  help: { type: "boolean", short: "h", default: false },
} as const;

/** Options that describe the study itself; ignored next to --study-config. */
const STUDY_FIELD_OPTIONS = [
  "investigation",
  "study",
  "workpackage",
  "study-title",
  "slug",
  "sensitivity",
  "pi-first-name",
  "pi-last-name",
  "pi-email",
  "admin-first-name",
  "admin-last-name",
  "admin-email",
] as const;

/** Option that supplies each configuration field, for error messages. */
const OPTION_FOR_FIELD: Readonly<Record<string, string>> = {
  accession_code: "-s/--study",
  investigation_accession_code: "-i/--investigation",
  investigation_work_package: "--workpackage",
  slug: "--slug (or --study-title)",
  "principal_investigator.email": "--pi-email",
  "dataset_administrator.email": "--admin-email",
};

export const HELP_TEXT = `
Usage: create-study-folder [--study-config <file>] [options]

Study fields (ignored when --study-config is given):
  -i, --investigation <label>     Investigation label (accession code)
  -s, --study <label>             Study label (accession code)
  --workpackage <id>              Workpackage identifier
  --study-title <title>           Study title (also used to derive the slug)
  --slug <slug>                   Study slug
  --sensitivity <level>           PUBLIC, INTERNAL, CONFIDENTIAL or RESTRICTED
  --pi-first-name, --pi-last-name, --pi-email
                                  Principal Investigator
  --admin-first-name, --admin-last-name, --admin-email
                                  Dataset administrator

Options:
  --study-config <file>           JSON file with the complete study configuration
  -t, --target <path>             Base path (default: $RESEARCH_DRIVE_ROOT or current directory)
  --folder-name <name>            Study folder name or path (overrides the default pattern)
  --structure-file <file>         JSON file with a custom folder structure
  --users-file <file>             JSON file with additional authorized users
  --overwrite                     Replace an existing FOLDER_POLICY.md (a backup is kept; folders are never deleted)
  --create-investigation-folder   Nest the study folder in an investigation folder
  --no-notification               Do not print the notification text
  --json                          Print the creation result as JSON
  -h, --help                      Show this help message
`;

type CliArgs = ReturnType<typeof parseCliArgs>;

function parseCliArgs(argv: string[]) {
  const { values } = parseArgs({ args: argv, options: OPTIONS, strict: true });
  return values;
}

// ============================================================
// Study configuration
// ============================================================

function configFromFields(args: CliArgs): Readonly<StudyConfig> {
  try {
    return buildStudyConfig({
      investigation: args.investigation,
      study: args.study,
      workPackage: args.workpackage,
      title: args["study-title"],
      slug: args.slug,
      sensitivity: args.sensitivity,
      principalInvestigator: {
        firstName: args["pi-first-name"],
        lastName: args["pi-last-name"],
        email: args["pi-email"],
      },
      datasetAdministrator: {
        firstName: args["admin-first-name"],
        lastName: args["admin-last-name"],
        email: args["admin-email"],
      },
    });
  } catch (err) {
    if (err instanceof MissingFieldError) {
      throw new MissingFieldError(
        err.fields.map((field) => OPTION_FOR_FIELD[field] ?? field),
        "command-line arguments"
      );
    }
    throw err;
  }
}

/**
 * Resolve the study configuration: the config file when given, otherwise
 * the discrete fields.
 */
export function resolveStudyConfig(args: CliArgs, logger: Logger): Readonly<StudyConfig> {
  const configFile = args["study-config"];
  if (configFile === undefined) {
    return configFromFields(args);
  }

  const ignored = STUDY_FIELD_OPTIONS.filter((name) => args[name] !== undefined);
  if (ignored.length > 0) {
    logger.warn("Ignoring study options because --study-config is given", {
      ignored: ignored.map((name) => `--${name}`),
      studyConfig: configFile,
    });
  }
  return loadStudyConfig(configFile);
}

// ============================================================
// Output
// ============================================================

function printResult(
  io: CliIO,
  args: CliArgs,
  config: StudyConfig,
  result: StudyFolderResult,
  appConfig: AppConfig
): void {
  if (args.json) {
    io.stdout(JSON.stringify(result, null, 2) + "\n");
    return;
  }

  if (args["no-notification"]) {
    return;
  }

  const notification = renderNotification({
    config,
    paths: result.paths,
    accessList: result.accessList,
    studyPath: result.studyPath,
    organization: { name: appConfig.organizationName, supportEmail: appConfig.supportEmail },
  });
  io.stdout("\n" + "=".repeat(80) + "\n" + notification);
}

// ============================================================
// Main
// ============================================================

/**
 * Run the command with the given arguments.
 *
 * @returns The process exit code
 */
export function run(argv: string[], io: CliIO): number {
  let args: CliArgs;
  try {
    args = parseCliArgs(argv);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    io.stderr(`Error: ${message}\nRun with --help for usage.\n`);
    return 2;
  }

  if (args.help) {
    io.stdout(HELP_TEXT);
    return 0;
  }

  let appConfig: Readonly<AppConfig>;
  try {
    appConfig = loadAppConfig(io.env);
  } catch (err) {
    if (err instanceof ConfigError) {
      io.stderr(`Configuration error: ${err.message}\n`);
      return 1;
    }
    throw err;
  }

  const logger =
    io.logger ??
    createLogger({
      level: appConfig.logLevel,
      runId: generateRunId(),
      filePath: appConfig.logFile,
    });

  try {
    const config = resolveStudyConfig(args, logger);
    const structureFile = args["structure-file"];
    const structure: FolderStructure | undefined = structureFile
      ? loadFolderStructure(structureFile)
      : undefined;
    const usersFile = args["users-file"];
    const authorizedUsers: AccessEntry[] = usersFile ? loadUsersFile(usersFile) : [];

    const result = createStudyFolder({
      config,
      targetPath: args.target ?? appConfig.defaultTarget,
      folderName: args["folder-name"],
      structure,
      overwritePolicy: args.overwrite,
      createInvestigationFolder: args["create-investigation-folder"],
      authorizedUsers,
      organization: { name: appConfig.organizationName, supportEmail: appConfig.supportEmail },
      logger,
    });

    logger.info("Successfully created folder structure", { studyPath: result.studyPath });
    printResult(io, args, config, result, appConfig);
    return 0;
  } catch (err) {
    if (err instanceof StudyFolderError) {
      logger.error(err.format(), { error: err.name });
      return 1;
    }
    throw err;
  }
}

// Only run when executed directly (not imported by tests)
const entry = process.argv[1] ?? "";
const isDirectExecution =
  entry.endsWith("create-study-folder.ts") ||
  entry.endsWith("create-study-folder.js") ||
  entry.endsWith("create-study-folder");

if (isDirectExecution) {
  try {
    process.exitCode = run(process.argv.slice(2), processIO);
  } catch (err) {
    console.error("Unexpected error:", err);
    process.exitCode = 1;
  }
}
