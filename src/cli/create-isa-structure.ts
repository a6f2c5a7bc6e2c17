#!/usr/bin/env node
/**
 * CLI command to create an ISA (Investigation, Study, Assay) directory
 * structure from a YAML template.
 *
 * Usage:
 *   npx tsx src/cli/create-isa-structure.ts template.yaml -t ./project -i CXRP001 -s CXRS001 -a CXRA001
 *
 * Exit codes:
 *   0 - Structure created (existing entries left alone still count)
 *   1 - Template, filesystem or configuration error
 *   2 - Invalid command-line usage
 */

import { parseArgs } from "node:util";

import { ConfigError, loadAppConfig, type AppConfig } from "../config/index.js";
import { StudyFolderError } from "../errors.js";
import {
  createIsaStructure,
  DEFAULT_ISA_LABELS,
  loadIsaTemplate,
  type IsaLabels,
} from "../isa/index.js";
import { createLogger, generateRunId } from "../logging/index.js";
import { processIO, type CliIO } from "./io.js";

const OPTIONS = {
  target: { type: "string", short: "t" },
  investigation: { type: "string", short: "i" },
  study: { type: "string", short: "s" },
  assay: { type: "string", short: "a" },
  json: { type: "boolean", default: false },
  help: { type: "boolean", short: "h", default: false },
} as const;

export const HELP_TEXT = `
Usage: create-isa-structure <template.yaml> [options]

Template placeholders:
  \${INVESTIGATION_LABEL}, \${STUDY_LABEL}, \${ASSAY_LABEL}
  INVESTIGATION_LABEL_SLUG, STUDY_LABEL_SLUG, ASSAY_LABEL_SLUG

Options:
  -t, --target <path>             Target directory (default: $RESEARCH_DRIVE_ROOT or current directory)
  -i, --investigation <label>     Investigation label (default: "${DEFAULT_ISA_LABELS.investigation}")
  -s, --study <label>             Study label (default: "${DEFAULT_ISA_LABELS.study}")
  -a, --assay <label>             Assay label (default: "${DEFAULT_ISA_LABELS.assay}")
  --json                          Print the creation result as JSON
  -h, --help                      Show this help message
`;

function parseCliArgs(argv: string[]) {
  return parseArgs({ args: argv, options: OPTIONS, strict: true, allowPositionals: true });
}

/**
 * Run the command with the given arguments.
 *
 * @returns The process exit code
 */
export function run(argv: string[], io: CliIO): number {
  let parsed: ReturnType<typeof parseCliArgs>;
  try {
    parsed = parseCliArgs(argv);
    if (!parsed.values.help && parsed.positionals.length !== 1) {
      throw new Error(`Expected one template file, got ${parsed.positionals.length}`);
    }
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    io.stderr(`Error: ${message}\nRun with --help for usage.\n`);
    return 2;
  }

  const { values: args, positionals } = parsed;
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

  const [templateFile = ""] = positionals;
  const labels: IsaLabels = {
    investigation: args.investigation ?? DEFAULT_ISA_LABELS.investigation,
    study: args.study ?? DEFAULT_ISA_LABELS.study,
    assay: args.assay ?? DEFAULT_ISA_LABELS.assay,
  };

  try {
    const structure = loadIsaTemplate(templateFile, labels);
    const result = createIsaStructure({
      structure,
      targetPath: args.target ?? appConfig.defaultTarget,
      labels,
      logger,
    });

    if (args.json) {
      io.stdout(JSON.stringify(result, null, 2) + "\n");
    } else {
      const created = result.records.filter((record) => record.status === "created").length;
      io.stdout(
        `ISA structure for "${labels.investigation}" ready at ${result.targetPath} ` +
          `(${created} created, ${result.records.length - created} already present)\n`
      );
    }
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
  entry.endsWith("create-isa-structure.ts") ||
  entry.endsWith("create-isa-structure.js") ||
  entry.endsWith("create-isa-structure");

if (isDirectExecution) {
  try {
    process.exitCode = run(process.argv.slice(2), processIO);
  } catch (err) {
    console.error("Unexpected error:", err);
    process.exitCode = 1;
  }
}
