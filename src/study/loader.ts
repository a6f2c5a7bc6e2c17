/**
 * Study configuration loader and validator.
 *
 * Responsible for:
 * - Reading the configuration JSON file
 * - Assembling a configuration from discrete command-line fields
 * - Translating schema failures into the error taxonomy
 *   (MissingFieldError, InvalidEnumError, ConfigParseError)
 * - Freezing the result so no stage can mutate it
 */

import { readFileSync } from "node:fs";
import type { ZodIssue } from "zod";

import {
  ConfigParseError,
  InvalidEnumError,
  MissingFieldError,
  type ParseIssue,
} from "../errors.js";
import { slugify } from "../naming/index.js";
import { StudyConfigSchema, type StudyConfig } from "./schema.js";

/**
 * Deep freeze an object to enforce runtime immutability.
 */
export function deepFreeze<T extends object>(obj: T): Readonly<T> {
  for (const name of Reflect.ownKeys(obj)) {
    const value: unknown = Reflect.get(obj, name);
    if (value && typeof value === "object" && !Object.isFrozen(value)) {
      deepFreeze(value);
    }
  }
  return Object.freeze(obj);
}

function issuePath(issue: ZodIssue): string {
  return issue.path.map(String).join(".");
}

function isMissing(issue: ZodIssue): boolean {
  if (issue.code === "invalid_type") {
    return issue.received === "undefined" || issue.received === "null";
  }
  return issue.code === "too_small" && issue.type === "string";
}

/**
 * Read a configuration file as text.
 *
 * @throws ConfigParseError if the file cannot be read
 */
export function readTextFile(file: string): string {
  try {
    return readFileSync(file, "utf-8");
  } catch (err) {
    const code =
      err instanceof Error && "code" in err && typeof err.code === "string"
        ? err.code
        : String(err);
    throw new ConfigParseError(file, [{ path: "", message: `cannot read file (${code})` }], err);
  }
}

/**
 * Read a JSON document from disk.
 *
 * @throws ConfigParseError if the file cannot be read or is not valid JSON
 */
export function readJsonFile(file: string): unknown {
  const text = readTextFile(file);
  try {
    return JSON.parse(text);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigParseError(file, [{ path: "", message: `invalid JSON: ${message}` }], err);
  }
}

/**
 * Validate a raw configuration object.
 *
 * Missing fields are reported together, ahead of any other problem, so a
 * user fixing a config file sees every absent field at once.
 *
 * @param input  - Parsed JSON (or an object assembled from CLI fields)
 * @param source - Where the input came from, used in error messages
 * @returns Validated and frozen StudyConfig
 * @throws MissingFieldError, InvalidEnumError or ConfigParseError
 */
export function parseStudyConfig(
  input: unknown,
  source = "study configuration"
): Readonly<StudyConfig> {
  if (typeof input !== "object" || input === null || Array.isArray(input)) {
    throw new ConfigParseError(source, [
      { path: "", message: "expected a JSON object" },
    ]);
  }

  const result = StudyConfigSchema.safeParse(input);
  if (result.success) {
    return deepFreeze(result.data);
  }

  const issues = result.error.issues;

  const missing = issues.filter(isMissing).map(issuePath);
  if (missing.length > 0) {
    throw new MissingFieldError(missing, source);
  }

  for (const issue of issues) {
    if (issue.code === "invalid_enum_value") {
      throw new InvalidEnumError(
        issuePath(issue),
        String(issue.received),
        issue.options.map(String)
      );
    }
  }

  const parseIssues: ParseIssue[] = issues.map((issue) => ({
    path: issuePath(issue),
    message: issue.message,
  }));
  throw new ConfigParseError(source, parseIssues);
}

/**
 * Load and validate a study configuration file.
 */
export function loadStudyConfig(file: string): Readonly<StudyConfig> {
  return parseStudyConfig(readJsonFile(file), file);
}

/**
 * Person given as separate command-line fields.
 */
export interface PersonFields {
  firstName?: string;
  lastName?: string;
  email?: string;
}

/**
 * Study fields given as separate command-line options.
 */
export interface StudyConfigFields {
  investigation?: string;
  study?: string;
  workPackage?: string;
  title?: string;
  slug?: string;
  sensitivity?: string;
  principalInvestigator?: PersonFields;
  datasetAdministrator?: PersonFields;
}

function personDocument(
  fields: PersonFields | undefined
): Record<string, string | undefined> | undefined {
  if (!fields) return undefined;
  const { firstName, lastName, email } = fields;
  if (firstName === undefined && lastName === undefined && email === undefined) {
    return undefined;
  }
  return { first_name: firstName, last_name: lastName, email };
}

/**
 * Assemble a StudyConfig from discrete fields.
 *
 * When no slug is given it is derived from the title, or failing that from
 * the lower-cased study label.
 */
export function buildStudyConfig(fields: StudyConfigFields): Readonly<StudyConfig> {
  const slug =
    fields.slug ??
    (fields.title ? slugify(fields.title) : fields.study?.toLowerCase());

  return parseStudyConfig(
    {
      accession_code: fields.study,
      investigation_accession_code: fields.investigation,
      investigation_work_package: fields.workPackage,
      slug,
      title: fields.title,
      security_level: fields.sensitivity,
      principal_investigator: personDocument(fields.principalInvestigator),
      dataset_administrator: personDocument(fields.datasetAdministrator),
    },
    "command-line arguments"
  );
}
