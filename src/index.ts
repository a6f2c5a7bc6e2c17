/**
 * Study folder creation for research drives.
 *
 * Library entry point; the command-line tools live in cli/.
 */

export {
  createStudyFolder,
  studyLabels,
  type CreateStudyFolderOptions,
  type StudyFolderResult,
} from "./builder/index.js";
export {
  ConfigParseError,
  FilesystemError,
  InvalidEnumError,
  MissingFieldError,
  StudyFolderError,
  type ParseIssue,
} from "./errors.js";
export * from "./naming/index.js";
export * from "./structure/index.js";
export * from "./policy/index.js";
export * from "./notification/index.js";
export * from "./access/index.js";
export * from "./isa/index.js";
export {
  SecurityLevel,
  SECURITY_LEVELS,
  SECURITY_LEVEL_DESCRIPTIONS,
} from "./study/enums.js";
export {
  PersonSchema,
  StudyConfigSchema,
  personName,
  type Person,
  type StudyConfig,
  type StudyConfigDocument,
} from "./study/schema.js";
export {
  buildStudyConfig,
  loadStudyConfig,
  parseStudyConfig,
  type PersonFields,
  type StudyConfigFields,
} from "./study/loader.js";
export { loadAppConfig, ConfigError, type AppConfig } from "./config/index.js";
export { createLogger, generateRunId, type Logger, type LogLevel } from "./logging/index.js";
export { DEFAULT_ORGANIZATION, type OrganizationInfo } from "./types/index.js";
