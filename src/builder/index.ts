/**
 * Study folder builder.
 *
 * Runs the creation pipeline for one study:
 *
 *   1. Derive names and check the target directory
 *   2. Build the access list and render the policy (before any mkdir)
 *   3. Create the parent folders (investigation folder, when wanted) and
 *      the study folder
 *   4. Materialize the folder structure
 *   5. Write FOLDER_POLICY.md
 *
 * The configuration is passed in explicitly and never mutated. Nothing that
 * already exists on disk is deleted; a failure part-way leaves the
 * directories created so far in place.
 */

import { join, resolve } from "node:path";

import { buildAccessList, type AccessEntry } from "../access/index.js";
import { silentLogger, type Logger } from "../logging/index.js";
import {
  deriveGeneratedPaths,
  resolveStudyFolderLayout,
  type GeneratedPaths,
  type StudyLabels,
} from "../naming/index.js";
import {
  renderPolicyDocument,
  writePolicyDocument,
  type PolicyWriteOutcome,
} from "../policy/index.js";
import {
  DEFAULT_FOLDER_STRUCTURE,
  ensureDirectory,
  materializeStructure,
  requireDirectory,
  type DirectoryRecord,
  type FolderStructure,
} from "../structure/index.js";
import type { StudyConfig } from "../study/schema.js";
import type { TemplateLoader } from "../templates/index.js";
import { DEFAULT_ORGANIZATION, type OrganizationInfo } from "../types/index.js";

export interface CreateStudyFolderOptions {
  readonly config: StudyConfig;
  /** Base directory; defaults to the working directory */
  readonly targetPath?: string;
  /**
   * Study folder name used instead of the derived one. A name containing
   * `/` is a path below the target; the catalogue's `i_{wp}_{inv}/s_…`
   * form is resolved against `createInvestigationFolder`.
   */
  readonly folderName?: string;
  /** Defaults to raw / processed / metadata */
  readonly structure?: FolderStructure;
  /** Replace an existing FOLDER_POLICY.md (after backing it up) */
  readonly overwritePolicy?: boolean;
  /** Nest the study folder inside `i_{workpackage}_{investigation}` */
  readonly createInvestigationFolder?: boolean;
  /** Extra users considered for the access table */
  readonly authorizedUsers?: readonly AccessEntry[];
  readonly organization?: OrganizationInfo;
  readonly now?: Date;
  readonly logger?: Logger;
  readonly templates?: TemplateLoader;
}

export interface StudyFolderResult {
  readonly paths: GeneratedPaths;
  readonly studyPath: string;
  /** Set when the study folder was nested in an investigation folder */
  readonly investigationPath?: string;
  /** Investigation, study and structure directories, in creation order */
  readonly directories: readonly DirectoryRecord[];
  readonly policy: PolicyWriteOutcome;
  readonly accessList: readonly AccessEntry[];
}

/**
 * Labels that folder names are derived from.
 */
export function studyLabels(config: StudyConfig): StudyLabels {
  return {
    workPackage: config.workPackage,
    investigationLabel: config.investigationAccessionCode,
    studyLabel: config.accessionCode,
    slug: config.slug,
  };
}

/**
 * Create the folder tree and policy document for one study.
 *
 * @throws MissingFieldError if a label needed for naming is empty
 * @throws FilesystemError   if the target is unusable or a create/write fails
 */
export function createStudyFolder(options: CreateStudyFolderOptions): StudyFolderResult {
  const { config } = options;
  const logger = options.logger ?? silentLogger;
  const now = options.now ?? new Date();
  const organization = options.organization ?? DEFAULT_ORGANIZATION;

  const labels = studyLabels(config);
  const layout = resolveStudyFolderLayout(
    labels,
    options.folderName ?? config.folderName,
    options.createInvestigationFolder ?? false
  );
  const paths: GeneratedPaths = {
    ...deriveGeneratedPaths(labels),
    studyFolderName: layout.studyFolderName,
  };
  const targetPath = resolve(options.targetPath ?? process.cwd());
  requireDirectory(targetPath);

  logger.debug("Derived folder names", { ...paths, parents: layout.parents, targetPath });

  const accessList = buildAccessList(config, options.authorizedUsers);
  const content = renderPolicyDocument({
    config,
    paths,
    accessList,
    organization,
    now,
    templates: options.templates,
  });

  const directories: DirectoryRecord[] = [];
  let parentPath = targetPath;
  for (const name of layout.parents) {
    parentPath = join(parentPath, name);
    directories.push(ensureDirectory(parentPath, logger));
  }

  const [outermost] = layout.parents;
  const investigationPath =
    options.createInvestigationFolder && outermost !== undefined
      ? join(targetPath, outermost)
      : undefined;

  const studyPath = join(parentPath, paths.studyFolderName);
  directories.push(ensureDirectory(studyPath, logger));
  directories.push(
    ...materializeStructure(
      studyPath,
      options.structure ?? DEFAULT_FOLDER_STRUCTURE,
      paths.dataFolderPrefix,
      logger
    )
  );

  const policy = writePolicyDocument(studyPath, content, {
    overwrite: options.overwritePolicy,
    now,
    logger,
  });

  const created = directories.filter((record) => record.status === "created").length;
  logger.info("Study folder ready", {
    studyPath,
    directoriesCreated: created,
    directoriesExisting: directories.length - created,
    policy: policy.status,
  });

  return {
    paths,
    studyPath,
    investigationPath,
    directories,
    policy,
    accessList,
  };
}
