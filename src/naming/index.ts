/**
 * Canonical folder names for investigations, studies and data categories.
 *
 * All functions here are pure. They validate presence only: names are not
 * sanitized and case collisions are not detected.
 */

import { MissingFieldError } from "../errors.js";

/**
 * Identifiers that folder names are built from.
 */
export interface StudyLabels {
  /** Work package (e.g. "WP001") */
  readonly workPackage: string;
  /** Investigation accession code (e.g. "CXRP001") */
  readonly investigationLabel: string;
  /** Study accession code (e.g. "CXRS001") */
  readonly studyLabel: string;
  readonly slug: string;
}

/**
 * Names derived for one study. Never persisted.
 */
export interface GeneratedPaths {
  readonly investigationFolderName: string;
  readonly studyFolderName: string;
  /** Prefix of every first-level data folder, e.g. "CXRP001-CXRS001_" */
  readonly dataFolderPrefix: string;
}

function requireLabels(labels: StudyLabels, keys: readonly (keyof StudyLabels)[]): void {
  const missing = keys.filter((key) => labels[key].trim() === "");
  if (missing.length > 0) {
    throw new MissingFieldError(missing);
  }
}

/**
 * `i_{workpackage}_{investigation_label}`
 */
export function investigationFolderName(labels: StudyLabels): string {
  requireLabels(labels, ["workPackage", "investigationLabel"]);
  return `i_${labels.workPackage}_${labels.investigationLabel}`;
}

/**
 * `s_{workpackage}-{investigation_label}-{study_label}_{slug}`, or the
 * override verbatim.
 */
export function studyFolderName(labels: StudyLabels, override?: string): string {
  requireLabels(labels, ["workPackage", "investigationLabel", "studyLabel", "slug"]);
  if (override !== undefined && override !== "") {
    return override;
  }
  return `s_${labels.workPackage}-${labels.investigationLabel}-${labels.studyLabel}_${labels.slug}`;
}

/**
 * `{investigation_label}-{study_label}_`
 */
export function dataFolderPrefix(labels: Pick<StudyLabels, "investigationLabel" | "studyLabel">): string {
  return `${labels.investigationLabel}-${labels.studyLabel}_`;
}

/**
 * `{investigation_label}-{study_label}_{category}`
 */
export function dataFolderName(
  labels: Pick<StudyLabels, "investigationLabel" | "studyLabel">,
  category: string
): string {
  return `${dataFolderPrefix(labels)}${category}`;
}

/**
 * Derive every folder name for a study.
 *
 * @throws MissingFieldError if any label is empty
 */
export function deriveGeneratedPaths(labels: StudyLabels, override?: string): GeneratedPaths {
  return {
    investigationFolderName: investigationFolderName(labels),
    studyFolderName: studyFolderName(labels, override),
    dataFolderPrefix: dataFolderPrefix(labels),
  };
}

/**
 * Where the study folder sits below the target directory.
 */
export interface StudyFolderLayout {
  /** Folders between the target and the study folder, outermost first */
  readonly parents: readonly string[];
  readonly studyFolderName: string;
}

/**
 * Whether a folder name already carries its investigation folder, as in
 * the catalogue's `i_WP001_CXRP001/s_…` form.
 */
export function isInvestigationPath(name: string): boolean {
  return name.startsWith("i_") && name.includes("/");
}

function pathSegments(name: string): string[] {
  return name
    .split("/")
    .map((segment) => segment.trim())
    .filter((segment) => segment !== "");
}

/**
 * Resolve the folders to create for a study, given an optional folder-name
 * override and whether an investigation folder is wanted.
 *
 * An override in the `i_…/…` form is used as a path when the investigation
 * folder is wanted. Otherwise only its last segment is kept, and that is
 * replaced by the derived name unless it starts with `s_{workpackage}-`.
 * Any other override names the study folder, nested in the investigation
 * folder when one is wanted.
 *
 * @throws MissingFieldError if any label is empty
 */
export function resolveStudyFolderLayout(
  labels: StudyLabels,
  override: string | undefined,
  createInvestigationFolder: boolean
): StudyFolderLayout {
  const derived = studyFolderName(labels);
  const investigation = investigationFolderName(labels);
  const segments = override === undefined ? [] : pathSegments(override);
  const last = segments.at(-1);

  if (override === undefined || last === undefined) {
    return {
      parents: createInvestigationFolder ? [investigation] : [],
      studyFolderName: derived,
    };
  }

  const parents = segments.slice(0, -1);

  if (isInvestigationPath(override)) {
    if (createInvestigationFolder) {
      return { parents, studyFolderName: last };
    }
    return {
      parents: [],
      studyFolderName: last.startsWith(`s_${labels.workPackage}-`) ? last : derived,
    };
  }

  return {
    parents: createInvestigationFolder ? [investigation, ...parents] : parents,
    studyFolderName: last,
  };
}

/**
 * Turn a title into a slug: lower case, spaces to hyphens, and everything
 * outside [a-z0-9-] dropped.
 */
export function slugify(title: string): string {
  return title.toLowerCase().replace(/ /g, "-").replace(/[^a-z0-9-]/g, "");
}
