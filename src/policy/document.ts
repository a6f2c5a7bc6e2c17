/**
 * FOLDER_POLICY.md rendering.
 */

import { formatAccessName, type AccessEntry } from "../access/index.js";
import type { GeneratedPaths } from "../naming/index.js";
import {
  SECURITY_LEVEL_DESCRIPTIONS,
  SECURITY_LEVEL_DISPLAY_ORDER,
  SECURITY_LEVELS,
  type SecurityLevel,
} from "../study/enums.js";
import { personName, type StudyConfig } from "../study/schema.js";
import { bundledTemplates, renderTemplate, type TemplateLoader } from "../templates/index.js";
import { DEFAULT_ORGANIZATION, formatDate, type OrganizationInfo } from "../types/index.js";

export const POLICY_FILE_NAME = "FOLDER_POLICY.md";
export const POLICY_TEMPLATE = "folder-policy.md";

const PLACEHOLDER_ACCESS_ROW = "| [Name] | [Role] | [READ/READ-WRITE] | [YYYY-MM-DD or PERMANENT] |";

export interface PolicyDocumentInput {
  readonly config: StudyConfig;
  readonly paths: GeneratedPaths;
  readonly accessList: readonly AccessEntry[];
  readonly organization?: OrganizationInfo;
  /** Date stamped as "Date Created"; defaults to now */
  readonly now?: Date;
  readonly templates?: TemplateLoader;
}

/**
 * Text shown for the current level, or a prompt to pick one.
 */
export function securityLevelLabel(level: SecurityLevel | undefined): string {
  return level ?? `[SELECT ONE: ${SECURITY_LEVELS.join(" / ")}]`;
}

export function formatAccessRows(accessList: readonly AccessEntry[]): string {
  if (accessList.length === 0) {
    return PLACEHOLDER_ACCESS_ROW;
  }
  return accessList
    .map((entry) => `| ${formatAccessName(entry)} | ${entry.role} | ${entry.accessLevel} | ${entry.expiration} |`)
    .join("\n");
}

function sensitivityDefinitions(): string {
  return SECURITY_LEVEL_DISPLAY_ORDER.map(
    (level) => `- **${level}**: ${SECURITY_LEVEL_DESCRIPTIONS[level]}`
  ).join("\n");
}

/**
 * Render the policy document for a study folder.
 */
export function renderPolicyDocument(input: PolicyDocumentInput): string {
  const { config, paths, accessList } = input;
  const organization = input.organization ?? DEFAULT_ORGANIZATION;
  const template = (input.templates ?? bundledTemplates()).load(POLICY_TEMPLATE);
  const pi = config.principalInvestigator;
  const level = config.securityLevel;

  return renderTemplate(template, {
    studyTitle: config.title ?? "[Study Title]",
    studyFolderName: paths.studyFolderName,
    investigationLabel: config.investigationAccessionCode,
    investigationTitle: config.investigationTitle,
    studyLabel: config.accessionCode,
    workPackage: config.workPackage,
    dateCreated: formatDate(input.now ?? new Date()),
    projectLead: pi ? personName(pi) : "[Name]",
    contactEmail: pi?.email ?? "[Email]",
    description: config.description,
    securityLevel: securityLevelLabel(level),
    securityLevelDescription: level ? SECURITY_LEVEL_DESCRIPTIONS[level] : undefined,
    sensitivityDefinitions: sensitivityDefinitions(),
    accessRows: formatAccessRows(accessList),
    dataFolderPrefix: paths.dataFolderPrefix,
    organizationName: organization.name,
    supportEmail: organization.supportEmail,
  });
}
