/**
 * Notification text announcing a newly created study folder.
 *
 * Returned as a string for the caller to print; never written to disk.
 */

import { formatAccessName, type AccessEntry } from "../access/index.js";
import type { GeneratedPaths } from "../naming/index.js";
import type { SecurityLevel } from "../study/enums.js";
import { personName, type StudyConfig } from "../study/schema.js";
import { bundledTemplates, renderTemplate, type TemplateLoader } from "../templates/index.js";
import { DEFAULT_ORGANIZATION, formatDate, type OrganizationInfo } from "../types/index.js";

export const NOTIFICATION_TEMPLATE = "notification.txt";

const NO_ACCESS_USERS = "  - No users with READ-WRITE-SHARE access found";

const SENSITIVITY_REMINDERS: Readonly<Record<SecurityLevel, string>> = {
  PUBLIC: "This study is classified PUBLIC: its data may be shared freely",
  INTERNAL: "This study is classified INTERNAL: do not share its data outside the organization",
  RESTRICTED:
    "This study is classified RESTRICTED: grant access only to people who need it for the study",
  CONFIDENTIAL:
    "This study is classified CONFIDENTIAL: access is strictly controlled and the study is not listed in the data catalogue",
};

export interface NotificationInput {
  readonly config: StudyConfig;
  readonly paths: GeneratedPaths;
  readonly accessList: readonly AccessEntry[];
  /** Absolute path of the study folder */
  readonly studyPath: string;
  readonly organization?: OrganizationInfo;
  readonly now?: Date;
  readonly templates?: TemplateLoader;
}

export function formatAccessList(accessList: readonly AccessEntry[]): string {
  if (accessList.length === 0) {
    return NO_ACCESS_USERS;
  }
  return accessList.map((entry) => `  - ${formatAccessName(entry)} (${entry.role})`).join("\n");
}

/**
 * Render the notification text for a study folder.
 */
export function renderNotification(input: NotificationInput): string {
  const { config, paths, accessList } = input;
  const organization = input.organization ?? DEFAULT_ORGANIZATION;
  const template = (input.templates ?? bundledTemplates()).load(NOTIFICATION_TEMPLATE);
  const pi = config.principalInvestigator;
  const level = config.securityLevel;

  return renderTemplate(template, {
    organizationName: organization.name,
    supportEmail: organization.supportEmail,
    studyTitle: config.title ?? "N/A",
    investigationLabel: config.investigationAccessionCode,
    studyLabel: config.accessionCode,
    workPackage: config.workPackage,
    studyFolderName: paths.studyFolderName,
    studyPath: input.studyPath,
    dateCreated: formatDate(input.now ?? new Date()),
    projectLead: pi ? personName(pi) : "N/A",
    contactEmail: pi?.email ?? "N/A",
    securityLevel: level ?? "Not specified",
    sensitivityReminder: level ? SENSITIVITY_REMINDERS[level] : undefined,
    accessList: formatAccessList(accessList),
    dataFolderPrefix: paths.dataFolderPrefix,
  });
}
