/**
 * Organization details printed in generated documents.
 */

export interface OrganizationInfo {
  /** Name used in prose, e.g. "created in the Research Drive" */
  readonly name: string;
  /** Support address for questions about the folder */
  readonly supportEmail: string;
}

export const DEFAULT_ORGANIZATION: OrganizationInfo = {
  name: "Research Drive",
  supportEmail: "data-support@example.org",
};
