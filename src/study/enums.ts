/**
 * Sensitivity classification for study data.
 */

import { z } from "zod";

/**
 * Data sensitivity levels. Input is matched case-insensitively and
 * normalized to upper case before it reaches this enum.
 */
export const SecurityLevel = z.enum(["PUBLIC", "INTERNAL", "CONFIDENTIAL", "RESTRICTED"]);
export type SecurityLevel = z.infer<typeof SecurityLevel>;

export const SECURITY_LEVELS: readonly SecurityLevel[] = SecurityLevel.options;

/** Canned explanation printed next to each level in the policy document. */
export const SECURITY_LEVEL_DESCRIPTIONS: Readonly<Record<SecurityLevel, string>> = {
  PUBLIC: "Data that can be freely shared with the public.",
  INTERNAL: "Data that can be shared within the organization but not externally.",
  RESTRICTED: "Sensitive data with limited access even within the organization.",
  CONFIDENTIAL:
    "Highly sensitive data with strictly controlled access and not listed in the data catalogue.",
};

/** Order in which the definitions are listed. */
export const SECURITY_LEVEL_DISPLAY_ORDER: readonly SecurityLevel[] = [
  "PUBLIC",
  "INTERNAL",
  "RESTRICTED",
  "CONFIDENTIAL",
];
