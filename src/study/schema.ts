/**
 * Study configuration schema.
 *
 * The JSON document uses the catalogue's snake_case keys; the parsed
 * StudyConfig uses camelCase. Unknown keys are ignored because catalogue
 * exports carry many fields this tool does not need.
 */

import { z } from "zod";
import { SecurityLevel } from "./enums.js";

/** Non-empty after trimming. */
const requiredText = z.string().trim().min(1, "Required");

/** Blank and null collapse to undefined. */
const optionalText = z
  .string()
  .nullish()
  .transform((value) => value?.trim() || undefined);

const nameList = z
  .array(z.string())
  .nullish()
  .transform((value) => value ?? []);

/**
 * Sensitivity level, matched case-insensitively. Blank counts as absent.
 */
const securityLevelField = z.preprocess((value) => {
  if (value === null) return undefined;
  if (typeof value !== "string") return value;
  const normalized = value.trim().toUpperCase();
  return normalized === "" ? undefined : normalized;
}, SecurityLevel.optional());

export const PersonSchema = z
  .object({
    first_name: optionalText,
    last_name: optionalText,
    email: requiredText,
  })
  .transform((person) => ({
    firstName: person.first_name ?? "",
    lastName: person.last_name ?? "",
    email: person.email,
  }));

export type Person = z.output<typeof PersonSchema>;

export const StudyConfigSchema = z
  .object({
    accession_code: requiredText,
    investigation_accession_code: requiredText,
    investigation_work_package: requiredText,
    slug: requiredText,
    security_level: securityLevelField,
    title: optionalText,
    investigation_title: optionalText,
    description: optionalText,
    principal_investigator: PersonSchema.nullish(),
    dataset_administrator: PersonSchema.nullish(),
    folder_name: optionalText,
    owners: nameList,
    contributors: nameList,
    readers: nameList,
  })
  .transform((raw) => ({
    accessionCode: raw.accession_code,
    investigationAccessionCode: raw.investigation_accession_code,
    workPackage: raw.investigation_work_package,
    slug: raw.slug,
    securityLevel: raw.security_level,
    title: raw.title,
    investigationTitle: raw.investigation_title,
    description: raw.description,
    principalInvestigator: raw.principal_investigator ?? undefined,
    datasetAdministrator: raw.dataset_administrator ?? undefined,
    folderName: raw.folder_name,
    owners: raw.owners,
    contributors: raw.contributors,
    readers: raw.readers,
  }));

export type StudyConfig = z.output<typeof StudyConfigSchema>;

/** The JSON shape accepted by StudyConfigSchema. */
export type StudyConfigDocument = z.input<typeof StudyConfigSchema>;

/**
 * Display name of a person: "First Last", or the email when both names are blank.
 */
export function personName(person: Person): string {
  const name = `${person.firstName} ${person.lastName}`.trim();
  return name === "" ? person.email : name;
}
