/**
 * Access list for a study folder.
 *
 * The PI and the dataset administrator always get READ-WRITE-SHARE.
 * Additional people (from the configuration's owners/contributors/readers
 * lists or from a users file) are listed only when they are an owner or PI
 * with READ-WRITE-SHARE access.
 */

import { z } from "zod";

import { ConfigParseError } from "../errors.js";
import { readJsonFile } from "../study/loader.js";
import { personName, type Person, type StudyConfig } from "../study/schema.js";

export const READ_WRITE_SHARE = "READ-WRITE-SHARE";
export const PERMANENT = "PERMANENT";

const LISTED_ROLES = new Set(["owner", "principal investigator", "pi", "principal_investigator"]);

export interface AccessEntry {
  readonly name: string;
  readonly email?: string;
  readonly role: string;
  readonly accessLevel: string;
  readonly expiration: string;
}

export const AuthorizedUserSchema = z.object({
  name: z.string().trim().min(1, "Required"),
  role: z.string().default(""),
  access_level: z.string().default(""),
  expiration: z.string().default(PERMANENT),
});

export const UsersFileSchema = z.array(AuthorizedUserSchema);

/**
 * Split "Name (email)" into its parts. Strings without that shape are
 * treated as a bare name.
 */
export function parseNameWithEmail(value: string): { name: string; email?: string } {
  const trimmed = value.trim();
  const open = trimmed.indexOf("(");
  if (open > 0 && trimmed.endsWith(")")) {
    const name = trimmed.slice(0, open).trim();
    const email = trimmed.slice(open + 1, -1).trim();
    return email === "" ? { name } : { name, email };
  }
  return { name: trimmed };
}

function personEntry(person: Person, role: string): AccessEntry {
  return {
    name: personName(person),
    email: person.email,
    role,
    accessLevel: READ_WRITE_SHARE,
    expiration: PERMANENT,
  };
}

function listEntry(value: string, role: string, accessLevel: string): AccessEntry {
  return { ...parseNameWithEmail(value), role, accessLevel, expiration: PERMANENT };
}

/**
 * Whether an entry belongs in the access table.
 */
export function isListedEntry(entry: AccessEntry): boolean {
  return (
    LISTED_ROLES.has(entry.role.trim().toLowerCase()) &&
    entry.accessLevel.trim().toUpperCase() === READ_WRITE_SHARE
  );
}

function sameUser(a: AccessEntry, b: AccessEntry): boolean {
  if (a.email && b.email) {
    return a.email.toLowerCase() === b.email.toLowerCase();
  }
  return a.name.toLowerCase() === b.name.toLowerCase();
}

/**
 * Entries described by the configuration's owners, contributors and readers.
 * Owners get READ-WRITE-SHARE; the others READ.
 */
export function configuredUsers(config: StudyConfig): AccessEntry[] {
  return [
    ...config.owners.map((owner) => listEntry(owner, "Owner", READ_WRITE_SHARE)),
    ...config.contributors.map((contributor) => listEntry(contributor, "Contributor", "READ")),
    ...config.readers.map((reader) => listEntry(reader, "Reader", "READ")),
  ];
}

/**
 * Build the access list for a study: PI, dataset administrator, then any
 * listed extra users, each person once.
 */
export function buildAccessList(
  config: StudyConfig,
  extraUsers: readonly AccessEntry[] = []
): AccessEntry[] {
  const candidates: AccessEntry[] = [];
  if (config.principalInvestigator) {
    candidates.push(personEntry(config.principalInvestigator, "Principal Investigator"));
  }
  if (config.datasetAdministrator) {
    candidates.push(personEntry(config.datasetAdministrator, "Dataset Administrator"));
  }
  candidates.push(...configuredUsers(config).filter(isListedEntry));
  candidates.push(...extraUsers.filter(isListedEntry));

  const result: AccessEntry[] = [];
  for (const entry of candidates) {
    if (!result.some((existing) => sameUser(existing, entry))) {
      result.push(entry);
    }
  }
  return result;
}

/**
 * Load extra authorized users from a JSON file: an array of
 * `{name, role, access_level, expiration?}` objects. Names may carry an
 * email as "Name (email)".
 *
 * @throws ConfigParseError if the file is unreadable or has the wrong shape
 */
export function loadUsersFile(file: string): AccessEntry[] {
  const result = UsersFileSchema.safeParse(readJsonFile(file));
  if (!result.success) {
    throw new ConfigParseError(
      file,
      result.error.issues.map((issue) => ({
        path: issue.path.map(String).join("."),
        message: issue.message,
      }))
    );
  }

  return result.data.map((user) => ({
    ...parseNameWithEmail(user.name),
    role: user.role,
    accessLevel: user.access_level,
    expiration: user.expiration,
  }));
}

/**
 * Display form used in tables and notification lists: "Name (email)".
 */
export function formatAccessName(entry: AccessEntry): string {
  return entry.email && entry.email !== entry.name ? `${entry.name} (${entry.email})` : entry.name;
}
