/**
 * Error taxonomy for study folder creation.
 *
 * Every failure the pipeline reports on purpose is a StudyFolderError, so
 * the CLI can tell expected failures (print message, exit 1) from bugs.
 */

export abstract class StudyFolderError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }

  /**
   * Format the error for display.
   */
  format(): string {
    return this.message;
  }
}

/**
 * A required field is absent or blank.
 */
export class MissingFieldError extends StudyFolderError {
  public readonly fields: string[];

  constructor(fields: string[], source?: string) {
    const where = source ? ` in ${source}` : "";
    super(`Missing required field(s)${where}: ${fields.join(", ")}`);
    this.fields = fields;
  }
}

/**
 * A value is not one of the recognized enumeration members.
 */
export class InvalidEnumError extends StudyFolderError {
  constructor(
    public readonly field: string,
    public readonly value: string,
    public readonly allowed: readonly string[]
  ) {
    super(`Invalid ${field}: "${value}". Must be one of ${allowed.join(", ")}`);
  }
}

export type FilesystemOperation = "stat" | "mkdir" | "read" | "write" | "copy";

/**
 * A directory or file operation failed.
 */
export class FilesystemError extends StudyFolderError {
  constructor(
    public readonly path: string,
    public readonly operation: FilesystemOperation,
    message: string,
    cause?: unknown
  ) {
    super(message, { cause });
  }

  /**
   * Wrap a Node.js fs error, keeping its code in the message.
   */
  static from(path: string, operation: FilesystemOperation, err: unknown): FilesystemError {
    const code =
      err instanceof Error && "code" in err && typeof err.code === "string"
        ? err.code
        : undefined;
    const detail = code ?? (err instanceof Error ? err.message : String(err));
    return new FilesystemError(path, operation, `Cannot ${operation} ${path}: ${detail}`, err);
  }
}

/**
 * Individual problem found while parsing a configuration document.
 */
export interface ParseIssue {
  /** Dotted path to the offending value; empty for the document root */
  path: string;
  message: string;
}

/**
 * A configuration or structure file is not well-formed.
 */
export class ConfigParseError extends StudyFolderError {
  public readonly issues: ParseIssue[];

  constructor(
    public readonly file: string,
    issues: ParseIssue[],
    cause?: unknown
  ) {
    super(`Cannot parse ${file}: ${issues.length} issue(s)`, { cause });
    this.issues = issues;
  }

  override format(): string {
    const lines = [`Cannot parse ${this.file}:`];
    for (const issue of this.issues) {
      lines.push(`  - ${issue.path || "(root)"}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}
