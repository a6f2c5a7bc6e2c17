/**
 * Template loader.
 *
 * Loads templates from disk, parses them once and caches the result.
 * The bundled templates live in the package's `templates/` directory.
 */

import { existsSync, readFileSync } from "node:fs";
import { basename, extname, join, resolve } from "node:path";
import { fileURLToPath } from "node:url";

import { StudyFolderError } from "../errors.js";
import { parseTemplate, type ParsedTemplate } from "./template.js";

export class TemplateLoadError extends StudyFolderError {
  constructor(
    public readonly filePath: string,
    message?: string
  ) {
    super(message ?? `Failed to load template: ${filePath}`);
  }
}

/** Directory holding the templates shipped with the package. */
export const BUNDLED_TEMPLATE_DIR = fileURLToPath(new URL("../../templates/", import.meta.url));

const TEMPLATE_EXTENSIONS = new Set([".md", ".txt"]);

export class TemplateLoader {
  private readonly baseDir: string;
  private readonly cache = new Map<string, ParsedTemplate>();

  constructor(baseDir: string = BUNDLED_TEMPLATE_DIR) {
    this.baseDir = resolve(baseDir);

    if (!existsSync(this.baseDir)) {
      throw new TemplateLoadError(this.baseDir, `Template directory does not exist: ${this.baseDir}`);
    }
  }

  /**
   * Load and parse a template file; later calls return the cached result.
   *
   * @param filename - Filename relative to the base directory
   */
  load(filename: string): ParsedTemplate {
    const cached = this.cache.get(filename);
    if (cached) return cached;

    const filePath = join(this.baseDir, filename);
    const ext = extname(filename).toLowerCase();
    if (!TEMPLATE_EXTENSIONS.has(ext)) {
      throw new TemplateLoadError(
        filePath,
        `Unsupported template extension "${ext}". Use: ${[...TEMPLATE_EXTENSIONS].join(", ")}`
      );
    }

    if (!existsSync(filePath)) {
      throw new TemplateLoadError(filePath, `Template file not found: ${filePath}`);
    }

    const parsed = parseTemplate(readFileSync(filePath, "utf-8"), basename(filename, ext));
    this.cache.set(filename, parsed);
    return parsed;
  }
}

let bundledLoader: TemplateLoader | undefined;

/**
 * Shared loader for the bundled templates.
 */
export function bundledTemplates(): TemplateLoader {
  bundledLoader ??= new TemplateLoader();
  return bundledLoader;
}
