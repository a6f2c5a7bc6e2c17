/**
 * Minimal test harness shared by the *.test.ts scripts.
 *
 * Each test file runs in its own process:
 *   node --import tsx src/naming/naming.test.ts
 *
 * and must call finish() last so failures set a non-zero exit code.
 */

import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { createLogger, type Logger, type LogLevel } from "../logging/index.js";
import type { StudyConfigDocument } from "../study/schema.js";

let passed = 0;
let failed = 0;

export function test(name: string, fn: () => void): void {
  try {
    fn();
    passed++;
    console.log(`  ✓ ${name}`);
  } catch (err) {
    failed++;
    console.error(`  ✗ ${name}`);
    console.error(`    ${err instanceof Error ? err.message : String(err)}`);
  }
}

export function section(title: string): void {
  console.log(`\n── ${title} ──`);
}

export function finish(): void {
  console.log(`\n${passed} passed, ${failed} failed`);
  if (failed > 0) {
    process.exitCode = 1;
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// FIXTURES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Run a test body against a fresh temporary directory, removed afterwards.
 */
export function withTempDir(fn: (dir: string) => void): () => void {
  return () => {
    const dir = mkdtempSync(join(tmpdir(), "study-folder-test-"));
    try {
      fn(dir);
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  };
}

export interface CapturedLogger {
  logger: Logger;
  lines: string[];
  levels: LogLevel[];
}

/**
 * Logger that records lines instead of printing them.
 */
export function captureLogger(): CapturedLogger {
  const lines: string[] = [];
  const levels: LogLevel[] = [];
  const logger = createLogger({
    level: "debug",
    console: false,
    runId: "test-run",
    sink: (line, level) => {
      lines.push(line);
      levels.push(level);
    },
  });
  return { logger, lines, levels };
}

/** A complete study configuration document. */
export const EXAMPLE_STUDY: StudyConfigDocument = {
  accession_code: "CXRS001",
  security_level: "internal",
  investigation_accession_code: "CXRP001",
  investigation_work_package: "WP001",
  investigation_title: "Crop Resilience Programme",
  title: "Plant Stress Response Analysis",
  slug: "plant-stress-response-analysis",
  description: "Transcriptome response of seedlings to drought.",
  principal_investigator: {
    first_name: "Alex",
    last_name: "Rivera",
    email: "alex.rivera@example.org",
  },
  dataset_administrator: {
    first_name: "Sam",
    last_name: "Lee",
    email: "sam.lee@example.org",
  },
};

export const EXAMPLE_STUDY_FOLDER = "s_WP001-CXRP001-CXRS001_plant-stress-response-analysis";
