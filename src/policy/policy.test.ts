/**
 * FOLDER_POLICY.md rendering and writing tests.
 *
 * Run with: node --import tsx src/policy/policy.test.ts
 */

import { strict as assert } from "node:assert";
import { existsSync, mkdirSync, readFileSync, statSync, writeFileSync } from "node:fs";
import { join } from "node:path";

import {
  POLICY_FILE_NAME,
  backupPathFor,
  formatAccessRows,
  renderPolicyDocument,
  securityLevelLabel,
  writePolicyDocument,
} from "./index.js";
import { buildAccessList } from "../access/index.js";
import { FilesystemError } from "../errors.js";
import { deriveGeneratedPaths } from "../naming/index.js";
import { parseStudyConfig } from "../study/loader.js";
import type { StudyConfig } from "../study/schema.js";
import {
  EXAMPLE_STUDY,
  EXAMPLE_STUDY_FOLDER,
  captureLogger,
  finish,
  section,
  test,
  withTempDir,
} from "../testing/harness.js";

const CREATED_ON = new Date(2024, 0, 15, 9, 30, 5);

function render(config: StudyConfig): string {
  const paths = deriveGeneratedPaths({
    workPackage: config.workPackage,
    investigationLabel: config.investigationAccessionCode,
    studyLabel: config.accessionCode,
    slug: config.slug,
  });
  return renderPolicyDocument({
    config,
    paths,
    accessList: buildAccessList(config),
    now: CREATED_ON,
  });
}

function lines(text: string): string[] {
  return text.split("\n");
}

section("Rendering");

test("study information section", () => {
  const out = lines(render(parseStudyConfig(EXAMPLE_STUDY)));
  assert.equal(out[0], "# FOLDER POLICY");
  assert.ok(out.includes("- **Study Title**: Plant Stress Response Analysis"));
  assert.ok(out.includes(`- **Study Folder**: ${EXAMPLE_STUDY_FOLDER}`));
  assert.ok(out.includes("- **Investigation Label**: CXRP001"));
  assert.ok(out.includes("- **Investigation Title**: Crop Resilience Programme"));
  assert.ok(out.includes("- **Study Label**: CXRS001"));
  assert.ok(out.includes("- **Workpackage**: WP001"));
  assert.ok(out.includes("- **Date Created**: 2024-01-15"));
  assert.ok(out.includes("- **Project Lead**: Alex Rivera"));
  assert.ok(out.includes("- **Contact Email**: alex.rivera@example.org"));
});

test("description section follows the study information", () => {
  const out = lines(render(parseStudyConfig(EXAMPLE_STUDY)));
  const heading = out.indexOf("### Description");
  assert.ok(heading > 0);
  assert.equal(out[heading + 1], "Transcriptome response of seedlings to drought.");
  assert.equal(out[heading - 1], "");
  assert.equal(out[heading - 2], "- **Contact Email**: alex.rivera@example.org");
});

test("description and investigation title are left out when absent", () => {
  const { description: _d, investigation_title: _t, ...rest } = EXAMPLE_STUDY;
  const out = lines(render(parseStudyConfig(rest)));
  assert.ok(!out.includes("### Description"));
  assert.ok(!out.some((line) => line.startsWith("- **Investigation Title**")));
  const email = out.indexOf("- **Contact Email**: alex.rivera@example.org");
  assert.equal(out[email + 1], "");
  assert.equal(out[email + 2], "## Data Sensitivity Classification");
});

test("sensitivity level with its description", () => {
  const out = lines(render(parseStudyConfig(EXAMPLE_STUDY)));
  const current = out.indexOf("**Current Sensitivity Level**: INTERNAL");
  assert.ok(current > 0);
  assert.equal(out[current + 2], "Data that can be shared within the organization but not externally.");
});

test("lists every level definition in display order", () => {
  const out = lines(render(parseStudyConfig(EXAMPLE_STUDY)));
  const start = out.indexOf("### Sensitivity Level Definitions");
  assert.deepEqual(out.slice(start + 1, start + 5), [
    "- **PUBLIC**: Data that can be freely shared with the public.",
    "- **INTERNAL**: Data that can be shared within the organization but not externally.",
    "- **RESTRICTED**: Sensitive data with limited access even within the organization.",
    "- **CONFIDENTIAL**: Highly sensitive data with strictly controlled access and not listed in the data catalogue.",
  ]);
});

test("missing sensitivity asks the reader to pick one", () => {
  const { security_level: _level, ...rest } = EXAMPLE_STUDY;
  const out = lines(render(parseStudyConfig(rest)));
  const current = out.indexOf(
    "**Current Sensitivity Level**: [SELECT ONE: PUBLIC / INTERNAL / CONFIDENTIAL / RESTRICTED]"
  );
  assert.ok(current > 0);
  assert.equal(out[current + 1], "");
  assert.equal(out[current + 2], "### Sensitivity Level Definitions");
});

test("access table rows for PI and administrator", () => {
  const out = lines(render(parseStudyConfig(EXAMPLE_STUDY)));
  const header = out.indexOf("|------|------|--------------|-----------------|");
  assert.deepEqual(out.slice(header + 1, header + 3), [
    "| Alex Rivera (alex.rivera@example.org) | Principal Investigator | READ-WRITE-SHARE | PERMANENT |",
    "| Sam Lee (sam.lee@example.org) | Dataset Administrator | READ-WRITE-SHARE | PERMANENT |",
  ]);
  assert.equal(out[header + 3], "");
});

test("naming convention uses the data folder prefix", () => {
  const out = lines(render(parseStudyConfig(EXAMPLE_STUDY)));
  assert.ok(out.includes("- All first-level folders are prefixed with: **CXRP001-CXRS001_**"));
  assert.ok(out.includes("  - Raw data folder: **CXRP001-CXRS001_raw**"));
});

test("support contact uses the organization", () => {
  const config = parseStudyConfig(EXAMPLE_STUDY);
  const text = renderPolicyDocument({
    config,
    paths: deriveGeneratedPaths({
      workPackage: "WP001",
      investigationLabel: "CXRP001",
      studyLabel: "CXRS001",
      slug: "plant-stress-response-analysis",
    }),
    accessList: [],
    organization: { name: "Lab Storage", supportEmail: "help@example.org" },
    now: CREATED_ON,
  });
  assert.ok(text.endsWith("- Lab Storage support: help@example.org\n"));
});

test("missing PI gives placeholders", () => {
  const { principal_investigator: _pi, title: _title, ...rest } = EXAMPLE_STUDY;
  const out = lines(render(parseStudyConfig(rest)));
  assert.ok(out.includes("- **Study Title**: [Study Title]"));
  assert.ok(out.includes("- **Project Lead**: [Name]"));
  assert.ok(out.includes("- **Contact Email**: [Email]"));
});

test("formatAccessRows falls back to a template row", () => {
  assert.equal(
    formatAccessRows([]),
    "| [Name] | [Role] | [READ/READ-WRITE] | [YYYY-MM-DD or PERMANENT] |"
  );
});

test("securityLevelLabel", () => {
  assert.equal(securityLevelLabel("RESTRICTED"), "RESTRICTED");
  assert.equal(
    securityLevelLabel(undefined),
    "[SELECT ONE: PUBLIC / INTERNAL / CONFIDENTIAL / RESTRICTED]"
  );
});

section("Writing");

test(
  "creates the policy file",
  withTempDir((dir) => {
    const outcome = writePolicyDocument(dir, "# policy\n");
    assert.deepEqual(outcome, { status: "created", path: join(dir, POLICY_FILE_NAME) });
    assert.equal(readFileSync(join(dir, POLICY_FILE_NAME), "utf-8"), "# policy\n");
  })
);

test(
  "leaves an existing file alone without overwrite",
  withTempDir((dir) => {
    const policyPath = join(dir, POLICY_FILE_NAME);
    writeFileSync(policyPath, "edited by hand\n");
    const { logger, levels } = captureLogger();

    const outcome = writePolicyDocument(dir, "# policy\n", { logger });

    assert.equal(outcome.status, "skipped");
    assert.equal(readFileSync(policyPath, "utf-8"), "edited by hand\n");
    assert.deepEqual(levels, ["warn"]);
  })
);

test(
  "replaces an existing file after backing it up",
  withTempDir((dir) => {
    const policyPath = join(dir, POLICY_FILE_NAME);
    writeFileSync(policyPath, "old\n");

    const outcome = writePolicyDocument(dir, "new\n", { overwrite: true, now: CREATED_ON });

    const backup = join(dir, "FOLDER_POLICY.md.bak.20240115_093005");
    assert.deepEqual(outcome, { status: "replaced", path: policyPath, backupPath: backup });
    assert.equal(readFileSync(policyPath, "utf-8"), "new\n");
    assert.equal(readFileSync(backup, "utf-8"), "old\n");
  })
);

test(
  "replacing keeps the original file and writes a copy as the backup",
  withTempDir((dir) => {
    const policyPath = join(dir, POLICY_FILE_NAME);
    writeFileSync(policyPath, "old\n");
    const inode = statSync(policyPath).ino;

    const outcome = writePolicyDocument(dir, "new\n", { overwrite: true, now: CREATED_ON });

    assert.equal(statSync(policyPath).ino, inode);
    const backupPath = outcome.backupPath;
    assert.ok(backupPath !== undefined);
    assert.notEqual(statSync(backupPath).ino, inode);
    assert.equal(readFileSync(backupPath, "utf-8"), "old\n");
  })
);

test(
  "a folder in place of the policy file fails the backup and stays",
  withTempDir((dir) => {
    const policyPath = join(dir, POLICY_FILE_NAME);
    mkdirSync(policyPath);
    try {
      writePolicyDocument(dir, "x", { overwrite: true, now: CREATED_ON });
      assert.fail("Should have thrown");
    } catch (err) {
      assert.ok(err instanceof FilesystemError);
      assert.equal(err.operation, "copy");
    }
    assert.ok(statSync(policyPath).isDirectory());
  })
);

test(
  "backups from the same second get a counter",
  withTempDir((dir) => {
    const policyPath = join(dir, POLICY_FILE_NAME);
    writeFileSync(policyPath, "first\n");
    writePolicyDocument(dir, "second\n", { overwrite: true, now: CREATED_ON });
    const outcome = writePolicyDocument(dir, "third\n", { overwrite: true, now: CREATED_ON });

    assert.equal(outcome.backupPath, join(dir, "FOLDER_POLICY.md.bak.20240115_093005-1"));
    assert.equal(readFileSync(join(dir, "FOLDER_POLICY.md.bak.20240115_093005"), "utf-8"), "first\n");
    assert.equal(readFileSync(join(dir, "FOLDER_POLICY.md.bak.20240115_093005-1"), "utf-8"), "second\n");
    assert.equal(readFileSync(policyPath, "utf-8"), "third\n");
  })
);

test(
  "backupPathFor skips taken names",
  withTempDir((dir) => {
    const policyPath = join(dir, POLICY_FILE_NAME);
    assert.equal(backupPathFor(policyPath, CREATED_ON), `${policyPath}.bak.20240115_093005`);
    writeFileSync(`${policyPath}.bak.20240115_093005`, "");
    writeFileSync(`${policyPath}.bak.20240115_093005-1`, "");
    assert.equal(backupPathFor(policyPath, CREATED_ON), `${policyPath}.bak.20240115_093005-2`);
  })
);

test(
  "writing into a missing folder is a filesystem error",
  withTempDir((dir) => {
    const folder = join(dir, "missing");
    try {
      writePolicyDocument(folder, "x");
      assert.fail("Should have thrown");
    } catch (err) {
      assert.ok(err instanceof FilesystemError);
      assert.equal(err.operation, "write");
      assert.equal(err.path, join(folder, POLICY_FILE_NAME));
    }
    assert.ok(!existsSync(folder));
  })
);

finish();
