/**
 * Folder structure parsing and materialization tests.
 *
 * Run with: node --import tsx src/structure/structure.test.ts
 */

import { strict as assert } from "node:assert";
import { existsSync, mkdirSync, readFileSync, readdirSync, writeFileSync } from "node:fs";
import { join } from "node:path";

import {
  DEFAULT_FOLDER_STRUCTURE,
  ensureDirectory,
  loadFolderStructure,
  materializeStructure,
  parseFolderStructure,
  requireDirectory,
} from "./index.js";
import { ConfigParseError, FilesystemError } from "../errors.js";
import { captureLogger, finish, section, test, withTempDir } from "../testing/harness.js";

const PREFIX = "CXRP001-CXRS001_";

section("Parsing");

test("null, list and nested values map to their variants", () => {
  const structure = parseFolderStructure({
    data: { raw: null, processed: ["batch1", "batch2"] },
    analysis: null,
    docs: ["reports", "protocols"],
  });
  assert.deepEqual(structure, [
    {
      name: "data",
      node: {
        kind: "nested",
        children: [
          { name: "raw", node: { kind: "leaf" } },
          { name: "processed", node: { kind: "list", children: ["batch1", "batch2"] } },
        ],
      },
    },
    { name: "analysis", node: { kind: "leaf" } },
    { name: "docs", node: { kind: "list", children: ["reports", "protocols"] } },
  ]);
});

test("an empty object is a leaf", () => {
  assert.deepEqual(parseFolderStructure({ raw: {} }), [{ name: "raw", node: { kind: "leaf" } }]);
});

test("rejects values of other types", () => {
  assert.throws(() => parseFolderStructure({ raw: "yes" }), ConfigParseError);
  assert.throws(() => parseFolderStructure({ raw: [1, 2] }), ConfigParseError);
  assert.throws(() => parseFolderStructure(["raw"]), ConfigParseError);
});

test("rejects empty folder names", () => {
  assert.throws(() => parseFolderStructure({ "": null }), ConfigParseError);
  assert.throws(() => parseFolderStructure({ raw: [""] }), ConfigParseError);
});

test("rejects names that differ only by surrounding spaces", () => {
  try {
    parseFolderStructure({ raw: null, "raw ": ["batch1"] });
    assert.fail("Should have thrown");
  } catch (err) {
    assert.ok(err instanceof ConfigParseError);
    assert.deepEqual(err.issues, [{ path: "raw ", message: 'Folder name "raw " duplicates "raw"' }]);
  }
});

test("rejects duplicates in nested folders", () => {
  assert.throws(
    () => parseFolderStructure({ data: { " raw": null, raw: null } }),
    (err: unknown) =>
      err instanceof ConfigParseError &&
      err.issues.some((issue) => issue.path === "data.raw" && issue.message === 'Folder name "raw" duplicates " raw"')
  );
});

test("rejects a __proto__ folder name", () => {
  const input: unknown = JSON.parse('{"__proto__": null, "raw": null}');
  try {
    parseFolderStructure(input);
    assert.fail("Should have thrown");
  } catch (err) {
    assert.ok(err instanceof ConfigParseError);
    assert.deepEqual(err.issues, [{ path: "__proto__", message: 'Folder name "__proto__" is not allowed' }]);
  }
});

test(
  "loads a structure file",
  withTempDir((dir) => {
    const file = join(dir, "structure.json");
    writeFileSync(file, JSON.stringify({ raw: { rnaseq: null } }));
    assert.deepEqual(loadFolderStructure(file), [
      { name: "raw", node: { kind: "nested", children: [{ name: "rnaseq", node: { kind: "leaf" } }] } },
    ]);
  })
);

section("Target checks");

test(
  "requireDirectory accepts directories only",
  withTempDir((dir) => {
    requireDirectory(dir);
    const file = join(dir, "file.txt");
    writeFileSync(file, "x");
    assert.throws(() => requireDirectory(file), /Target is not a directory/);
    assert.throws(() => requireDirectory(join(dir, "missing")), /Target directory does not exist/);
  })
);

section("Materialization");

test(
  "default structure creates prefixed category folders",
  withTempDir((dir) => {
    const records = materializeStructure(dir, DEFAULT_FOLDER_STRUCTURE, PREFIX);
    assert.deepEqual(
      records.map((record) => record.status),
      ["created", "created", "created"]
    );
    assert.deepEqual(readdirSync(dir).sort(), [
      "CXRP001-CXRS001_metadata",
      "CXRP001-CXRS001_processed",
      "CXRP001-CXRS001_raw",
    ]);
  })
);

test(
  "children below the first level keep their names",
  withTempDir((dir) => {
    const structure = parseFolderStructure({
      data: { raw: null, processed: ["batch1", "batch2"] },
      docs: ["reports"],
    });
    materializeStructure(dir, structure, PREFIX);
    assert.ok(existsSync(join(dir, "CXRP001-CXRS001_data", "raw")));
    assert.ok(existsSync(join(dir, "CXRP001-CXRS001_data", "processed", "batch1")));
    assert.ok(existsSync(join(dir, "CXRP001-CXRS001_data", "processed", "batch2")));
    assert.ok(existsSync(join(dir, "CXRP001-CXRS001_docs", "reports")));
    assert.deepEqual(readdirSync(join(dir, "CXRP001-CXRS001_data")).sort(), ["processed", "raw"]);
  })
);

test(
  "a second run leaves existing folders and files untouched",
  withTempDir((dir) => {
    materializeStructure(dir, DEFAULT_FOLDER_STRUCTURE, PREFIX);
    const dataFile = join(dir, "CXRP001-CXRS001_raw", "reads.csv");
    writeFileSync(dataFile, "sample,count\nA,10\n");
    mkdirSync(join(dir, "CXRP001-CXRS001_raw", "user-folder"));

    const { logger, lines } = captureLogger();
    const records = materializeStructure(dir, DEFAULT_FOLDER_STRUCTURE, PREFIX, logger);

    assert.deepEqual(
      records.map((record) => record.status),
      ["existing", "existing", "existing"]
    );
    assert.equal(readFileSync(dataFile, "utf-8"), "sample,count\nA,10\n");
    assert.ok(existsSync(join(dir, "CXRP001-CXRS001_raw", "user-folder")));
    assert.equal(lines.length, 3);
    assert.ok(lines.every((line) => line.includes("Directory already exists")));
  })
);

test(
  "a file in the way is a filesystem error",
  withTempDir((dir) => {
    const blocked = join(dir, "CXRP001-CXRS001_processed");
    writeFileSync(blocked, "not a folder");
    try {
      materializeStructure(dir, DEFAULT_FOLDER_STRUCTURE, PREFIX);
      assert.fail("Should have thrown");
    } catch (err) {
      assert.ok(err instanceof FilesystemError);
      assert.equal(err.path, blocked);
      assert.equal(err.operation, "mkdir");
    }
    // Created before the failure, and kept
    assert.ok(existsSync(join(dir, "CXRP001-CXRS001_raw")));
    assert.ok(!existsSync(join(dir, "CXRP001-CXRS001_metadata")));
  })
);

test(
  "ensureDirectory reports created then existing",
  withTempDir((dir) => {
    const path = join(dir, "study");
    assert.deepEqual(ensureDirectory(path), { path, status: "created" });
    assert.deepEqual(ensureDirectory(path), { path, status: "existing" });
  })
);

test(
  "mkdir under a missing parent is a filesystem error",
  withTempDir((dir) => {
    assert.throws(() => ensureDirectory(join(dir, "missing", "child")), (err: unknown) => {
      return err instanceof FilesystemError && err.message.includes("ENOENT");
    });
  })
);

finish();
