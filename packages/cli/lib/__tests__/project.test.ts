import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, mkdirSync, writeFileSync, rmSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import { MANIFEST_FILE } from "@hostprep/core";
import { findProjectRoot, findInventoryFile } from "../project";

let tmpDir: string;

beforeEach(() => {
  tmpDir = mkdtempSync(join(tmpdir(), "project-root-test-"));
});

afterEach(() => {
  rmSync(tmpDir, { recursive: true, force: true });
});

describe("findProjectRoot", () => {
  it("returns the directory containing hostprep.yaml", () => {
    writeFileSync(join(tmpDir, MANIFEST_FILE), "vars: {}\n");

    expect(findProjectRoot(tmpDir)).toBe(tmpDir);
  });

  it("walks up to find hostprep.yaml in a parent directory", () => {
    writeFileSync(join(tmpDir, MANIFEST_FILE), "vars: {}\n");
    const nested = join(tmpDir, "a", "b", "c");
    mkdirSync(nested, { recursive: true });

    expect(findProjectRoot(nested)).toBe(tmpDir);
  });

  it("returns null when no hostprep.yaml exists", () => {
    expect(findProjectRoot(tmpDir)).toBeNull();
  });

  it("returns the nearest ancestor with hostprep.yaml", () => {
    writeFileSync(join(tmpDir, MANIFEST_FILE), "vars: {}\n");
    const inner = join(tmpDir, "sub");
    mkdirSync(join(inner, "deep"), { recursive: true });
    writeFileSync(join(inner, MANIFEST_FILE), "vars: {}\n");

    expect(findProjectRoot(join(inner, "deep"))).toBe(inner);
  });
});

describe("findInventoryFile", () => {
  it("resolves an explicit path against cwd", () => {
    writeFileSync(join(tmpDir, "staging.yaml"), "vars: {}\n");

    expect(findInventoryFile("staging.yaml", tmpDir)).toBe(join(tmpDir, "staging.yaml"));
  });

  it("fails when an explicit path does not exist", () => {
    expect(() => findInventoryFile("missing.yaml", tmpDir)).toThrow(
      `Inventory file not found: ${join(tmpDir, "missing.yaml")}`,
    );
  });

  it("falls back to the project's hostprep.yaml", () => {
    writeFileSync(join(tmpDir, MANIFEST_FILE), "vars: {}\n");
    mkdirSync(join(tmpDir, "sub"));

    expect(findInventoryFile(undefined, join(tmpDir, "sub"))).toBe(join(tmpDir, MANIFEST_FILE));
  });

  it("returns null outside a project", () => {
    expect(findInventoryFile(undefined, tmpDir)).toBeNull();
  });
});
