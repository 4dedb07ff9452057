/**
 * Project root detection for hostprep inventories.
 *
 * Walks up from the working directory looking for hostprep.yaml. Running
 * outside a project is allowed: workflows then target ad-hoc hosts.
 */

import * as fs from "fs";
import * as path from "path";
import { MANIFEST_FILE } from "@hostprep/core";

/**
 * Walk up from `startDir` looking for a directory that contains MANIFEST_FILE.
 * Returns the directory path if found, or null if the filesystem root is reached.
 */
export function findProjectRoot(startDir: string = process.cwd()): string | null {
  let dir = path.resolve(startDir);
  while (true) {
    if (fs.existsSync(path.join(dir, MANIFEST_FILE))) {
      return dir;
    }
    const parent = path.dirname(dir);
    if (parent === dir) {
      return null;
    }
    dir = parent;
  }
}

/**
 * Locate the inventory file: an explicit path must exist, otherwise the
 * nearest hostprep.yaml above `cwd` is used. Null when there is none.
 */
export function findInventoryFile(explicitPath: string | undefined, cwd: string = process.cwd()): string | null {
  if (explicitPath !== undefined) {
    const resolved = path.resolve(cwd, explicitPath);
    if (!fs.existsSync(resolved)) {
      throw new Error(`Inventory file not found: ${resolved}`);
    }
    return resolved;
  }
  const root = findProjectRoot(cwd);
  return root === null ? null : path.join(root, MANIFEST_FILE);
}
