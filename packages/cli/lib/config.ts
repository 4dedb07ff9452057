/**
 * Load the hostprep.yaml inventory.
 *
 * The inventory is optional: without one, workflows run against ad-hoc
 * hosts named on the command line with default escalation settings.
 */

import * as fs from "fs";
import * as path from "path";
import YAML from "yaml";
import { ZodError } from "zod";
import { emptyInventory, parseInventory, type Inventory } from "@hostprep/core";
import { buildEnvDict, resolveVarRefs } from "./env";
import { findInventoryFile, findProjectRoot } from "./project";

export interface LoadedInventory {
  inventory: Inventory;
  /** Absolute path of the file read, or null when none was found */
  path: string | null;
}

export interface LoadInventoryOptions {
  /** Explicit --inventory path; must exist when given */
  path?: string;
  cwd?: string;
  /** Env dict used to resolve ${env:VAR} references in vars */
  env?: Record<string, string>;
}

/** One line per schema issue, prefixed with the dotted path */
export function formatZodError(err: ZodError): string {
  return err.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("\n");
}

/** Resolve ${env:VAR} references in inventory, group and host vars */
export function resolveInventoryRefs(inventory: Inventory, env: Record<string, string>): Inventory {
  const groups: Inventory["groups"] = {};
  for (const [name, group] of Object.entries(inventory.groups)) {
    groups[name] = {
      ...group,
      vars: group.vars && resolveVarRefs(group.vars, env),
      hosts: group.hosts.map((host) => ({ ...host, vars: host.vars && resolveVarRefs(host.vars, env) })),
    };
  }
  return { ...inventory, vars: resolveVarRefs(inventory.vars, env), groups };
}

/**
 * Find, parse and validate the inventory.
 * Throws with the file path in the message when the file is unreadable or invalid.
 */
export function loadInventory(options: LoadInventoryOptions = {}): LoadedInventory {
  const filePath = findInventoryFile(options.path, options.cwd);
  if (filePath === null) {
    return { inventory: emptyInventory(), path: null };
  }

  let inventory: Inventory;
  try {
    const raw: unknown = YAML.parse(fs.readFileSync(filePath, "utf-8"));
    inventory = parseInventory(raw);
  } catch (err) {
    const detail = err instanceof ZodError ? formatZodError(err) : err instanceof Error ? err.message : String(err);
    throw new Error(`Failed to load ${filePath}:\n${detail}`);
  }

  return { inventory: resolveInventoryRefs(inventory, options.env ?? {}), path: filePath };
}

export interface ProjectContextOptions {
  /** --inventory path */
  inventory?: string;
  /** --env-file path; defaults to .env in the project root */
  envFile?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

export interface ProjectContext extends LoadedInventory {
  /** .env file merged with the process environment */
  env: Record<string, string>;
}

/** Load the env dict and the inventory, resolving references against the former */
export function loadProjectContext(options: ProjectContextOptions = {}): ProjectContext {
  const cwd = options.cwd ?? process.cwd();
  let envFile = path.join(findProjectRoot(cwd) ?? cwd, ".env");
  if (options.envFile !== undefined) {
    envFile = path.resolve(cwd, options.envFile);
    if (!fs.existsSync(envFile)) {
      throw new Error(`Env file not found: ${envFile}`);
    }
  }

  const env = buildEnvDict(envFile, options.env ?? process.env);
  return { ...loadInventory({ path: options.inventory, cwd, env }), env };
}
