/**
 * .env file parser, ${env:VAR} resolver, and parameter sources.
 *
 * Parameters reach a workflow from several places. This module turns the
 * .env file, HOSTPREP_* environment variables, and --extra-vars arguments
 * into plain variable maps that the prepare tool layers on top of the
 * inventory's vars.
 */

import * as fs from "fs";
import * as path from "path";
import YAML from "yaml";
import { ENV_PREFIX } from "@hostprep/core";

// ---------------------------------------------------------------------------
// .env file parser
// ---------------------------------------------------------------------------

/**
 * Parse a .env file into a key-value map.
 * Supports KEY=value, # comments, empty lines, and quoted values ("..." / '...').
 * Returns an empty record if the file doesn't exist.
 */
export function parseEnvFile(filePath: string): Record<string, string> {
  if (!fs.existsSync(filePath)) return {};

  const content = fs.readFileSync(filePath, "utf-8");
  const result: Record<string, string> = {};

  for (const line of content.split("\n")) {
    const trimmed = line.trim();
    // Skip empty lines and comments
    if (!trimmed || trimmed.startsWith("#")) continue;

    const eqIndex = trimmed.indexOf("=");
    if (eqIndex === -1) continue;

    const key = trimmed.slice(0, eqIndex).replace(/^export\s+/, "").trim();
    let value = trimmed.slice(eqIndex + 1).trim();

    // Strip matching quotes
    if (
      value.length >= 2 &&
      ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'")))
    ) {
      value = value.slice(1, -1);
    }

    if (key) {
      result[key] = value;
    }
  }

  return result;
}

/**
 * Build a merged env dict from a .env file and the process environment.
 * Process values take precedence (standard dotenv behavior).
 */
export function buildEnvDict(envFilePath: string, processEnv: NodeJS.ProcessEnv = process.env): Record<string, string> {
  const merged: Record<string, string> = { ...parseEnvFile(envFilePath) };
  for (const [key, value] of Object.entries(processEnv)) {
    if (value !== undefined) {
      merged[key] = value;
    }
  }
  return merged;
}

// ---------------------------------------------------------------------------
// ${env:VAR} resolver
// ---------------------------------------------------------------------------

const ENV_REF_RE = /^\$\{env:([^}]+)\}$/;

/**
 * Resolve a single `${env:VAR_NAME}` reference against an env dict.
 * - If the string is a `${env:...}` reference, extracts the var name and looks it up.
 * - If it's a plain string, returns it as-is.
 * - Returns undefined only when the reference can't be resolved.
 */
export function resolveEnvRef(ref: string, env: Record<string, string>): string | undefined {
  const match = ref.match(ENV_REF_RE);
  if (!match) {
    return ref;
  }
  return env[match[1]];
}

/**
 * Resolve every string value of a vars map. Unresolvable references become
 * undefined, so the parameter counts as not set.
 */
export function resolveVarRefs(
  vars: Record<string, unknown>,
  env: Record<string, string>,
): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(vars).map(([key, value]) => [key, typeof value === "string" ? resolveEnvRef(value, env) : value]),
  );
}

// ---------------------------------------------------------------------------
// Parameter sources
// ---------------------------------------------------------------------------

/**
 * Workflow parameters from HOSTPREP_* variables.
 * e.g. HOSTPREP_CI_USER_NAME=ci-bot → { ci_user_name: "ci-bot" }
 */
export function envParameters(env: Record<string, string | undefined>): Record<string, string> {
  const params: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value === undefined || !key.startsWith(ENV_PREFIX) || key.length === ENV_PREFIX.length) continue;
    params[key.slice(ENV_PREFIX.length).toLowerCase()] = value;
  }
  return params;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseVarsDocument(source: string, text: string): Record<string, unknown> {
  const parsed: unknown = YAML.parse(text);
  if (!isPlainObject(parsed)) {
    throw new Error(`Invalid --extra-vars ${source}: expected a mapping`);
  }
  return parsed;
}

/**
 * Parse --extra-vars arguments, later arguments winning. Each one is
 * `key=value`, an inline YAML/JSON mapping (`{"key": "value"}`), or
 * `@path` to a YAML file relative to `cwd`.
 */
export function parseExtraVars(args: readonly string[], cwd: string = process.cwd()): Record<string, unknown> {
  const vars: Record<string, unknown> = {};

  for (const arg of args) {
    const trimmed = arg.trim();
    if (trimmed.startsWith("@")) {
      const filePath = path.resolve(cwd, trimmed.slice(1));
      Object.assign(vars, parseVarsDocument(`file ${filePath}`, fs.readFileSync(filePath, "utf-8")));
      continue;
    }
    if (trimmed.startsWith("{")) {
      Object.assign(vars, parseVarsDocument(`"${trimmed}"`, trimmed));
      continue;
    }

    for (const pair of trimmed.split(/\s+/).filter(Boolean)) {
      const eqIndex = pair.indexOf("=");
      if (eqIndex <= 0) {
        throw new Error(`Invalid --extra-vars entry "${pair}": expected key=value`);
      }
      vars[pair.slice(0, eqIndex)] = pair.slice(eqIndex + 1);
    }
  }

  return vars;
}
