/**
 * Precondition validation: runs before any host is contacted.
 */

import type { z } from "zod";
import { ProvisionError } from "./errors";
import type { Scope } from "./types";

/** Explicit variables and discovered facts merged, explicit winning */
export function scopeValues(scope: Scope): Record<string, unknown> {
  const values: Record<string, unknown> = { ...scope.facts };
  for (const [key, value] of Object.entries(scope.vars)) {
    if (value !== undefined) values[key] = value;
  }
  return values;
}

function isPresent(source: Record<string, unknown>, name: string): boolean {
  return Object.prototype.hasOwnProperty.call(source, name) && source[name] !== undefined;
}

/**
 * Check that every required parameter is set in the explicit variables or
 * the discovered facts. The first missing name aborts with MISSING_PARAMETER.
 *
 * @returns the merged scope values
 */
export function validateParameters(required: readonly string[], scope: Scope): Record<string, unknown> {
  for (const name of required) {
    if (!isPresent(scope.vars, name) && !isPresent(scope.facts, name)) {
      throw ProvisionError.missingParameter(name);
    }
  }
  return scopeValues(scope);
}

/**
 * Parse present values into a typed parameter struct.
 * The first schema issue aborts with INVALID_PARAMETER naming the parameter.
 */
export function parseParameters<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, values: Record<string, unknown>): T {
  const result = schema.safeParse(values);
  if (result.success) return result.data;

  const [issue] = result.error.issues;
  const parameter = issue && issue.path.length > 0 ? String(issue.path[0]) : "parameters";
  throw ProvisionError.invalidParameter(parameter, issue ? issue.message : "invalid value");
}

/**
 * Layer variable sources, later sources winning. Undefined values never
 * shadow an earlier definition.
 */
export function mergeVars(...sources: Array<Record<string, unknown> | undefined>): Record<string, unknown> {
  const merged: Record<string, unknown> = {};
  for (const source of sources) {
    if (!source) continue;
    for (const [key, value] of Object.entries(source)) {
      if (value !== undefined) merged[key] = value;
    }
  }
  return merged;
}
