/**
 * Zod schemas for workflow parameters, applied once every required
 * parameter is known to be present.
 */

import { z } from "zod";
import { CONNECTION_METHODS } from "../constants";

/** useradd's default NAME_REGEX, with its 32 character limit */
export const CI_USER_NAME_RE = /^[a-z_][a-z0-9_-]*[$]?$/;

export const BaseParamsSchema = z.object({
  /** Target selector: group, host, `all`, or a comma-separated list */
  hosts: z.string().trim().min(1, "must not be empty"),
  connection: z.enum(CONNECTION_METHODS),
  /** Overrides the instance metadata key URL */
  metadata_key_url: z.string().url().optional(),
  /** Timeout in seconds for fetching the key */
  metadata_timeout: z.coerce.number().int().positive().optional(),
});

export const DependenciesParamsSchema = BaseParamsSchema;

export const UserParamsSchema = BaseParamsSchema.extend({
  ci_user_name: z
    .string()
    .max(32, "must be at most 32 characters")
    .regex(CI_USER_NAME_RE, "must be a valid user name"),
});
