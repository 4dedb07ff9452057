/**
 * Zod schemas for the hostprep.yaml inventory.
 * These are the source of truth: TypeScript types are derived via z.infer<>.
 */

import { z } from "zod";
import { BECOME_METHODS } from "../constants";

const VarsSchema = z.record(z.string(), z.unknown());

/** Schema for a single host in a group */
export const HostEntrySchema = z.object({
  /** Inventory name, used in selectors and reports */
  name: z.string().min(1, "Host name is required"),
  /** Address to connect to. Defaults to the name. */
  address: z.string().min(1).optional(),
  /** SSH port */
  port: z.number().int().positive().max(65535, "port must be at most 65535").optional(),
  /** Remote login user for SSH */
  user: z.string().min(1).optional(),
  /** Private key passed to ssh -i */
  identityFile: z.string().min(1).optional(),
  /** Container name for the docker connection. Defaults to the address. */
  container: z.string().min(1).optional(),
  /** Host variables, overriding group variables. Fill in parameters the run leaves unset. */
  vars: VarsSchema.optional(),
});

/** Schema for a named group of hosts */
export const HostGroupSchema = z.object({
  hosts: z.array(HostEntrySchema).default([]),
  /** Variables for every host of the group */
  vars: VarsSchema.optional(),
});

/** Schema for the dependency role's configuration */
export const DependenciesConfigSchema = z.object({
  /** OS packages to install on every target host */
  packages: z.array(z.string().min(1, "Package names must be non-empty")).default([]),
});

/** Schema for the hostprep.yaml inventory */
export const InventorySchema = z.object({
  /** Variables visible to every workflow */
  vars: VarsSchema.default({}),
  groups: z.record(z.string(), HostGroupSchema).default({}),
  /** Escalate privileges after connecting */
  become: z.boolean().default(true),
  become_user: z.string().min(1).default("root"),
  become_method: z.enum(BECOME_METHODS).default("sudo"),
  dependencies: DependenciesConfigSchema.default({}),
});
