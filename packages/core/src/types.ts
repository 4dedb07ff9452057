/**
 * Shared type definitions for hostprep.
 * Types are derived from Zod schemas: the schemas are the source of truth.
 */

import type { z } from "zod";
import type { BECOME_METHODS, CONNECTION_METHODS, PACKAGE_MANAGERS, WORKFLOWS } from "./constants";
import type {
  BaseParamsSchema,
  DependenciesParamsSchema,
  HostEntrySchema,
  InventorySchema,
  UserParamsSchema,
} from "./schemas";

/** The hostprep.yaml inventory, with defaults applied */
export type Inventory = z.infer<typeof InventorySchema>;

/** The hostprep.yaml inventory as written */
export type InventoryInput = z.input<typeof InventorySchema>;

export type HostEntry = z.infer<typeof HostEntrySchema>;

export type ConnectionMethod = (typeof CONNECTION_METHODS)[number];

export type BecomeMethod = (typeof BECOME_METHODS)[number];

export type PackageManager = (typeof PACKAGE_MANAGERS)[number];

export type WorkflowName = (typeof WORKFLOWS)[number]["value"];

export type BaseParams = z.infer<typeof BaseParamsSchema>;

export type DependenciesParams = z.infer<typeof DependenciesParamsSchema>;

export type UserParams = z.infer<typeof UserParamsSchema>;

/**
 * Variables a workflow can read. `vars` are supplied explicitly (inventory,
 * env, command line); `facts` are discovered for the control host.
 */
export interface Scope {
  vars: Record<string, unknown>;
  facts: Record<string, unknown>;
}

/** A host resolved from the target selector */
export interface HostTarget {
  name: string;
  address: string;
  port?: number;
  user?: string;
  identityFile?: string;
  container?: string;
  /** Group variables merged with host variables */
  vars: Record<string, unknown>;
}

export interface BecomeOptions {
  enabled: boolean;
  user: string;
  method: BecomeMethod;
}

/** Outcome of one idempotent step on one host */
export interface StepResult {
  step: string;
  /** Whether the step modified the host (or would have, in check mode) */
  changed: boolean;
  detail?: string;
}

/** Logging interface; structurally matches the CLI's log adapter */
export interface ProvisionLogger {
  info(message: string): void;
  step(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}
