/**
 * Target resolution against the inventory.
 */

import { mergeVars } from "./parameters";
import { InventorySchema } from "./schemas";
import { ProvisionError } from "./errors";
import type { BecomeOptions, HostEntry, HostTarget, Inventory, InventoryInput } from "./types";

/** Name of the control host whose variables count as discovered facts */
export const CONTROL_HOST = "localhost";

/** Parse a raw inventory, applying defaults. Throws a ZodError when invalid. */
export function parseInventory(raw: unknown): Inventory {
  return InventorySchema.parse(raw ?? {});
}

/** An inventory with no groups, for ad-hoc targets */
export function emptyInventory(): Inventory {
  const input: InventoryInput = {};
  return InventorySchema.parse(input);
}

function toTarget(entry: HostEntry, groupVars: Record<string, unknown> | undefined): HostTarget {
  return {
    name: entry.name,
    address: entry.address ?? entry.name,
    port: entry.port,
    user: entry.user,
    identityFile: entry.identityFile,
    container: entry.container,
    vars: mergeVars(groupVars, entry.vars),
  };
}

/** Every host of every group, in file order, first occurrence winning */
export function allTargets(inventory: Inventory): HostTarget[] {
  const targets: HostTarget[] = [];
  for (const group of Object.values(inventory.groups)) {
    for (const entry of group.hosts) {
      targets.push(toTarget(entry, group.vars));
    }
  }
  return dedupe(targets);
}

function dedupe(targets: HostTarget[]): HostTarget[] {
  const seen = new Set<string>();
  return targets.filter((target) => {
    if (seen.has(target.name)) return false;
    seen.add(target.name);
    return true;
  });
}

/**
 * Resolve a target selector: `all`, a group name, a host name, or a
 * comma-separated list of those. Unknown names are ad-hoc addresses.
 */
export function resolveTargets(inventory: Inventory, selector: string): HostTarget[] {
  const patterns = selector
    .split(",")
    .map((pattern) => pattern.trim())
    .filter(Boolean);
  const known = allTargets(inventory);
  const targets: HostTarget[] = [];

  for (const pattern of patterns) {
    if (pattern === "all") {
      targets.push(...known);
      continue;
    }
    const group = inventory.groups[pattern];
    if (group) {
      targets.push(...group.hosts.map((entry) => toTarget(entry, group.vars)));
      continue;
    }
    const host = known.find((target) => target.name === pattern);
    targets.push(host ?? { name: pattern, address: pattern, vars: {} });
  }

  const resolved = dedupe(targets);
  if (resolved.length === 0) {
    throw ProvisionError.invalidParameter("hosts", `"${selector}" matched no hosts`);
  }
  return resolved;
}

/** Variables the inventory defines for the control host */
export function discoverFacts(inventory: Inventory): Record<string, unknown> {
  return allTargets(inventory).find((target) => target.name === CONTROL_HOST)?.vars ?? {};
}

export function becomeOptions(inventory: Inventory): BecomeOptions {
  return {
    enabled: inventory.become,
    user: inventory.become_user,
    method: inventory.become_method,
  };
}
