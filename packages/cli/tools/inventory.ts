/**
 * Inventory Tool: Show the hosts a selector resolves to
 *
 * Platform-agnostic implementation using RuntimeAdapter.
 */

import { resolveTargets, type HostTarget } from "@hostprep/core";
import type { ToolImplementation } from "../adapters";
import { loadProjectContext } from "../lib/config";
import { formatTargetList } from "../lib/ui";

export interface InventoryOptions {
  /** Target selector (default: all) */
  hosts?: string;
  /** Path to the inventory file */
  inventory?: string;
  envFile?: string;
  /** Output as JSON */
  json?: boolean;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

export const inventoryTool: ToolImplementation<InventoryOptions, HostTarget[]> = async (runtime, options) => {
  const { ui } = runtime;
  const context = loadProjectContext({
    inventory: options.inventory,
    envFile: options.envFile,
    cwd: options.cwd,
    env: options.env,
  });
  const selector = options.hosts ?? "all";
  const targets = resolveTargets(context.inventory, selector);

  if (options.json) {
    console.log(JSON.stringify(targets, null, 2));
    return targets;
  }

  ui.note(formatTargetList(targets), `${selector} (${targets.length} host${targets.length === 1 ? "" : "s"})`);
  return targets;
};
