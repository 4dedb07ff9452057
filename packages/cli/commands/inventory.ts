/**
 * hostprep inventory: List the hosts a selector resolves to
 *
 * This command wraps the platform-agnostic inventoryTool with the CLI adapter.
 */

import { inventoryTool, createCLIAdapter, type InventoryOptions } from "../tools";
import { exitWithError } from "../lib/ui";

export async function inventoryCommand(opts: InventoryOptions): Promise<void> {
  try {
    await inventoryTool(createCLIAdapter(), opts);
  } catch (err) {
    exitWithError(err instanceof Error ? err.message : String(err));
  }
}
