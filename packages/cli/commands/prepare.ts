/**
 * hostprep prepare: Provision CI hosts
 *
 * This command wraps the platform-agnostic prepareTool with the CLI adapter.
 */

import { prepareTool, createCLIAdapter, type PrepareOptions } from "../tools";
import { exitWithError } from "../lib/ui";

export async function prepareCommand(opts: PrepareOptions): Promise<void> {
  try {
    const report = await prepareTool(createCLIAdapter(), opts);
    if (report.ok) return;
    if (opts.json) {
      process.exitCode = 1;
      return;
    }
    const failed = report.hosts.filter((host) => !host.ok).length;
    exitWithError(`${failed} of ${report.hosts.length} host(s) failed`);
  } catch (err) {
    exitWithError(err instanceof Error ? err.message : String(err));
  }
}
