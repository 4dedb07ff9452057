/**
 * Shared UI helpers using @clack/prompts
 */

import * as p from "@clack/prompts";
import pc from "picocolors";
import type { HostReport, HostTarget, RunReport } from "@hostprep/core";

/**
 * Show an error and exit
 */
export function exitWithError(message: string): never {
  p.log.error(message);
  process.exit(1);
}

function formatHost(host: HostReport): string {
  const changed = host.steps.filter((step) => step.changed).length;
  if (host.ok) {
    return `  ${pc.green("ok")}      ${pc.bold(host.host)}  ${changed} changed, ${host.steps.length - changed} unchanged`;
  }
  const failedAt = host.error?.step ? ` at "${host.error.step}"` : "";
  return `  ${pc.red("failed")}  ${pc.bold(host.host)}  ${host.error?.code ?? "ERROR"}${failedAt}`;
}

/**
 * Per-host summary of a workflow run
 */
export function formatRunSummary(report: RunReport): string {
  return report.hosts.map(formatHost).join("\n");
}

/** JSON-safe form of a run report; errors become {code, message, step} */
export function serializeReport(report: RunReport) {
  return {
    ...report,
    hosts: report.hosts.map(({ error, ...host }) => ({
      ...host,
      ...(error && { error: { code: error.code, message: error.message, step: error.step } }),
    })),
  };
}

/**
 * Format resolved hosts for display
 */
export function formatTargetList(targets: readonly HostTarget[]): string {
  return targets
    .map((target) => {
      const port = target.port !== undefined ? `:${target.port}` : "";
      const login = target.user ? `${target.user}@` : "";
      const location = `${login}${target.address}${port}`;
      return location === target.name ? `  ${pc.bold(target.name)}` : `  ${pc.bold(target.name)}  ${pc.dim(location)}`;
    })
    .join("\n");
}
