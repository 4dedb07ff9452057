/**
 * Prepare Tool: Run a provisioning workflow against CI hosts
 *
 * Layers parameters from the inventory, .env, HOSTPREP_* variables,
 * --extra-vars and dedicated flags, then hands off to the executor.
 *
 * Platform-agnostic implementation using RuntimeAdapter.
 */

import {
  PackageDependencyInstaller,
  ProvisionError,
  createDependenciesWorkflow,
  discoverFacts,
  mergeVars,
  runWorkflow,
  userWorkflow,
  type BaseParams,
  type HostConnector,
  type Inventory,
  type ProvisionLogger,
  type RunReport,
  type Workflow,
  type WorkflowName,
} from "@hostprep/core";
import type { ExecAdapter, ToolImplementation } from "../adapters";
import { loadProjectContext } from "../lib/config";
import { envParameters, parseExtraVars } from "../lib/env";
import { ShellHostConnector } from "../lib/shell-host";
import { formatRunSummary, serializeReport } from "../lib/ui";

export interface PrepareOptions {
  workflow: WorkflowName;
  /** Path to the inventory file (defaults to hostprep.yaml in the project root) */
  inventory?: string;
  /** --extra-vars arguments, in order */
  extraVars?: string[];
  /** Target selector */
  hosts?: string;
  connection?: string;
  /** CI user name (user workflow) */
  ciUser?: string;
  /** Path to .env file (defaults to .env in the project root) */
  envFile?: string;
  /** Hosts provisioned concurrently */
  forks?: number | string;
  /** Report changes without making them */
  check?: boolean;
  /** Output the run report as JSON */
  json?: boolean;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

const silentLogger: ProvisionLogger = {
  info: () => {},
  step: () => {},
  success: () => {},
  warn: () => {},
  error: () => {},
};

export function parseForks(value: number | string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const forks = typeof value === "number" ? value : Number(value.trim());
  if (!Number.isInteger(forks) || forks < 1) {
    throw ProvisionError.invalidParameter("forks", "must be a positive integer");
  }
  return forks;
}

function selectWorkflow(name: WorkflowName, inventory: Inventory): Workflow<BaseParams> {
  return name === "user"
    ? userWorkflow
    : createDependenciesWorkflow(new PackageDependencyInstaller(inventory.dependencies.packages));
}

/**
 * Build the prepare tool around a connector factory; the CLI connects
 * through ssh, docker or a local shell.
 */
export function createPrepareTool(
  createConnector: (exec: ExecAdapter) => HostConnector = (exec) => new ShellHostConnector(exec),
): ToolImplementation<PrepareOptions, RunReport> {
  return async (runtime, options) => {
    const { ui, exec } = runtime;
    const cwd = options.cwd ?? process.cwd();
    const forks = parseForks(options.forks);

    const context = loadProjectContext({
      inventory: options.inventory,
      envFile: options.envFile,
      cwd,
      env: options.env,
    });
    const { inventory } = context;

    const vars = mergeVars(
      inventory.vars,
      envParameters(context.env),
      parseExtraVars(options.extraVars ?? [], cwd),
      { hosts: options.hosts, connection: options.connection, ci_user_name: options.ciUser },
    );

    if (!options.json) {
      ui.intro(`hostprep prepare ${options.workflow}`);
      ui.log.info(
        context.path ? `Inventory: ${context.path}` : "No hostprep.yaml found; hosts are used as addresses",
      );
    }

    const report = await runWorkflow(
      selectWorkflow(options.workflow, inventory),
      { vars, facts: discoverFacts(inventory) },
      {
        inventory,
        connector: createConnector(exec),
        logger: options.json ? silentLogger : ui.log,
        check: options.check,
        forks,
      },
    );

    if (options.json) {
      console.log(JSON.stringify(serializeReport(report), null, 2));
      return report;
    }

    ui.note(formatRunSummary(report), report.check ? "Summary (check mode)" : "Summary");
    if (report.ok) {
      ui.outro("All hosts prepared.");
    }
    return report;
  };
}

export const prepareTool = createPrepareTool();
