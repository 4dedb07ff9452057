#!/usr/bin/env tsx

/**
 * hostprep CLI: Entry point
 *
 * Prepares CI hosts: OS dependencies, and a dedicated CI user with
 * passwordless sudo and an authorized SSH key.
 */

import * as fs from "fs";
import * as path from "path";
import { Command } from "commander";
import { z } from "zod";
import { CONNECTION_METHODS, WORKFLOWS } from "@hostprep/core";
import { setupGracefulShutdown } from "./lib/process";
import { prepareCommand } from "./commands/prepare";
import { inventoryCommand } from "./commands/inventory";
import type { PrepareOptions } from "./tools/prepare";

// Forward SIGINT/SIGTERM to child processes before exiting
setupGracefulShutdown();

const pkgJson = z
  .object({ version: z.string() })
  .parse(JSON.parse(fs.readFileSync(path.join(__dirname, "package.json"), "utf-8")));

type PrepareFlags = Omit<PrepareOptions, "workflow" | "cwd" | "env">;

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function withPrepareOptions(command: Command): Command {
  return command
    .option("-i, --inventory <path>", "Inventory file (defaults to hostprep.yaml in the project root)")
    .option("-e, --extra-vars <vars>", "Set variables as key=value, a YAML mapping, or @file (repeatable)", collect, [])
    .option("--hosts <selector>", "Group, host, `all`, or a comma-separated list")
    .option("--connection <method>", `Connection method (${CONNECTION_METHODS.join(", ")})`)
    .option("--env-file <path>", "Path to .env file (defaults to .env in project root)")
    .option("--forks <n>", "Number of hosts to provision in parallel")
    .option("--check", "Report what would change without changing anything")
    .option("--json", "Output the run report as JSON");
}

const program = new Command();

program
  .name("hostprep")
  .description("Provision CI hosts with dependencies and a passwordless-sudo CI user")
  .version(pkgJson.version);

const prepareCmd = program.command("prepare").description("Run a provisioning workflow against target hosts");

for (const workflow of WORKFLOWS) {
  const command = withPrepareOptions(prepareCmd.command(workflow.value).description(workflow.hint));
  if (workflow.value === "user") {
    command.option("--ci-user <name>", "Name of the CI user to create");
  }
  command.action(async (opts: PrepareFlags) => {
    await prepareCommand({ ...opts, workflow: workflow.value });
  });
}

program
  .command("inventory")
  .description("List the hosts a selector resolves to")
  .option("--hosts <selector>", "Group, host, `all`, or a comma-separated list", "all")
  .option("-i, --inventory <path>", "Inventory file (defaults to hostprep.yaml in the project root)")
  .option("--env-file <path>", "Path to .env file (defaults to .env in project root)")
  .option("--json", "Output as JSON")
  .action(async (opts: { hosts: string; inventory?: string; envFile?: string; json?: boolean }) => {
    await inventoryCommand(opts);
  });

program.parse();
