/**
 * Remote provisioning executor.
 *
 * Validates parameters locally, then provisions each target host: connect,
 * escalate, run the workflow's steps in order. The first failure stops that
 * host; nothing is rolled back, re-running converges instead.
 */

import { ProvisionError, describeError } from "./errors";
import type { HostConnector, HostSession } from "./host";
import { becomeOptions, resolveTargets } from "./inventory";
import { mergeVars, validateParameters } from "./parameters";
import type { BaseParams, BecomeOptions, HostTarget, Inventory, ProvisionLogger, Scope, StepResult, WorkflowName } from "./types";
import type { StepRunner, Workflow } from "./workflows";

export interface ExecutorOptions {
  inventory: Inventory;
  connector: HostConnector;
  logger?: ProvisionLogger;
  /** Report changes without making them */
  check?: boolean;
  /** Hosts provisioned concurrently (default: 1) */
  forks?: number;
}

export interface HostReport {
  host: string;
  ok: boolean;
  steps: StepResult[];
  error?: ProvisionError;
}

export interface RunReport {
  workflow: WorkflowName;
  check: boolean;
  ok: boolean;
  hosts: HostReport[];
}

const silentLogger: ProvisionLogger = {
  info: () => {},
  step: () => {},
  success: () => {},
  warn: () => {},
  error: () => {},
};

/**
 * Run `workflow` against the hosts its parameters select.
 *
 * @throws ProvisionError (MISSING_PARAMETER / INVALID_PARAMETER) before any
 *   connection is attempted. Host failures are reported, not thrown.
 */
export async function runWorkflow<P extends BaseParams>(
  workflow: Workflow<P>,
  scope: Scope,
  options: ExecutorOptions,
): Promise<RunReport> {
  const values = validateParameters(workflow.required, scope);
  const params = workflow.parseParams(values);
  const targets = resolveTargets(options.inventory, params.hosts);

  const check = options.check ?? false;
  const logger = options.logger ?? silentLogger;
  const become = becomeOptions(options.inventory);
  const forks = Math.max(1, Math.floor(options.forks ?? 1));

  logger.info(`${workflow.name}: ${targets.length} host(s) via ${params.connection}${check ? " (check mode)" : ""}`);

  const hosts = await mapWithLimit(targets, forks, (target) =>
    provisionHost(workflow, values, target, { connector: options.connector, logger, check, become }),
  );

  return { workflow: workflow.name, check, ok: hosts.every((host) => host.ok), hosts };
}

interface HostRunOptions {
  connector: HostConnector;
  logger: ProvisionLogger;
  check: boolean;
  become: BecomeOptions;
}

/**
 * Provision one host. Its group and host `vars` fill in parameters the run
 * leaves unset, so they are parsed again per host before connecting.
 */
async function provisionHost<P extends BaseParams>(
  workflow: Workflow<P>,
  values: Record<string, unknown>,
  target: HostTarget,
  options: HostRunOptions,
): Promise<HostReport> {
  const { logger } = options;
  const steps: StepResult[] = [];
  const fail = (error: ProvisionError): HostReport => {
    logger.error(error.message);
    return { host: target.name, ok: false, steps, error };
  };

  let params: P;
  let session: HostSession;
  try {
    params = workflow.parseParams(mergeVars(target.vars, values));
    session = await openSession(target, params, options);
  } catch (err) {
    return fail(err instanceof ProvisionError ? err : ProvisionError.connectionFailure(target.name, err));
  }

  const step: StepRunner = async (name, action) => {
    logger.step(`[${target.name}] ${name}`);
    const result = await action().catch((err: unknown) => {
      throw ProvisionError.stepFailed(target.name, name, err);
    });
    steps.push({ step: result.step, changed: result.changed, detail: result.detail });
    logger.success(`[${target.name}] ${name}: ${result.changed ? "changed" : "ok"}`);
    return result;
  };

  let failure: ProvisionError | undefined;
  try {
    await workflow.run({ host: session, target, check: options.check }, params, step);
  } catch (err) {
    failure = err instanceof ProvisionError ? err : ProvisionError.stepFailed(target.name, workflow.name, err);
  }
  await closeSession(session, target, logger);

  return failure ? fail(failure) : { host: target.name, ok: true, steps };
}

/** A session that fails to close does not change the host's outcome */
async function closeSession(session: HostSession, target: HostTarget, logger: ProvisionLogger): Promise<void> {
  try {
    await session.close();
  } catch (err) {
    logger.warn(`[${target.name}] could not close session: ${describeError(err)}`);
  }
}

async function openSession<P extends BaseParams>(
  target: HostTarget,
  params: P,
  options: HostRunOptions,
): Promise<HostSession> {
  let session: HostSession;
  try {
    session = await options.connector.connect(target, { method: params.connection, become: options.become });
  } catch (err) {
    throw ProvisionError.connectionFailure(target.name, err);
  }

  if (options.become.enabled) {
    try {
      await session.verifyPrivileges();
    } catch (err) {
      await closeSession(session, target, options.logger);
      throw ProvisionError.privilegeEscalationFailure(target.name, options.become.user, err);
    }
  }
  return session;
}

/** Map with at most `limit` promises in flight; results keep input order */
async function mapWithLimit<T, R>(items: readonly T[], limit: number, fn: (item: T) => Promise<R>): Promise<R[]> {
  const results: R[] = [];
  let next = 0;
  const worker = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++;
      results[index] = await fn(items[index]);
    }
  };
  await Promise.all(Array.from({ length: Math.min(limit, items.length) }, worker));
  return results;
}
