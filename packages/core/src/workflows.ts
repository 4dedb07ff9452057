/**
 * Workflow definitions: the required parameters and ordered steps of
 * `prepare dependencies` and `prepare user`.
 */

import {
  BASE_REQUIRED_PARAMETERS,
  METADATA_KEY_URL,
  METADATA_TIMEOUT_SECONDS,
  STEP_NAMES,
  USER_REQUIRED_PARAMETERS,
} from "./constants";
import type { DependencyInstaller } from "./dependencies";
import { parseParameters } from "./parameters";
import { DependenciesParamsSchema, UserParamsSchema } from "./schemas";
import {
  ciUserSpec,
  ensureUser,
  ensureUserDirectories,
  grantPasswordlessSudo,
  installAuthorizedKey,
  type StepContext,
} from "./steps";
import type { BaseParams, DependenciesParams, HostTarget, StepResult, UserParams, WorkflowName } from "./types";

/** Runs one named step, recording its result and attributing failures to it */
export interface StepRunner {
  <R extends StepResult>(step: string, action: () => Promise<R>): Promise<R>;
}

export interface WorkflowContext extends StepContext {
  target: HostTarget;
}

export interface Workflow<P extends BaseParams = BaseParams> {
  name: WorkflowName;
  description: string;
  /** Checked for presence before anything else happens */
  required: readonly string[];
  parseParams(values: Record<string, unknown>): P;
  run(ctx: WorkflowContext, params: P, step: StepRunner): Promise<void>;
}

export function createDependenciesWorkflow(installer: DependencyInstaller): Workflow<DependenciesParams> {
  return {
    name: "dependencies",
    description: "Install the OS packages a CI host needs",
    required: BASE_REQUIRED_PARAMETERS,
    parseParams: (values) => parseParameters(DependenciesParamsSchema, values),
    async run(ctx, _params, step) {
      await step(STEP_NAMES.installDependencies, () => installer.install(ctx));
    },
  };
}

export const userWorkflow: Workflow<UserParams> = {
  name: "user",
  description: "Create the CI user with passwordless sudo and an authorized SSH key",
  required: USER_REQUIRED_PARAMETERS,
  parseParams: (values) => parseParameters(UserParamsSchema, values),
  async run(ctx, params, step) {
    const { user } = await step(STEP_NAMES.ensureUser, () => ensureUser(ctx, ciUserSpec(params.ci_user_name)));
    await step(STEP_NAMES.grantSudo, () => grantPasswordlessSudo(ctx, user));
    await step(STEP_NAMES.ensureDirectories, () => ensureUserDirectories(ctx, user));
    await step(STEP_NAMES.authorizeKey, () =>
      installAuthorizedKey(ctx, user, {
        url: params.metadata_key_url ?? METADATA_KEY_URL,
        timeoutSeconds: params.metadata_timeout ?? METADATA_TIMEOUT_SECONDS,
      }),
    );
  },
};
