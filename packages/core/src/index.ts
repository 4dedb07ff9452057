/**
 * @hostprep/core: workflows, steps, schemas, and the provisioning executor
 */

// Types
export type {
  BaseParams,
  BecomeMethod,
  BecomeOptions,
  ConnectionMethod,
  DependenciesParams,
  HostEntry,
  HostTarget,
  Inventory,
  InventoryInput,
  PackageManager,
  ProvisionLogger,
  Scope,
  StepResult,
  UserParams,
  WorkflowName,
} from "./types";

// Constants
export {
  BASE_REQUIRED_PARAMETERS,
  BECOME_METHODS,
  CI_USER_COMMENT,
  CONNECTION_METHODS,
  ENV_PREFIX,
  HOME_ROOT,
  MANIFEST_FILE,
  METADATA_KEY_URL,
  METADATA_TIMEOUT_SECONDS,
  PACKAGE_MANAGERS,
  SSH_CONNECT_TIMEOUT,
  STEP_NAMES,
  SUDOERS_PATH,
  SUDOERS_VALIDATE_COMMAND,
  USER_REQUIRED_PARAMETERS,
  WORKFLOWS,
  sudoersLine,
  userHome,
} from "./constants";

// Errors
export type { ProvisionErrorCode, ProvisionErrorContext } from "./errors";
export { ProvisionError, describeError } from "./errors";

// Host abstractions
export type {
  ConnectOptions,
  CreateUserOptions,
  HostConnector,
  HostSession,
  HostSystem,
  PathInfo,
  PathType,
  WriteFileOptions,
} from "./host";

// Parameters and inventory
export { mergeVars, parseParameters, scopeValues, validateParameters } from "./parameters";
export {
  CONTROL_HOST,
  allTargets,
  becomeOptions,
  discoverFacts,
  emptyInventory,
  parseInventory,
  resolveTargets,
} from "./inventory";

// Steps and workflows
export { ensureLine, escapeRegExp } from "./line-in-file";
export type { EnsureLineOptions, EnsureLineResult } from "./line-in-file";
export {
  EnsuredUser,
  ciUserSpec,
  ensureUser,
  ensureUserDirectories,
  grantPasswordlessSudo,
  installAuthorizedKey,
} from "./steps";
export type { AuthorizedKeySource, CiUserSpec, StepContext } from "./steps";
export type { DependencyInstaller } from "./dependencies";
export { PackageDependencyInstaller } from "./dependencies";
export type { StepRunner, Workflow, WorkflowContext } from "./workflows";
export { createDependenciesWorkflow, userWorkflow } from "./workflows";

// Executor
export type { ExecutorOptions, HostReport, RunReport } from "./executor";
export { runWorkflow } from "./executor";

// Schemas
export {
  BaseParamsSchema,
  CI_USER_NAME_RE,
  DependenciesConfigSchema,
  DependenciesParamsSchema,
  HostEntrySchema,
  HostGroupSchema,
  InventorySchema,
  UserParamsSchema,
} from "./schemas";
