/**
 * Constants, workflow presets, and defaults
 */

/** Inventory file looked up from the working directory upwards */
export const MANIFEST_FILE = "hostprep.yaml";

/** Prefix for parameters supplied through the process environment */
export const ENV_PREFIX = "HOSTPREP_";

/** Ways of reaching a target host */
export const CONNECTION_METHODS = ["ssh", "local", "docker"] as const;

/** Ways of elevating to the administrative user once connected */
export const BECOME_METHODS = ["sudo", "su"] as const;

/** Package managers the dependency installer knows, in detection order */
export const PACKAGE_MANAGERS = ["dnf", "yum", "apt-get"] as const;

/** Available workflows */
export const WORKFLOWS = [
  { value: "dependencies", label: "Dependencies", hint: "Install the OS packages a CI host needs" },
  { value: "user", label: "CI user", hint: "Create the CI user with sudo and an authorized SSH key" },
] as const;

/** Parameters every workflow requires */
export const BASE_REQUIRED_PARAMETERS = ["hosts", "connection"] as const;

/** Parameters the user workflow requires */
export const USER_REQUIRED_PARAMETERS = [...BASE_REQUIRED_PARAMETERS, "ci_user_name"] as const;

/** GECOS comment of the CI account */
export const CI_USER_COMMENT = "OpenShift CI User";

/** Parent of every CI user's home directory */
export const HOME_ROOT = "/home";

export const SUDOERS_PATH = "/etc/sudoers";

/** `%s` is replaced with the candidate file before it is installed */
export const SUDOERS_VALIDATE_COMMAND = "visudo -cf %s";

/** Instance metadata endpoint serving the launch key pair's public key */
export const METADATA_KEY_URL = "http://169.254.169.254/latest/meta-data/public-keys/0/openssh-key";

export const METADATA_TIMEOUT_SECONDS = 10;

/** SSH connect timeout, in seconds */
export const SSH_CONNECT_TIMEOUT = 10;

/** Human-readable step names, as printed in logs and reports */
export const STEP_NAMES = {
  ensureUser: "ensure CI user",
  grantSudo: "grant passwordless sudo",
  ensureDirectories: "ensure home directories",
  authorizeKey: "authorize SSH key",
  installDependencies: "install dependencies",
} as const;

/** The sudoers entry granting `user` unrestricted passwordless commands */
export function sudoersLine(user: string): string {
  return `${user}  ALL=(ALL)  NOPASSWD: ALL`;
}

export function userHome(user: string): string {
  return `${HOME_ROOT}/${user}`;
}
