/**
 * The idempotent steps of the CI user workflow.
 *
 * Each step inspects the host first and only mutates what is missing, so a
 * second run reports `changed: false`. In check mode nothing is mutated and
 * the result says whether a real run would change the host.
 *
 * Steps that touch the user's files take an `EnsuredUser`, which only
 * `ensureUser` can produce: ownership can never be assigned before the
 * account exists.
 */

import { CI_USER_COMMENT, STEP_NAMES, SUDOERS_PATH, SUDOERS_VALIDATE_COMMAND, sudoersLine, userHome } from "./constants";
import type { HostSystem } from "./host";
import { ensureLine, escapeRegExp } from "./line-in-file";
import type { StepResult } from "./types";

export interface StepContext {
  host: HostSystem;
  /** Report what would change without changing it */
  check: boolean;
}

export interface CiUserSpec {
  name: string;
  comment: string;
  home: string;
}

export function ciUserSpec(name: string): CiUserSpec {
  return { name, comment: CI_USER_COMMENT, home: userHome(name) };
}

/** A CI account that the ensure-user step has checked or created */
export class EnsuredUser {
  private constructor(
    readonly name: string,
    readonly home: string,
  ) {}

  get sshDir(): string {
    return `${this.home}/.ssh`;
  }

  get authorizedKeysPath(): string {
    return `${this.sshDir}/authorized_keys`;
  }

  static async ensure(ctx: StepContext, spec: CiUserSpec): Promise<StepResult & { user: EnsuredUser }> {
    const user = new EnsuredUser(spec.name, spec.home);
    const step = STEP_NAMES.ensureUser;

    if (await ctx.host.userExists(spec.name)) {
      return { step, changed: false, detail: `user ${spec.name} exists`, user };
    }
    if (!ctx.check) {
      await ctx.host.createUser(spec.name, { comment: spec.comment, home: spec.home });
    }
    return { step, changed: true, detail: `created user ${spec.name}`, user };
  }
}

export function ensureUser(ctx: StepContext, spec: CiUserSpec): Promise<StepResult & { user: EnsuredUser }> {
  return EnsuredUser.ensure(ctx, spec);
}

/**
 * Make sure the sudoers file has exactly one effective entry for the user.
 * The last line starting with the user name is replaced; otherwise the entry
 * is appended. The candidate file is checked with visudo before install.
 */
export async function grantPasswordlessSudo(
  ctx: StepContext,
  user: EnsuredUser,
  sudoersPath: string = SUDOERS_PATH,
): Promise<StepResult> {
  const step = STEP_NAMES.grantSudo;
  const info = await ctx.host.stat(sudoersPath);
  if (!info || info.type !== "file") {
    throw new Error(`${sudoersPath} does not exist or is not a regular file`);
  }

  const current = await ctx.host.readFile(sudoersPath);
  const { content, changed } = ensureLine(current, {
    pattern: new RegExp(`^${escapeRegExp(user.name)}`),
    line: sudoersLine(user.name),
  });
  if (!changed) {
    return { step, changed: false, detail: `${sudoersPath} already grants ${user.name}` };
  }
  if (!ctx.check) {
    await ctx.host.writeFile(sudoersPath, content, {
      owner: info.owner,
      mode: info.mode,
      validate: SUDOERS_VALIDATE_COMMAND,
    });
  }
  return { step, changed: true, detail: `granted ${user.name} in ${sudoersPath}` };
}

/** Home and ~/.ssh must be directories owned by the user */
export async function ensureUserDirectories(ctx: StepContext, user: EnsuredUser): Promise<StepResult> {
  const step = STEP_NAMES.ensureDirectories;
  const touched: string[] = [];

  for (const dir of [user.home, user.sshDir]) {
    const info = await ctx.host.stat(dir);
    if (info && info.type !== "directory") {
      throw new Error(`${dir} exists and is not a directory`);
    }
    if (!info) {
      if (!ctx.check) {
        await ctx.host.makeDirectory(dir);
        await ctx.host.setOwner(dir, user.name);
      }
      touched.push(dir);
    } else if (info.owner !== user.name) {
      if (!ctx.check) await ctx.host.setOwner(dir, user.name);
      touched.push(dir);
    }
  }

  return touched.length === 0
    ? { step, changed: false, detail: `${user.home} and ${user.sshDir} in place` }
    : { step, changed: true, detail: touched.join(", ") };
}

export interface AuthorizedKeySource {
  url: string;
  timeoutSeconds: number;
}

/**
 * Fetch the key from the metadata service on the host and write it verbatim.
 * The file always ends up owned by the user with at least u+rw; it is only
 * rewritten when content, owner or mode differ.
 */
export async function installAuthorizedKey(
  ctx: StepContext,
  user: EnsuredUser,
  source: AuthorizedKeySource,
): Promise<StepResult> {
  const step = STEP_NAMES.authorizeKey;
  const path = user.authorizedKeysPath;

  if (ctx.check) {
    return { step, changed: true, detail: `would fetch ${source.url} into ${path}` };
  }

  const key = await ctx.host.fetchUrl(source.url, source.timeoutSeconds);
  const info = await ctx.host.stat(path);
  if (info && info.type !== "file") {
    throw new Error(`${path} exists and is not a regular file`);
  }

  const mode = info ? info.mode | 0o600 : 0o600;
  if (info && info.owner === user.name && info.mode === mode && (await ctx.host.readFile(path)) === key) {
    return { step, changed: false, detail: `${path} is current` };
  }

  await ctx.host.writeFile(path, key, { owner: user.name, mode });
  return { step, changed: true, detail: `wrote ${path}` };
}
