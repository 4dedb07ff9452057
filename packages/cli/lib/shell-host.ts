/**
 * Host sessions backed by shell commands.
 *
 * Each host operation is a short POSIX sh script run through the session's
 * transport, wrapped for privilege escalation when `become` is enabled.
 */

import * as path from "path";
import {
  PACKAGE_MANAGERS,
  type BecomeOptions,
  type ConnectOptions,
  type CreateUserOptions,
  type HostConnector,
  type HostSession,
  type HostTarget,
  type PackageManager,
  type PathInfo,
  type PathType,
  type WriteFileOptions,
} from "@hostprep/core";
import type { ExecAdapter, ExecResult } from "../adapters";
import { becomeCommand, shellJoin, shellQuote } from "./shell";
import { createTransport, type Transport } from "./transport";

/** getent exits with 2 when the key is not found */
const GETENT_NOT_FOUND = 2;

/** Printed by the stat script when nothing exists at the path */
const ABSENT = "absent";

/** Error message for a failed command, preferring its own diagnostics */
export function commandError(result: ExecResult, what: string): Error {
  const detail = result.stderr.trim() || result.stdout.trim() || `exit code ${result.exitCode}`;
  return new Error(`${what}: ${detail}`);
}

/** Map `stat -c %F` output to a path type */
export function pathType(description: string): PathType {
  if (description === "directory") return "directory";
  if (description === "regular file" || description === "regular empty file") return "file";
  return "other";
}

/** Parse `%F|%U|%a` output of stat */
export function parseStat(output: string): PathInfo {
  const [type, owner, mode] = output.trim().split("|");
  const bits = Number.parseInt(mode, 8);
  if (!owner || Number.isNaN(bits)) {
    throw new Error(`Unexpected stat output: ${output.trim()}`);
  }
  return { type: pathType(type), owner, mode: bits };
}

function isPackageManager(value: string): value is PackageManager {
  return PACKAGE_MANAGERS.some((manager) => manager === value);
}

export class ShellHostSession implements HostSession {
  constructor(
    readonly name: string,
    private readonly exec: ExecAdapter,
    private readonly transport: Transport,
    private readonly become: BecomeOptions,
  ) {}

  /** Run a script on the host, escalated when become is enabled */
  private run(script: string, input?: string): Promise<ExecResult> {
    const [program, ...args] = this.transport.argv(becomeCommand(script, this.become));
    return this.exec.capture(program, args, { input });
  }

  /** Run a script and return stdout; non-zero exit throws */
  private async check(script: string, what: string, input?: string): Promise<string> {
    const result = await this.run(script, input);
    if (result.exitCode !== 0) throw commandError(result, what);
    return result.stdout;
  }

  async userExists(name: string): Promise<boolean> {
    const result = await this.run(shellJoin(["getent", "passwd", name]));
    if (result.exitCode === 0) return true;
    if (result.exitCode === GETENT_NOT_FOUND) return false;
    throw commandError(result, `getent passwd ${name}`);
  }

  async createUser(name: string, options: CreateUserOptions): Promise<void> {
    await this.check(
      shellJoin(["useradd", "--create-home", "--home-dir", options.home, "--comment", options.comment, name]),
      `useradd ${name}`,
    );
  }

  async stat(filePath: string): Promise<PathInfo | null> {
    const quoted = shellQuote(filePath);
    const output = await this.check(
      `if [ -e ${quoted} ] || [ -L ${quoted} ]; then stat -c '%F|%U|%a' -- ${quoted}; else echo ${ABSENT}; fi`,
      `stat ${filePath}`,
    );
    return output.trim() === ABSENT ? null : parseStat(output);
  }

  readFile(filePath: string): Promise<string> {
    return this.check(shellJoin(["cat", "--", filePath]), `cat ${filePath}`);
  }

  /**
   * Stage the content in a temp file beside `filePath`, set owner and mode,
   * validate it, then rename over the target.
   */
  async writeFile(filePath: string, content: string, options: WriteFileOptions): Promise<void> {
    const template = path.posix.join(path.posix.dirname(filePath), ".hostprep.XXXXXX");
    const lines = [
      "set -e",
      `tmp=$(mktemp ${shellQuote(template)})`,
      `trap 'rm -f "$tmp"' EXIT`,
      `cat > "$tmp"`,
      `chown ${shellQuote(options.owner)} "$tmp"`,
      `chmod ${options.mode.toString(8)} "$tmp"`,
    ];
    if (options.validate) {
      lines.push(options.validate.split("%s").join(`"$tmp"`));
    }
    lines.push(`mv -f "$tmp" ${shellQuote(filePath)}`, "trap - EXIT");
    await this.check(lines.join("\n"), `write ${filePath}`, content);
  }

  async makeDirectory(dirPath: string): Promise<void> {
    await this.check(shellJoin(["mkdir", "-p", "--", dirPath]), `mkdir ${dirPath}`);
  }

  async setOwner(filePath: string, owner: string): Promise<void> {
    await this.check(shellJoin(["chown", owner, "--", filePath]), `chown ${filePath}`);
  }

  fetchUrl(url: string, timeoutSeconds: number): Promise<string> {
    const timeout = String(timeoutSeconds);
    return this.check(
      [
        "if command -v curl >/dev/null 2>&1; then",
        `  ${shellJoin(["curl", "-fsS", "--max-time", timeout, url])}`,
        "else",
        `  ${shellJoin(["wget", "-q", "-T", timeout, "-O", "-", url])}`,
        "fi",
      ].join("\n"),
      `fetch ${url}`,
    );
  }

  async detectPackageManager(): Promise<PackageManager | null> {
    const output = await this.check(
      `for m in ${PACKAGE_MANAGERS.join(" ")}; do if command -v "$m" >/dev/null 2>&1; then echo "$m"; exit 0; fi; done`,
      "detect package manager",
    );
    const manager = output.trim();
    return isPackageManager(manager) ? manager : null;
  }

  async isPackageInstalled(manager: PackageManager, name: string): Promise<boolean> {
    if (manager === "apt-get") {
      const result = await this.run(shellJoin(["dpkg-query", "-W", "-f", "${Status}", name]));
      return result.exitCode === 0 && result.stdout.includes("install ok installed");
    }
    const result = await this.run(shellJoin(["rpm", "-q", name]));
    return result.exitCode === 0;
  }

  async installPackages(manager: PackageManager, names: readonly string[]): Promise<void> {
    const command = shellJoin([manager, "install", "-y", ...names]);
    await this.check(
      manager === "apt-get" ? `DEBIAN_FRONTEND=noninteractive ${command}` : command,
      `${manager} install`,
    );
  }

  async verifyPrivileges(): Promise<void> {
    await this.check("true", `become ${this.become.user}`);
  }

  async close(): Promise<void> {
    const argv = this.transport.closeArgv();
    if (!argv) return;
    const [program, ...args] = argv;
    // Exit status only says whether a master connection was still running
    await this.exec.capture(program, args);
  }
}

/** Connects to hosts through ssh, docker or a local shell */
export class ShellHostConnector implements HostConnector {
  constructor(private readonly exec: ExecAdapter) {}

  async connect(target: HostTarget, options: ConnectOptions): Promise<HostSession> {
    const transport = createTransport(options.method, target);
    if (!this.exec.commandExists(transport.program)) {
      throw new Error(`${transport.program} not found on PATH`);
    }

    const [program, ...args] = transport.argv("true");
    const probe = await this.exec.capture(program, args);
    if (probe.exitCode !== 0) {
      throw commandError(probe, `${options.method} ${target.address}`);
    }

    return new ShellHostSession(target.name, this.exec, transport, options.become);
  }
}
