/**
 * Transports: how a shell command reaches a target host.
 *
 * Every transport turns a command line into the argv of a local process
 * that runs it on the target through `sh`.
 */

import * as os from "os";
import * as path from "path";
import { SSH_CONNECT_TIMEOUT, type ConnectionMethod, type HostTarget } from "@hostprep/core";

export interface Transport {
  /** Local program that carries the command (ssh, docker, sh) */
  readonly program: string;
  /** argv (program first) that runs `command` on the target */
  argv(command: string): string[];
  /** argv that tears down shared state, or null when there is none */
  closeArgv(): string[] | null;
}

/** SSH options for non-interactive connections */
const SSH_OPTS = [
  "-o", "BatchMode=yes",
  "-o", "StrictHostKeyChecking=accept-new",
  "-o", `ConnectTimeout=${SSH_CONNECT_TIMEOUT}`,
  "-o", "ControlMaster=auto",
  "-o", "ControlPersist=60",
];

/** Socket template for multiplexed master connections; ssh expands %C per host */
export function controlPath(runId: string = String(process.pid)): string {
  return path.join(os.tmpdir(), `hostprep-${runId}-%C`);
}

export class SshTransport implements Transport {
  readonly program = "ssh";

  constructor(
    private readonly target: HostTarget,
    private readonly socket: string = controlPath(),
  ) {}

  private destination(): string[] {
    const args = ["-o", `ControlPath=${this.socket}`];
    if (this.target.port !== undefined) args.push("-p", String(this.target.port));
    if (this.target.identityFile) args.push("-i", this.target.identityFile);
    if (this.target.user) args.push("-l", this.target.user);
    args.push(this.target.address);
    return args;
  }

  argv(command: string): string[] {
    return ["ssh", ...SSH_OPTS, ...this.destination(), command];
  }

  closeArgv(): string[] {
    return ["ssh", "-O", "exit", ...this.destination()];
  }
}

export class LocalTransport implements Transport {
  readonly program = "sh";

  argv(command: string): string[] {
    return ["sh", "-c", command];
  }

  closeArgv(): null {
    return null;
  }
}

export class DockerTransport implements Transport {
  readonly program = "docker";

  constructor(private readonly container: string) {}

  argv(command: string): string[] {
    return ["docker", "exec", "-i", this.container, "sh", "-c", command];
  }

  closeArgv(): null {
    return null;
  }
}

export function createTransport(method: ConnectionMethod, target: HostTarget): Transport {
  switch (method) {
    case "ssh":
      return new SshTransport(target);
    case "local":
      return new LocalTransport();
    case "docker":
      return new DockerTransport(target.container ?? target.address);
  }
}
