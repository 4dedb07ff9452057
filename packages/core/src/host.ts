/**
 * Host abstractions: the primitives steps use to inspect and mutate a
 * target host, and the connector that opens a session to one.
 */

import type { BecomeOptions, ConnectionMethod, HostTarget, PackageManager } from "./types";

export type PathType = "file" | "directory" | "other";

export interface PathInfo {
  type: PathType;
  owner: string;
  /** Permission bits, e.g. 0o644 */
  mode: number;
}

export interface CreateUserOptions {
  comment: string;
  home: string;
}

export interface WriteFileOptions {
  owner: string;
  mode: number;
  /**
   * Command run against the candidate file before it replaces `path`.
   * `%s` is substituted with the candidate's path.
   */
  validate?: string;
}

/** Operations available on a connected host, run with escalated privileges */
export interface HostSystem {
  readonly name: string;

  userExists(name: string): Promise<boolean>;

  /** Create an account and its home directory */
  createUser(name: string, options: CreateUserOptions): Promise<void>;

  /** Returns null when nothing exists at `path` */
  stat(path: string): Promise<PathInfo | null>;

  readFile(path: string): Promise<string>;

  /** Replace `path` atomically with `content` */
  writeFile(path: string, content: string, options: WriteFileOptions): Promise<void>;

  /** Create a directory and any missing parents */
  makeDirectory(path: string): Promise<void>;

  setOwner(path: string, owner: string): Promise<void>;

  /** GET `url` from the host itself and return the body */
  fetchUrl(url: string, timeoutSeconds: number): Promise<string>;

  detectPackageManager(): Promise<PackageManager | null>;

  isPackageInstalled(manager: PackageManager, name: string): Promise<boolean>;

  installPackages(manager: PackageManager, names: readonly string[]): Promise<void>;
}

/** An open connection to one host */
export interface HostSession extends HostSystem {
  /** Throws when the host refuses elevation to the become user */
  verifyPrivileges(): Promise<void>;

  close(): Promise<void>;
}

export interface ConnectOptions {
  method: ConnectionMethod;
  become: BecomeOptions;
}

/** Opens sessions; throws when the host cannot be reached */
export interface HostConnector {
  connect(target: HostTarget, options: ConnectOptions): Promise<HostSession>;
}
