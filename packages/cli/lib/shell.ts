/**
 * POSIX shell quoting and privilege escalation wrappers.
 */

import type { BecomeOptions } from "@hostprep/core";

const SAFE_RE = /^[A-Za-z0-9_\-.,:/@%+=]+$/;

/** Quote a value for a POSIX shell; safe words pass through unchanged */
export function shellQuote(value: string): string {
  if (value !== "" && SAFE_RE.test(value)) return value;
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

/** Quote and join a command's words */
export function shellJoin(words: readonly string[]): string {
  return words.map(shellQuote).join(" ");
}

/**
 * Wrap `script` so it runs as the become user. sudo runs non-interactively
 * (`-n`) so a password prompt fails instead of hanging.
 */
export function becomeCommand(script: string, become: BecomeOptions): string {
  if (!become.enabled) return script;
  switch (become.method) {
    case "sudo":
      return `sudo -n -H -u ${shellQuote(become.user)} -- sh -c ${shellQuote(script)}`;
    case "su":
      return `su - ${shellQuote(become.user)} -c ${shellQuote(script)}`;
  }
}
