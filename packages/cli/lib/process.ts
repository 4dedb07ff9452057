/**
 * Graceful shutdown and child process tracking.
 *
 * The CLI exec adapter registers every ssh/docker/sh child here. bin.ts
 * calls setupGracefulShutdown() at startup so that SIGINT / SIGTERM reach
 * any running children before the CLI exits.
 */

/** The subset of ChildProcess the tracker needs */
export interface TrackedChild {
  kill(signal?: NodeJS.Signals): boolean;
  once(event: "close" | "error", listener: () => void): unknown;
}

/** Conventional 128 + signal number exit codes */
export const SIGNAL_EXIT_CODES = {
  SIGINT: 130,
  SIGTERM: 143,
} as const;

export type ShutdownSignal = keyof typeof SIGNAL_EXIT_CODES;

const activeChildren = new Set<TrackedChild>();

/**
 * Register a child process for cleanup on exit.
 * Automatically unregisters when the child closes or errors.
 */
export function trackChild(child: TrackedChild): void {
  activeChildren.add(child);
  const remove = () => activeChildren.delete(child);
  child.once("close", remove);
  child.once("error", remove);
}

/** Number of children still running */
export function activeChildCount(): number {
  return activeChildren.size;
}

/**
 * Send `signal` to every tracked child.
 * @returns the exit code the CLI should terminate with
 */
export function forwardSignal(signal: ShutdownSignal): number {
  for (const child of activeChildren) {
    child.kill(signal);
  }
  return SIGNAL_EXIT_CODES[signal];
}

/**
 * Install SIGINT and SIGTERM handlers that forward the signal
 * to tracked child processes before exiting.
 */
export function setupGracefulShutdown(): void {
  process.on("SIGINT", () => process.exit(forwardSignal("SIGINT")));
  process.on("SIGTERM", () => process.exit(forwardSignal("SIGTERM")));
}
