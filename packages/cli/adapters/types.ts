/**
 * Runtime Adapter Interfaces
 *
 * These interfaces define the contract between the tool logic and the
 * runtime environment it runs in.
 *
 * - CLIAdapter: terminal output with @clack/prompts, child_process execution
 * - TestAdapter: captured output and scripted command results for tests
 */

// ============================================================================
// Execution Types
// ============================================================================

/** Result of a captured command execution */
export interface ExecResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

/** Options for captured command execution */
export interface CaptureOptions {
  cwd?: string;
  /** Written to the child's stdin, which is then closed */
  input?: string;
  /** Kill the child after this many milliseconds */
  timeoutMs?: number;
}

// ============================================================================
// UI Adapter
// ============================================================================

/** Logging interface */
export interface LogAdapter {
  info(message: string): void;
  step(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/** User interface adapter for output */
export interface UIAdapter {
  /** Show introductory banner/message */
  intro(message: string): void;

  /** Show a note/info box */
  note(content: string, title?: string): void;

  /** Show outro/closing message */
  outro(message: string): void;

  /** Logging methods */
  log: LogAdapter;
}

// ============================================================================
// Execution Adapter
// ============================================================================

/** Command execution adapter */
export interface ExecAdapter {
  /**
   * Run a command without a shell and capture its output. Output is returned
   * untrimmed. Resolves with the exit code; rejects only when the command
   * cannot be started.
   */
  capture(command: string, args?: string[], options?: CaptureOptions): Promise<ExecResult>;

  /** Check if a command exists on the system */
  commandExists(command: string): boolean;
}

// ============================================================================
// Runtime Adapter
// ============================================================================

/** Combined runtime adapter providing all platform abstractions */
export interface RuntimeAdapter {
  /** User interface adapter */
  ui: UIAdapter;

  /** Command execution adapter */
  exec: ExecAdapter;

  /** Platform identifier for conditional logic */
  platform: "cli" | "test";
}

// ============================================================================
// Tool Implementation
// ============================================================================

/**
 * A tool implementation is a function that performs a command action
 * using the provided runtime adapter, so the same logic runs in the
 * terminal and under test.
 *
 * @example
 * const listTool: ToolImplementation<{ hosts: string }, HostTarget[]> = async (runtime, options) => {
 *   const targets = resolveTargets(inventory, options.hosts);
 *   runtime.ui.log.info(`${targets.length} host(s)`);
 *   return targets;
 * };
 */
export type ToolImplementation<TOptions = Record<string, unknown>, TResult = void> = (
  runtime: RuntimeAdapter,
  options: TOptions
) => Promise<TResult>;
