/**
 * Test Runtime Adapter
 *
 * Implements RuntimeAdapter for tests:
 * - ScriptedExecAdapter: records every command and answers from a handler
 * - TestUIAdapter: captures all output for assertions
 */

import type {
  RuntimeAdapter,
  UIAdapter,
  ExecAdapter,
  ExecResult,
  CaptureOptions,
  LogAdapter,
} from "../../adapters/types";

// ============================================================================
// Log entry tracking
// ============================================================================

export interface LogEntry {
  level: "info" | "step" | "success" | "warn" | "error";
  message: string;
}

export interface NoteEntry {
  content: string;
  title?: string;
}

// ============================================================================
// Scripted Exec Adapter: no real processes
// ============================================================================

export interface ExecCall {
  command: string;
  args: string[];
  input?: string;
}

export type ExecHandler = (call: ExecCall) => Partial<ExecResult> | undefined;

/** Successful, empty result unless the handler says otherwise */
export class ScriptedExecAdapter implements ExecAdapter {
  calls: ExecCall[] = [];
  missingCommands = new Set<string>();

  constructor(private handler: ExecHandler = () => undefined) {}

  respond(handler: ExecHandler): void {
    this.handler = handler;
  }

  async capture(command: string, args: string[] = [], options: CaptureOptions = {}): Promise<ExecResult> {
    const call: ExecCall = { command, args, input: options.input };
    this.calls.push(call);
    return { stdout: "", stderr: "", exitCode: 0, ...this.handler(call) };
  }

  commandExists(command: string): boolean {
    return !this.missingCommands.has(command);
  }

  /** The script each call ran: the last argv element */
  scripts(): string[] {
    return this.calls.map((call) => call.args[call.args.length - 1] ?? "");
  }
}

// ============================================================================
// Test UI Adapter: Captures output
// ============================================================================

export class TestUIAdapter implements UIAdapter {
  logs: LogEntry[] = [];
  notes: NoteEntry[] = [];
  intros: string[] = [];
  outros: string[] = [];

  intro(message: string): void {
    this.intros.push(message);
  }

  note(content: string, title?: string): void {
    this.notes.push({ content, title });
  }

  outro(message: string): void {
    this.outros.push(message);
  }

  log: LogAdapter = {
    info: (message: string) => {
      this.logs.push({ level: "info", message });
    },
    step: (message: string) => {
      this.logs.push({ level: "step", message });
    },
    success: (message: string) => {
      this.logs.push({ level: "success", message });
    },
    warn: (message: string) => {
      this.logs.push({ level: "warn", message });
    },
    error: (message: string) => {
      this.logs.push({ level: "error", message });
    },
  };

  // -------------------------------------------------------------------------
  // Assertion helpers
  // -------------------------------------------------------------------------

  messages(level: LogEntry["level"]): string[] {
    return this.logs.filter((entry) => entry.level === level).map((entry) => entry.message);
  }
}

// ============================================================================
// Factory
// ============================================================================

export interface TestAdapterResult {
  adapter: RuntimeAdapter;
  ui: TestUIAdapter;
  exec: ScriptedExecAdapter;
}

export function createTestAdapter(handler?: ExecHandler): TestAdapterResult {
  const ui = new TestUIAdapter();
  const exec = new ScriptedExecAdapter(handler);
  const adapter: RuntimeAdapter = {
    ui,
    exec,
    platform: "test",
  };
  return { adapter, ui, exec };
}
