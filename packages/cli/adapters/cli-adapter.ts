/**
 * CLI Runtime Adapter
 *
 * Implements RuntimeAdapter for terminal usage
 * using @clack/prompts for UI and child_process for execution.
 */

import * as p from "@clack/prompts";
import pc from "picocolors";
import { execSync, spawn } from "child_process";
import { trackChild } from "../lib/process";
import type {
  RuntimeAdapter,
  UIAdapter,
  ExecAdapter,
  ExecResult,
  CaptureOptions,
} from "./types";

// ============================================================================
// Execution Adapter Implementation
// ============================================================================

/** How long stderr may stay open after the command has exited */
const STDERR_GRACE_MS = 50;

class CLIExecAdapter implements ExecAdapter {
  /**
   * Resolves once the command has exited and its stdout has ended. A
   * background process it started (an ssh master connection) may keep
   * stderr open, so stderr is only waited on briefly after exit.
   */
  capture(command: string, args: string[] = [], options: CaptureOptions = {}): Promise<ExecResult> {
    return new Promise((resolve, reject) => {
      const child = spawn(command, args, { cwd: options.cwd, timeout: options.timeoutMs });
      trackChild(child);

      let stdout = "";
      let stderr = "";
      let exitCode: number | null = null;
      let stdoutEnded = false;
      let stderrEnded = false;
      let settled = false;
      let grace: NodeJS.Timeout | undefined;

      const done = (): void => {
        if (settled || exitCode === null) return;
        settled = true;
        clearTimeout(grace);
        child.stderr.destroy();
        resolve({ stdout, stderr, exitCode });
      };
      const finish = (): void => {
        if (exitCode === null || !stdoutEnded) return;
        if (stderrEnded) {
          done();
        } else if (!grace) {
          grace = setTimeout(done, STDERR_GRACE_MS);
        }
      };

      child.stdout.setEncoding("utf-8");
      child.stderr.setEncoding("utf-8");
      child.stdout.on("data", (chunk: string) => {
        stdout += chunk;
      });
      child.stderr.on("data", (chunk: string) => {
        stderr += chunk;
      });
      child.stdout.on("end", () => {
        stdoutEnded = true;
        finish();
      });
      child.stderr.on("end", () => {
        stderrEnded = true;
        finish();
      });

      child.on("error", (err) => {
        if (settled) return;
        settled = true;
        clearTimeout(grace);
        reject(err);
      });
      child.on("exit", (code) => {
        exitCode = code ?? 1;
        finish();
      });

      // The child may exit without reading its input
      child.stdin.on("error", (err: NodeJS.ErrnoException) => {
        if (err.code !== "EPIPE") reject(err);
      });
      child.stdin.end(options.input ?? "");
    });
  }

  commandExists(command: string): boolean {
    try {
      execSync(`command -v ${command}`, { stdio: "pipe" });
      return true;
    } catch {
      return false;
    }
  }
}

// ============================================================================
// UI Adapter Implementation
// ============================================================================

class CLIUIAdapter implements UIAdapter {
  intro(message: string): void {
    console.log();
    p.intro(pc.bgCyan(pc.black(` ${message} `)));
  }

  note(content: string, title?: string): void {
    p.note(content, title);
  }

  outro(message: string): void {
    p.outro(message);
  }

  log = {
    info(message: string): void {
      p.log.info(message);
    },
    step(message: string): void {
      p.log.step(message);
    },
    success(message: string): void {
      p.log.success(message);
    },
    warn(message: string): void {
      p.log.warn(message);
    },
    error(message: string): void {
      p.log.error(message);
    },
  };
}

// ============================================================================
// Runtime Adapter
// ============================================================================

/**
 * Create a CLI runtime adapter for terminal usage
 */
export function createCLIAdapter(): RuntimeAdapter {
  return {
    ui: new CLIUIAdapter(),
    exec: new CLIExecAdapter(),
    platform: "cli",
  };
}
