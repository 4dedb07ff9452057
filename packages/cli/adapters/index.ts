/**
 * Runtime Adapters Module
 *
 * Provides platform-agnostic abstractions for UI and execution,
 * enabling the same tool logic to run in the terminal and under test.
 *
 * @example
 * import { createCLIAdapter, type ToolImplementation } from './adapters';
 *
 * const helloTool: ToolImplementation<{ name: string }> = async (runtime, options) => {
 *   runtime.ui.intro("hostprep");
 *   runtime.ui.log.success(`Hello, ${options.name}!`);
 * };
 *
 * await helloTool(createCLIAdapter(), { name: "World" });
 */

// Export types
export type {
  RuntimeAdapter,
  UIAdapter,
  ExecAdapter,
  LogAdapter,
  ExecResult,
  CaptureOptions,
  ToolImplementation,
} from "./types";

// Export CLI adapter
export { createCLIAdapter } from "./cli-adapter";
