/**
 * Tools Module
 *
 * Platform-agnostic tool implementations using the RuntimeAdapter pattern.
 * Each tool is a ToolImplementation that can run with any adapter.
 *
 * @example
 * import { prepareTool, createCLIAdapter } from './tools';
 *
 * await prepareTool(createCLIAdapter(), { workflow: "user", hosts: "ci", ciUser: "ci-bot" });
 */

export { prepareTool, createPrepareTool, parseForks, type PrepareOptions } from "./prepare";
export { inventoryTool, type InventoryOptions } from "./inventory";

// Re-export adapter types and factory for convenience
export { type RuntimeAdapter, type ToolImplementation, createCLIAdapter } from "../adapters";
