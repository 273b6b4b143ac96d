/**
 * Runtime Adapters Module
 *
 * Provides platform-agnostic abstractions for UI and execution,
 * so the deploy tool runs the same in the terminal and under test.
 *
 * @example
 * import { createCLIAdapter } from './adapters';
 * import { deployTool } from './tools';
 *
 * await deployTool(createCLIAdapter(), { hosts: "routers.txt", script: "config.rsc" });
 */

export type {
  RuntimeAdapter,
  UIAdapter,
  ExecAdapter,
  LogAdapter,
  ExecResult,
  StreamOptions,
  ToolImplementation,
} from "./types";

export { createCLIAdapter } from "./cli-adapter";
