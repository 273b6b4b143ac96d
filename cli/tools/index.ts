/**
 * Tool implementations
 *
 * Platform-agnostic tools that run against any RuntimeAdapter.
 */

export { deployTool, resolveTargets, type DeployOptions } from "./deploy";
export { createCLIAdapter } from "../adapters";
