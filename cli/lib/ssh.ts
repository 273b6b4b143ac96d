/**
 * Per-host deployment over scp + ssh.
 *
 * The script is uploaded under its base name, then imported and removed in a
 * single ssh invocation. An upload failure skips execution entirely.
 */

import * as path from "path";
import type { ExecAdapter, LogAdapter } from "../adapters";
import type { DeploymentOutcome, HostSpec } from "../types";
import { SSH_OPTS } from "./constants";
import { formatTarget } from "./host-spec";

export interface HostDeployOptions {
  /** Absolute path of the local script */
  scriptPath: string;
  /** Connect timeout in seconds */
  timeout: number;
  /** Private key for -i */
  identity?: string;
}

/** Name of the uploaded file in the device's root directory */
export function remoteScriptName(scriptPath: string): string {
  return path.basename(scriptPath);
}

/**
 * RouterOS command line that runs the uploaded script quietly and deletes it.
 */
export function importCommand(remoteName: string): string {
  return `/import verbose=no ${remoteName}; /file/remove ${remoteName}`;
}

/**
 * Options shared by scp and ssh, minus the port flag (scp uses -P, ssh -p).
 */
function connectOptions(opts: HostDeployOptions): string[] {
  const args = [...SSH_OPTS, "-o", `ConnectTimeout=${opts.timeout}`];
  if (opts.identity) args.push("-i", opts.identity);
  return args;
}

/** Arguments for copying the script to the target */
export function scpArgs(target: HostSpec, opts: HostDeployOptions): string[] {
  return [
    ...connectOptions(opts),
    "-P", String(target.port),
    "--",
    opts.scriptPath,
    `${formatTarget(target)}:${remoteScriptName(opts.scriptPath)}`,
  ];
}

/** Arguments for running and removing the uploaded script */
export function sshArgs(target: HostSpec, opts: HostDeployOptions): string[] {
  return [
    ...connectOptions(opts),
    "-p", String(target.port),
    "--",
    formatTarget(target),
    importCommand(remoteScriptName(opts.scriptPath)),
  ];
}

/**
 * Upload, then execute-and-remove. Never retries.
 */
export async function deployToHost(
  exec: ExecAdapter,
  log: LogAdapter,
  target: HostSpec,
  opts: HostDeployOptions,
): Promise<DeploymentOutcome> {
  log.info("Uploading script to router...");
  const uploadCode = await exec.stream("scp", scpArgs(target, opts));
  if (uploadCode !== 0) {
    return "upload-failed";
  }

  log.info("Script uploaded successfully, executing...");
  const executeCode = await exec.stream("ssh", sshArgs(target, opts));
  return executeCode === 0 ? "success" : "execute-failed";
}

/**
 * Describe the keys held by the SSH agent. Informational only.
 */
export function describeAgentKeys(exec: ExecAdapter): string {
  const result = exec.capture("ssh-add", ["-l"]);
  if (result.exitCode === 0 && result.stdout) {
    return result.stdout;
  }
  return "No SSH key loaded in agent";
}
