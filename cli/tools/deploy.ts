/**
 * Deploy Tool — Push a RouterOS script to every target, run it, remove it
 *
 * Targets are processed one at a time: the --host target first, then the
 * hosts file in file order. A failure on one host is recorded and the batch
 * moves on; the run fails at the end if any host failed.
 *
 * Platform-agnostic implementation using RuntimeAdapter.
 */

import type { RuntimeAdapter, ToolImplementation } from "../adapters";
import type { DeploymentResult, HostSpec } from "../types";
import { resolveDeployConfig, type DeployConfig } from "../lib/config";
import { DeploymentFailedError } from "../lib/errors";
import { formatTarget, parseHostSpec } from "../lib/host-spec";
import { loadHostsFile } from "../lib/hosts-file";
import { requirePrerequisites } from "../lib/prerequisites";
import { deployToHost, describeAgentKeys } from "../lib/ssh";
import { formatSummary, isSuccessful, summarize } from "../lib/summary";
import { createColors, formatTimestamp } from "../lib/ui";

export interface DeployOptions {
  /** Single target, `[user@]hostname[:port]` */
  host?: string;
  /** Path to the hosts list file */
  hosts?: string;
  /** Path to the RouterOS script */
  script?: string;
  /** Connect timeout in seconds (default 5) */
  timeout?: number | string;
  /** Private key passed to scp/ssh */
  identity?: string;
  /** Coloured output (default true) */
  color?: boolean;
}

/**
 * Collect host tokens (single host first) and parse them all up front,
 * so a malformed token aborts the run before any host is contacted.
 */
export function resolveTargets(config: Pick<DeployConfig, "host" | "hostsFile">): HostSpec[] {
  const tokens: string[] = [];
  if (config.host) tokens.push(config.host);
  if (config.hostsFile) tokens.push(...loadHostsFile(config.hostsFile));
  return tokens.map(parseHostSpec);
}

/**
 * Deploy tool implementation
 */
export const deployTool: ToolImplementation<DeployOptions> = async (
  runtime: RuntimeAdapter,
  options: DeployOptions
) => {
  const { ui, exec } = runtime;

  const config = resolveDeployConfig(options);
  const targets = resolveTargets(config);
  requirePrerequisites(exec);

  const colors = createColors(config.color);

  ui.intro("RouterOS Deploy");
  ui.note(
    [
      `Hosts file:      ${config.hostsFile ?? "-"}`,
      `Single host:     ${config.host ?? "-"}`,
      `Script file:     ${config.scriptPath}`,
      `Connect timeout: ${config.timeout} seconds`,
      `SSH key:         ${config.identity ?? describeAgentKeys(exec)}`,
    ].join("\n"),
    "Starting RouterOS deployment"
  );
  ui.log.info(`Found ${targets.length} host(s) to process`);

  const results: DeploymentResult[] = [];

  for (const target of targets) {
    const destination = formatTarget(target);
    ui.log.step(
      `${colors.dim(`[${formatTimestamp(new Date())}]`)} Processing ${colors.bold(destination)} (port ${target.port})`
    );

    const outcome = await deployToHost(exec, ui.log, target, {
      scriptPath: config.scriptPath,
      timeout: config.timeout,
      identity: config.identity,
    });

    switch (outcome) {
      case "success":
        ui.log.success(`Successfully executed script on ${destination}`);
        break;
      case "upload-failed":
        ui.log.error(`Failed to upload script to ${destination}`);
        break;
      case "execute-failed":
        ui.log.error(`Failed to execute script on ${destination}`);
        break;
    }

    results.push({ target, outcome });
  }

  const summary = summarize(results);
  ui.note(formatSummary(summary, colors).join("\n"), "Deployment Summary");

  if (!isSuccessful(summary)) {
    throw new DeploymentFailedError(summary);
  }

  ui.outro(colors.green("All deployments completed successfully!"));
};
