/**
 * Error types raised by the deploy tool.
 *
 * UsageError and ConfigurationError abort the run before any host is contacted.
 * DeploymentFailedError is raised after the summary when at least one host failed.
 */

import type { Summary } from "../types";

/** Base class for every error the deploy tool raises on purpose */
export class DeployError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DeployError";
  }
}

/** Bad or missing command-line arguments */
export class UsageError extends DeployError {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

/** A referenced file is missing, the host list is empty, or a host token is malformed */
export class ConfigurationError extends DeployError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/** One or more targets failed to upload or execute the script */
export class DeploymentFailedError extends DeployError {
  readonly summary: Summary;

  constructor(summary: Summary) {
    super(`${summary.failed.length} of ${summary.total} deployment(s) failed`);
    this.name = "DeploymentFailedError";
    this.summary = summary;
  }
}
