/**
 * Type definitions for ros-deploy
 */

/** A parsed `[user@]host[:port]` target */
export interface HostSpec {
  /** The token exactly as given on the command line or in the hosts file */
  token: string;
  /** SSH user (defaults to "admin") */
  user: string;
  /** Hostname or address */
  host: string;
  /** SSH port, shared by scp and ssh (defaults to 22) */
  port: number;
}

/** Outcome of deploying the script to a single target */
export type DeploymentOutcome = "success" | "upload-failed" | "execute-failed";

/** Per-target record kept by the orchestration loop */
export interface DeploymentResult {
  target: HostSpec;
  outcome: DeploymentOutcome;
}

/** Aggregate of all deployment results for one run */
export interface Summary {
  total: number;
  succeeded: number;
  /** Original host tokens of failed targets, in the order they were attempted */
  failed: string[];
}

/** Result of a prerequisite check */
export interface PrereqResult {
  name: string;
  ok: boolean;
  message: string;
  hint?: string;
}
