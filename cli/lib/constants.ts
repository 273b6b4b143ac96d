/**
 * Defaults shared across the deploy tool
 */

/** RouterOS ships with an "admin" account */
export const DEFAULT_USER = "admin";

/** RouterOS serves scp and ssh on the same port */
export const DEFAULT_PORT = 22;

/** Connect timeout in seconds */
export const DEFAULT_CONNECT_TIMEOUT = 5;

export const HOST_SPEC_FORMAT = "[user@]hostname[:port]";

/** Options passed to both scp and ssh; BatchMode fails instead of prompting */
export const SSH_OPTS = [
  "-o", "BatchMode=yes",
  "-o", "StrictHostKeyChecking=accept-new",
];

/** Clients that must be on PATH before any host is contacted */
export const REQUIRED_CLIENTS = ["scp", "ssh"];
