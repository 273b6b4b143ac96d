/**
 * Host specifier parsing: `[user@]hostname[:port]`
 */

import type { HostSpec } from "../types";
import { DEFAULT_PORT, DEFAULT_USER, HOST_SPEC_FORMAT } from "./constants";
import { ConfigurationError } from "./errors";

const PORT_PATTERN = /^[0-9]+$/;
const MAX_PORT = 65535;

/**
 * Parse a host token. The user is split on the first "@", the port on the last ":".
 * Throws ConfigurationError for an empty user or host, a user or host starting
 * with "-" (scp/ssh would read it as an option), or a port outside 1-65535.
 */
export function parseHostSpec(token: string): HostSpec {
  let user = DEFAULT_USER;
  let rest = token;

  const at = token.indexOf("@");
  if (at !== -1) {
    user = token.slice(0, at);
    rest = token.slice(at + 1);
    if (!user) {
      throw new ConfigurationError(`Invalid host "${token}": empty user before "@" (expected ${HOST_SPEC_FORMAT})`);
    }
  }

  let host = rest;
  let port = DEFAULT_PORT;

  const colon = rest.lastIndexOf(":");
  if (colon !== -1) {
    host = rest.slice(0, colon);
    const rawPort = rest.slice(colon + 1);
    if (!PORT_PATTERN.test(rawPort)) {
      throw new ConfigurationError(`Invalid host "${token}": port "${rawPort}" is not a number`);
    }
    port = parseInt(rawPort, 10);
    if (port < 1 || port > MAX_PORT) {
      throw new ConfigurationError(`Invalid host "${token}": port ${port} is out of range (1-${MAX_PORT})`);
    }
  }

  if (!host) {
    throw new ConfigurationError(`Invalid host "${token}": missing hostname (expected ${HOST_SPEC_FORMAT})`);
  }
  if (user.startsWith("-") || host.startsWith("-")) {
    throw new ConfigurationError(`Invalid host "${token}": user and hostname must not start with "-"`);
  }

  return { token, user, host, port };
}

/** Render the scp/ssh destination, e.g. "admin@10.0.0.1" */
export function formatTarget(spec: HostSpec): string {
  return `${spec.user}@${spec.host}`;
}
