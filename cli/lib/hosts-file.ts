/**
 * Hosts file ingestion: one `[user@]hostname[:port]` per line, "#" starts a comment.
 */

import * as fs from "fs";
import { HOST_SPEC_FORMAT } from "./constants";
import { ConfigurationError } from "./errors";

/**
 * Extract host tokens from hosts file content.
 * Order is preserved and duplicates are kept.
 */
export function parseHostsList(content: string): string[] {
  const hosts: string[] = [];
  for (const line of content.split(/\r?\n/)) {
    const hash = line.indexOf("#");
    const token = (hash === -1 ? line : line.slice(0, hash)).trim();
    if (token) hosts.push(token);
  }
  return hosts;
}

/**
 * Read and parse a hosts file.
 * Throws ConfigurationError if the file is missing or lists no hosts.
 */
export function loadHostsFile(filePath: string): string[] {
  if (!fs.existsSync(filePath) || !fs.statSync(filePath).isFile()) {
    throw new ConfigurationError(
      `Hosts file '${filePath}' not found\n` +
      `Please create a file with a list of routers, one per line, in format: ${HOST_SPEC_FORMAT}`
    );
  }

  const hosts = parseHostsList(fs.readFileSync(filePath, "utf-8"));
  if (hosts.length === 0) {
    throw new ConfigurationError(`No valid hosts found in ${filePath}`);
  }
  return hosts;
}
