/**
 * Prerequisite checking: the scp and ssh clients must be on PATH
 */

import type { ExecAdapter } from "../adapters";
import type { PrereqResult } from "../types";
import { REQUIRED_CLIENTS } from "./constants";
import { ConfigurationError } from "./errors";

const INSTALL_HINT =
  process.platform === "darwin"
    ? "OpenSSH ships with macOS; check your PATH"
    : "Install the OpenSSH client (e.g. `apt install openssh-client`)";

export function checkPrerequisites(exec: ExecAdapter): PrereqResult[] {
  return REQUIRED_CLIENTS.map((name) =>
    exec.commandExists(name)
      ? { name, ok: true, message: "found" }
      : { name, ok: false, message: "not found", hint: INSTALL_HINT }
  );
}

/**
 * Throw ConfigurationError naming every missing client.
 */
export function requirePrerequisites(exec: ExecAdapter): void {
  const missing = checkPrerequisites(exec).filter((r) => !r.ok);
  if (missing.length === 0) return;

  const names = missing.map((r) => r.name).join(", ");
  throw new ConfigurationError(`Required command(s) not found: ${names}\n${INSTALL_HINT}`);
}
