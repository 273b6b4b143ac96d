/**
 * ros-deploy — Push a RouterOS script to devices and run it
 *
 * This command wraps the platform-agnostic deployTool with the CLI adapter.
 * Usage errors are handed back to commander so the help text is shown.
 */

import { deployTool, createCLIAdapter, type DeployOptions } from "../tools";
import { UsageError } from "../lib/errors";
import { exitWithError } from "../lib/ui";

export async function deployCommand(
  opts: DeployOptions,
  onUsageError: (message: string) => never,
): Promise<void> {
  try {
    await deployTool(createCLIAdapter(), opts);
  } catch (err) {
    if (err instanceof UsageError) {
      onUsageError(err.message);
    }
    exitWithError(err instanceof Error ? err.message : String(err));
  }
}
