/**
 * Commander program definition for ros-deploy
 *
 * `-h` selects a single host, so help is only available as `--help`.
 */

import { Command } from "commander";
import { deployCommand } from "./commands/deploy";
import { DEFAULT_CONNECT_TIMEOUT, HOST_SPEC_FORMAT } from "./lib/constants";
import { parseTimeoutFlag } from "./lib/config";

interface CliOptions {
  host?: string;
  hosts?: string;
  script?: string;
  timeout: number;
  identity?: string;
  color: boolean;
}

export function createProgram(version: string): Command {
  const program = new Command();

  program
    .name("ros-deploy")
    .description("Deploy RouterOS scripts to multiple devices")
    .version(version)
    .helpOption("--help", "Show this help message and exit")
    .option("-h, --host <spec>", `Single device to deploy to (format: ${HOST_SPEC_FORMAT})`)
    .option("-H, --hosts <file>", `File containing list of RouterOS devices (one per line, format: ${HOST_SPEC_FORMAT})`)
    .option("-s, --script <file>", "RouterOS script file to execute")
    .option("-t, --timeout <seconds>", "Connection timeout in seconds", parseTimeoutFlag, DEFAULT_CONNECT_TIMEOUT)
    .option("-i, --identity <file>", "Private key file passed to scp/ssh")
    .option("--no-color", "Disable coloured output")
    .showHelpAfterError()
    .addHelpText("after", "\nExample:\n  ros-deploy --hosts routers.txt --script config.rsc --timeout 3")
    .action(async (opts: CliOptions) => {
      await deployCommand(opts, (message) => program.error(`error: ${message}`));
    });

  return program;
}
