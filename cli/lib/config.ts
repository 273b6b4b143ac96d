/**
 * Deploy configuration: validates raw command-line options into a DeployConfig
 * and resolves the files it references.
 */

import * as fs from "fs";
import * as path from "path";
import { z } from "zod";
import { InvalidArgumentError } from "commander";
import { DEFAULT_CONNECT_TIMEOUT } from "./constants";
import { ConfigurationError, UsageError } from "./errors";

/** Characters RouterOS accepts unquoted in a file name on the /import command line */
const SCRIPT_NAME_PATTERN = /^[A-Za-z0-9_.+-]+$/;

const TIMEOUT_MESSAGE = "Timeout must be a positive integer (seconds)";

/** Connect timeout in whole seconds; accepts the raw flag string or a number */
export const TimeoutSchema = z
  .union([z.number(), z.string()])
  .transform((value) => String(value).trim())
  .refine((value) => /^[0-9]+$/.test(value) && parseInt(value, 10) > 0, TIMEOUT_MESSAGE)
  .transform((value) => parseInt(value, 10));

/** Schema for the options accepted by the deploy tool */
export const DeployOptionsSchema = z
  .object({
    /** Single target, processed before the hosts file */
    host: z.string().trim().min(1, "--host must not be empty").optional(),
    /** Path to a hosts list file */
    hosts: z.string().trim().min(1, "--hosts must not be empty").optional(),
    /** Path to the RouterOS script to deploy */
    script: z
      .string({ required_error: "Missing required option --script" })
      .trim()
      .min(1, "Missing required option --script"),
    timeout: TimeoutSchema.default(DEFAULT_CONNECT_TIMEOUT),
    /** Private key passed to scp/ssh with -i */
    identity: z.string().trim().min(1, "--identity must not be empty").optional(),
    color: z.boolean().default(true),
  })
  .refine((opts) => opts.host !== undefined || opts.hosts !== undefined, {
    message: "Missing required option: --host or --hosts",
  });

export type ValidatedDeployOptions = z.output<typeof DeployOptionsSchema>;

/** Validated options with every referenced file resolved to an absolute path */
export interface DeployConfig {
  host?: string;
  hostsFile?: string;
  scriptPath: string;
  timeout: number;
  identity?: string;
  color: boolean;
}

/**
 * Commander argument parser for --timeout.
 */
export function parseTimeoutFlag(value: string): number {
  const result = TimeoutSchema.safeParse(value);
  if (!result.success) {
    throw new InvalidArgumentError(TIMEOUT_MESSAGE);
  }
  return result.data;
}

/**
 * Validate raw options. Throws UsageError listing every problem found.
 */
export function parseDeployOptions(raw: unknown): ValidatedDeployOptions {
  const result = DeployOptionsSchema.safeParse(raw);
  if (!result.success) {
    throw new UsageError(result.error.issues.map((issue) => issue.message).join("\n"));
  }
  return result.data;
}

function requireFile(filePath: string, notFound: string): string {
  const resolved = path.resolve(filePath);
  if (!fs.existsSync(resolved) || !fs.statSync(resolved).isFile()) {
    throw new ConfigurationError(notFound);
  }
  return resolved;
}

/**
 * Validate options and check that the script and identity files exist.
 * The hosts file is checked when it is read.
 */
export function resolveDeployConfig(raw: unknown): DeployConfig {
  const opts = parseDeployOptions(raw);

  const scriptPath = requireFile(
    opts.script,
    `RouterOS script file '${opts.script}' not found\nPlease specify a valid RouterOS script file to execute`
  );

  const scriptName = path.basename(scriptPath);
  if (!SCRIPT_NAME_PATTERN.test(scriptName) || scriptName.startsWith("-")) {
    throw new ConfigurationError(
      `RouterOS script file name '${scriptName}' may only contain letters, digits, ".", "_", "+" and "-", and must not start with "-"`
    );
  }

  const identity = opts.identity
    ? requireFile(opts.identity, `Identity file '${opts.identity}' not found`)
    : undefined;

  return {
    host: opts.host,
    hostsFile: opts.hosts,
    scriptPath,
    timeout: opts.timeout,
    identity,
    color: opts.color,
  };
}
