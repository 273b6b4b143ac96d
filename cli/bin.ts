#!/usr/bin/env node

/**
 * ros-deploy CLI — Entry point
 *
 * Uploads a RouterOS script to each listed device, imports it, and removes it.
 */

import * as fs from "fs";
import * as path from "path";
import { setupGracefulShutdown } from "./lib/process";
import { createProgram } from "./program";

// Forward SIGINT/SIGTERM to scp/ssh before exiting
setupGracefulShutdown();

// Read version from package.json so it stays in sync with npm publish
const pkgJson: { version: string } = JSON.parse(
  fs.readFileSync(path.join(__dirname, "..", "package.json"), "utf-8")
);

createProgram(pkgJson.version)
  .parseAsync()
  .catch((err: unknown) => {
    console.error(err instanceof Error ? err.message : String(err));
    process.exit(1);
  });
