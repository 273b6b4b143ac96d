/**
 * CLI Runtime Adapter
 *
 * Implements RuntimeAdapter for terminal usage
 * using @clack/prompts for UI and child_process for execution.
 */

import * as p from "@clack/prompts";
import pc from "picocolors";
import { spawn, spawnSync } from "child_process";
import { trackChild } from "../lib/process";
import type {
  RuntimeAdapter,
  UIAdapter,
  ExecAdapter,
  ExecResult,
  StreamOptions,
} from "./types";

// ============================================================================
// Execution Adapter Implementation
// ============================================================================

/**
 * Arguments are passed as an array without a shell, so remote command lines
 * containing spaces and ";" reach ssh as a single argument.
 */
class CLIExecAdapter implements ExecAdapter {
  capture(command: string, args: string[] = [], cwd?: string): ExecResult {
    const result = spawnSync(command, args, {
      cwd,
      encoding: "utf-8",
      stdio: ["ignore", "pipe", "pipe"],
    });
    if (result.error) {
      return { stdout: "", stderr: result.error.message, exitCode: 1 };
    }
    return {
      stdout: (result.stdout ?? "").trim(),
      stderr: (result.stderr ?? "").trim(),
      exitCode: result.status ?? 1,
    };
  }

  stream(command: string, args: string[] = [], options?: StreamOptions): Promise<number> {
    return new Promise((resolve) => {
      const child = spawn(command, args, {
        cwd: options?.cwd,
        stdio: "inherit",
        shell: false,
      });
      trackChild(child);
      child.on("close", (code) => resolve(code ?? 1));
      child.on("error", (err) => {
        p.log.warn(`[exec] ${command}: ${err.message}`);
        resolve(1);
      });
    });
  }

  commandExists(command: string): boolean {
    const bin = process.platform === "win32" ? "where" : "which";
    const result = spawnSync(bin, [command], { shell: false, stdio: "ignore" });
    return result.status === 0;
  }
}

// ============================================================================
// UI Adapter Implementation
// ============================================================================

class CLIUIAdapter implements UIAdapter {
  intro(message: string): void {
    console.log();
    p.intro(pc.bgCyan(pc.black(` ${message} `)));
  }

  note(content: string, title?: string): void {
    p.note(content, title);
  }

  outro(message: string): void {
    p.outro(message);
  }

  log = {
    info(message: string): void {
      p.log.info(message);
    },
    step(message: string): void {
      p.log.step(message);
    },
    success(message: string): void {
      p.log.success(message);
    },
    warn(message: string): void {
      p.log.warn(message);
    },
    error(message: string): void {
      p.log.error(message);
    },
  };
}

// ============================================================================
// Runtime Adapter
// ============================================================================

/**
 * Create a CLI runtime adapter for terminal usage
 */
export function createCLIAdapter(): RuntimeAdapter {
  return {
    ui: new CLIUIAdapter(),
    exec: new CLIExecAdapter(),
    platform: "cli",
  };
}
