/**
 * Runtime Adapter Interfaces
 *
 * These interfaces define the contract between the deploy logic and the
 * runtime environment. The CLI adapter drives a real terminal and real
 * scp/ssh processes; tests supply recording stand-ins.
 */

// ============================================================================
// Execution Types
// ============================================================================

/** Result of a captured command execution */
export interface ExecResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

/** Options for streaming command execution */
export interface StreamOptions {
  cwd?: string;
}

// ============================================================================
// UI Adapter
// ============================================================================

/** Logging interface */
export interface LogAdapter {
  info(message: string): void;
  step(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/** User interface adapter for terminal output */
export interface UIAdapter {
  /** Show introductory banner/message */
  intro(message: string): void;

  /** Show a note/info box */
  note(content: string, title?: string): void;

  /** Show outro/closing message */
  outro(message: string): void;

  /** Logging methods */
  log: LogAdapter;
}

// ============================================================================
// Execution Adapter
// ============================================================================

/** Command execution adapter */
export interface ExecAdapter {
  /** Execute a command and capture output */
  capture(command: string, args?: string[], cwd?: string): ExecResult;

  /** Execute a command with output passed through to the terminal, returns exit code */
  stream(command: string, args?: string[], options?: StreamOptions): Promise<number>;

  /** Check if a command exists on the system */
  commandExists(command: string): boolean;
}

// ============================================================================
// Runtime Adapter
// ============================================================================

/** Combined runtime adapter providing all platform abstractions */
export interface RuntimeAdapter {
  ui: UIAdapter;
  exec: ExecAdapter;
  /** Platform identifier for conditional logic */
  platform: "cli" | "test";
}

// ============================================================================
// Tool Implementation
// ============================================================================

/**
 * A tool implementation performs a command action using the provided
 * runtime adapter, so the same logic runs in the terminal and under test.
 */
export type ToolImplementation<TOptions = Record<string, unknown>> = (
  runtime: RuntimeAdapter,
  options: TOptions
) => Promise<void>;
