/**
 * Signal forwarding for the scp/ssh child of the host being deployed.
 *
 * Hosts are processed one at a time, so at most one child runs at once.
 * The CLI exec adapter tracks it here; bin.ts installs the signal handlers.
 */

/** The parts of a ChildProcess needed to track and stop it */
export interface KillableChild {
  kill(signal?: NodeJS.Signals): boolean;
  once(event: "close" | "error", listener: () => void): unknown;
}

let activeChild: KillableChild | undefined;

/**
 * Make this the running child. It is released when it closes or errors.
 */
export function trackChild(child: KillableChild): void {
  activeChild = child;
  const release = () => {
    if (activeChild === child) activeChild = undefined;
  };
  child.once("close", release);
  child.once("error", release);
}

/** The child currently running, if any */
export function currentChild(): KillableChild | undefined {
  return activeChild;
}

/**
 * Send a signal to the running child. Returns false when nothing is running.
 */
export function forwardSignal(signal: NodeJS.Signals): boolean {
  if (!activeChild) return false;
  activeChild.kill(signal);
  return true;
}

/**
 * Install SIGINT and SIGTERM handlers that stop the running transfer,
 * then exit with the conventional 128+signal code.
 */
export function setupGracefulShutdown(): void {
  const shutdown = (signal: NodeJS.Signals, exitCode: number) => {
    forwardSignal(signal);
    process.exit(exitCode);
  };

  process.on("SIGINT", () => shutdown("SIGINT", 130));
  process.on("SIGTERM", () => shutdown("SIGTERM", 143));
}
