/**
 * Shared UI helpers
 */

import pc from "picocolors";

export type Colors = ReturnType<typeof pc.createColors>;

/**
 * Colour functions for one run; disabled output returns strings untouched.
 */
export function createColors(enabled: boolean): Colors {
  return pc.createColors(enabled && pc.isColorSupported);
}

/**
 * Show an error on stderr and exit
 */
export function exitWithError(message: string): never {
  console.error(`${pc.red("■")} ${message}`);
  process.exit(1);
}

/**
 * Local time as "YYYY-MM-DD HH:MM:SS"
 */
export function formatTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}
