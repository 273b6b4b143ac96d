/**
 * Aggregation and rendering of deployment results
 */

import type { DeploymentResult, Summary } from "../types";
import type { Colors } from "./ui";

export function summarize(results: DeploymentResult[]): Summary {
  const failed: string[] = [];
  let succeeded = 0;
  for (const result of results) {
    if (result.outcome === "success") {
      succeeded++;
    } else {
      failed.push(result.target.token);
    }
  }
  return { total: results.length, succeeded, failed };
}

export function isSuccessful(summary: Summary): boolean {
  return summary.failed.length === 0;
}

/**
 * Summary lines: counts, then the failed hosts in attempt order.
 */
export function formatSummary(summary: Summary, colors: Colors): string[] {
  const lines = [
    `Total hosts:    ${summary.total}`,
    `Successful:     ${colors.green(String(summary.succeeded))}`,
    `Failed:         ${summary.failed.length > 0 ? colors.red(String(summary.failed.length)) : "0"}`,
  ];

  if (summary.failed.length > 0) {
    lines.push("", "Failed hosts:");
    for (const token of summary.failed) {
      lines.push(`  - ${token}`);
    }
  }

  return lines;
}
