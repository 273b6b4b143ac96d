import { describe, it, expect } from "vitest";
import { summarize, isSuccessful, formatSummary } from "../summary";
import { parseHostSpec } from "../host-spec";
import { createColors } from "../ui";
import type { DeploymentOutcome, DeploymentResult } from "../../types";

function result(token: string, outcome: DeploymentOutcome): DeploymentResult {
  return { target: parseHostSpec(token), outcome };
}

const plain = createColors(false);

describe("summarize", () => {
  it("counts successes when every host succeeds", () => {
    const summary = summarize([result("r1", "success"), result("r2", "success"), result("r3", "success")]);
    expect(summary).toEqual({ total: 3, succeeded: 3, failed: [] });
    expect(isSuccessful(summary)).toBe(true);
  });

  it("lists failed tokens once each, in attempt order", () => {
    const summary = summarize([
      result("admin@r1:2222", "execute-failed"),
      result("r2", "success"),
      result("r3", "upload-failed"),
    ]);
    expect(summary).toEqual({ total: 3, succeeded: 1, failed: ["admin@r1:2222", "r3"] });
    expect(isSuccessful(summary)).toBe(false);
  });

  it("handles an empty run", () => {
    expect(summarize([])).toEqual({ total: 0, succeeded: 0, failed: [] });
  });
});

describe("formatSummary", () => {
  it("prints counts only when nothing failed", () => {
    expect(formatSummary({ total: 2, succeeded: 2, failed: [] }, plain)).toEqual([
      "Total hosts:    2",
      "Successful:     2",
      "Failed:         0",
    ]);
  });

  it("appends the failed hosts", () => {
    expect(formatSummary({ total: 3, succeeded: 1, failed: ["r1", "ops@r3"] }, plain)).toEqual([
      "Total hosts:    3",
      "Successful:     1",
      "Failed:         2",
      "",
      "Failed hosts:",
      "  - r1",
      "  - ops@r3",
    ]);
  });
});
