import { describe, it, expect } from "vitest";
import { checkPrerequisites, requirePrerequisites } from "../prerequisites";
import { ConfigurationError } from "../errors";
import { TestExecAdapter } from "../../__tests__/helpers/test-adapter";

describe("checkPrerequisites", () => {
  it("reports scp and ssh as found", () => {
    const results = checkPrerequisites(new TestExecAdapter());
    expect(results.map((r) => [r.name, r.ok])).toEqual([
      ["scp", true],
      ["ssh", true],
    ]);
  });
});

describe("requirePrerequisites", () => {
  it("passes when both clients exist", () => {
    expect(() => requirePrerequisites(new TestExecAdapter())).not.toThrow();
  });

  it("names every missing client", () => {
    const exec = new TestExecAdapter(() => 0, new Set<string>());
    expect(() => requirePrerequisites(exec)).toThrow(ConfigurationError);
    expect(() => requirePrerequisites(exec)).toThrow("Required command(s) not found: scp, ssh");
  });
});
