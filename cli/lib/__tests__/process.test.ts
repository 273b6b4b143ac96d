import { describe, it, expect, afterEach } from "vitest";
import { EventEmitter } from "events";
import { trackChild, currentChild, forwardSignal } from "../process";

class FakeChild extends EventEmitter {
  signals: NodeJS.Signals[] = [];

  kill(signal: NodeJS.Signals = "SIGTERM"): boolean {
    this.signals.push(signal);
    return true;
  }
}

describe("trackChild", () => {
  afterEach(() => {
    const child = currentChild();
    if (child instanceof FakeChild) child.emit("close");
  });

  it("tracks the child until it closes", () => {
    const child = new FakeChild();
    trackChild(child);
    expect(currentChild()).toBe(child);

    child.emit("close", 0);
    expect(currentChild()).toBeUndefined();
  });

  it("releases the child when it fails to spawn", () => {
    const child = new FakeChild();
    trackChild(child);

    child.emit("error", new Error("spawn scp ENOENT"));
    expect(currentChild()).toBeUndefined();
  });

  it("keeps a newer child when an older one closes late", () => {
    const first = new FakeChild();
    const second = new FakeChild();
    trackChild(first);
    trackChild(second);

    first.emit("close", 0);
    expect(currentChild()).toBe(second);
  });
});

describe("forwardSignal", () => {
  it("signals the running child", () => {
    const child = new FakeChild();
    trackChild(child);

    expect(forwardSignal("SIGINT")).toBe(true);
    expect(child.signals).toEqual(["SIGINT"]);
    child.emit("close", null);
  });

  it("does nothing once the child has closed", () => {
    const child = new FakeChild();
    trackChild(child);
    child.emit("close", 0);

    expect(forwardSignal("SIGTERM")).toBe(false);
    expect(child.signals).toEqual([]);
  });
});
