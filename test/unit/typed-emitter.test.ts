import { describe, it, expect, vi } from "vitest";
import { TypedEventEmitter } from "../../src/utils/typed-emitter.js";

interface TestEvents {
  flush: (key: string, count: number) => void;
  idle: () => void;
}

describe("TypedEventEmitter", () => {
  it("delivers typed arguments", () => {
    const emitter = new TypedEventEmitter<TestEvents>();
    const handler = vi.fn();
    emitter.on("flush", handler);

    expect(emitter.emit("flush", "56911112222", 3)).toBe(true);
    expect(handler).toHaveBeenCalledWith("56911112222", 3);
  });

  it("returns false when nobody listens", () => {
    const emitter = new TypedEventEmitter<TestEvents>();
    expect(emitter.emit("idle")).toBe(false);
  });

  it("runs once listeners a single time", () => {
    const emitter = new TypedEventEmitter<TestEvents>();
    const handler = vi.fn();
    emitter.once("flush", handler);

    emitter.emit("flush", "a", 1);
    emitter.emit("flush", "b", 2);

    expect(handler).toHaveBeenCalledTimes(1);
    expect(handler).toHaveBeenCalledWith("a", 1);
    expect(emitter.listenerCount("flush")).toBe(0);
  });

  it("removes listeners with off and removeAllListeners", () => {
    const emitter = new TypedEventEmitter<TestEvents>();
    const handler = vi.fn();
    emitter.on("flush", handler);
    emitter.off("flush", handler);
    emitter.emit("flush", "a", 1);
    expect(handler).not.toHaveBeenCalled();

    emitter.on("flush", vi.fn());
    emitter.on("idle", vi.fn());
    emitter.removeAllListeners();
    expect(emitter.listenerCount("flush")).toBe(0);
    expect(emitter.listenerCount("idle")).toBe(0);
  });

  it("keeps calling listeners after one throws and reports the error", () => {
    const onError = vi.fn();
    const emitter = new TypedEventEmitter<TestEvents>(onError);
    const failure = new Error("listener bug");
    const after = vi.fn();
    emitter.on("idle", () => {
      throw failure;
    });
    emitter.on("idle", after);

    emitter.emit("idle");

    expect(after).toHaveBeenCalledOnce();
    expect(onError).toHaveBeenCalledWith(failure, "idle");
  });

  it("rethrows listener errors without an error handler", () => {
    const emitter = new TypedEventEmitter<TestEvents>();
    emitter.on("idle", () => {
      throw new Error("listener bug");
    });

    expect(() => emitter.emit("idle")).toThrow("listener bug");
  });
});
