import { describe, expect, test, vi } from "vitest";
import { SimpleEmitter } from "../src/events.js";

describe("SimpleEmitter", () => {
  test("delivers values to every listener", () => {
    const emitter = new SimpleEmitter<number>();
    const a = vi.fn();
    const b = vi.fn();
    emitter.on(a);
    emitter.on(b);

    emitter.emit(3);

    expect(a).toHaveBeenCalledWith(3);
    expect(b).toHaveBeenCalledWith(3);
    expect(emitter.size).toBe(2);
  });

  test("disposing a subscription removes the listener", () => {
    const emitter = new SimpleEmitter<string>();
    const listener = vi.fn();
    const subscription = emitter.on(listener);

    subscription.dispose();
    emitter.emit("ignored");

    expect(listener).not.toHaveBeenCalled();
    expect(emitter.size).toBe(0);
  });

  test("a throwing listener is reported and the rest still run", () => {
    const errors: unknown[] = [];
    const emitter = new SimpleEmitter<string>((error) => errors.push(error));
    const later = vi.fn();
    emitter.on(() => {
      throw new Error("listener failed");
    });
    emitter.on(later);

    emitter.emit("value");

    expect(later).toHaveBeenCalledWith("value");
    expect(errors).toHaveLength(1);
  });
});
