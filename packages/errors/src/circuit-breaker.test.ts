import { describe, it, expect, vi } from "vitest";
import { createCircuitBreaker, DEFAULT_BREAKER_OPTIONS } from "./circuit-breaker.js";

describe("createCircuitBreaker", () => {
  it("passes arguments through and resolves the wrapped result", async () => {
    const fn = vi.fn(async (prompt: string) => `echo: ${prompt}`);
    const breaker = createCircuitBreaker("generation", fn, undefined, () => undefined);

    await expect(breaker.fire("hello")).resolves.toBe("echo: hello");
    expect(fn).toHaveBeenCalledWith("hello");
    breaker.shutdown();
  });

  it("opens after failures and reports the state change", async () => {
    const onStateChange = vi.fn();
    const fn = vi.fn(async (_prompt: string): Promise<string> => {
      throw new Error("upstream down");
    });
    const breaker = createCircuitBreaker(
      "generation",
      fn,
      { errorThresholdPercentage: 1, resetTimeout: 60_000, volumeThreshold: 1 },
      onStateChange,
    );

    await expect(breaker.fire("a")).rejects.toThrow("upstream down");
    expect(onStateChange).toHaveBeenCalledWith("generation", "open");

    await expect(breaker.fire("b")).rejects.toThrow("Breaker is open");
    expect(fn).toHaveBeenCalledOnce();
    breaker.shutdown();
  });

  it("stays closed after a single transient failure", async () => {
    const onStateChange = vi.fn();
    const fn = vi
      .fn(async (_text: string) => "ok")
      .mockRejectedValueOnce(new Error("socket hang up"));
    const breaker = createCircuitBreaker("embeddings", fn, undefined, onStateChange);

    await expect(breaker.fire("a")).rejects.toThrow("socket hang up");
    await expect(breaker.fire("b")).resolves.toBe("ok");

    expect(fn).toHaveBeenCalledTimes(2);
    expect(breaker.opened).toBe(false);
    expect(onStateChange).not.toHaveBeenCalled();
    breaker.shutdown();
  });

  it("opens once the volume threshold is reached with failures", async () => {
    const onStateChange = vi.fn();
    const fn = vi.fn(async (_text: string): Promise<string> => {
      throw new Error("upstream down");
    });
    const breaker = createCircuitBreaker("embeddings", fn, undefined, onStateChange);

    for (let i = 0; i < DEFAULT_BREAKER_OPTIONS.volumeThreshold; i++) {
      await expect(breaker.fire("a")).rejects.toThrow("upstream down");
    }

    expect(breaker.opened).toBe(true);
    expect(onStateChange).toHaveBeenCalledWith("embeddings", "open");
    breaker.shutdown();
  });
});
