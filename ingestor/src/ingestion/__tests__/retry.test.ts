import { describe, it, expect, vi, afterEach } from "vitest";
import { backoffMs, withTimeout, MAX_BACKOFF_MS } from "../retry.js";
import { FetchTimeoutError } from "../../errors.js";

describe("backoffMs", () => {
  it("doubles per attempt and adds jitter", () => {
    expect(backoffMs(0, () => 0)).toBe(1000);
    expect(backoffMs(1, () => 0)).toBe(2000);
    expect(backoffMs(2, () => 0.5)).toBe(4500);
  });

  it("caps at sixty seconds", () => {
    expect(backoffMs(10, () => 0.99)).toBe(MAX_BACKOFF_MS);
  });
});

describe("withTimeout", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("resolves with the work's value", async () => {
    await expect(withTimeout(() => Promise.resolve("ok"), 1000, "job")).resolves.toBe("ok");
  });

  it("passes through the work's error", async () => {
    await expect(withTimeout(() => Promise.reject(new Error("bad")), 1000, "job")).rejects.toThrow(
      "bad",
    );
  });

  it("rejects with FetchTimeoutError and aborts the signal on expiry", async () => {
    vi.useFakeTimers();
    let seen: AbortSignal | undefined;
    const result = withTimeout(
      (signal) => {
        seen = signal;
        return new Promise<string>(() => {
          // never settles
        });
      },
      500,
      "fetch 000001.SZ",
    );
    const assertion = expect(result).rejects.toThrow(FetchTimeoutError);

    await vi.advanceTimersByTimeAsync(500);
    await assertion;
    await expect(result).rejects.toThrow("fetch 000001.SZ timed out after 500ms");
    expect(seen?.aborted).toBe(true);
  });
});
