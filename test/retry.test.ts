import { describe, expect, it } from "vitest";
import { retry } from "../src/core/retry.js";

describe("retry", () => {
  it("returns the first success", async () => {
    const seen: number[] = [];
    const res = await retry(
      async (attempt) => {
        seen.push(attempt);
        return attempt < 3 ? { ok: false, error: `try ${attempt}` } : { ok: true, value: "done" };
      },
      { attempts: 5, delayMs: 0 },
    );
    expect(res).toEqual({ ok: true, value: "done", attempts: 3 });
    expect(seen).toEqual([1, 2, 3]);
  });

  it("reports the last error once attempts run out", async () => {
    const retried: number[] = [];
    const res = await retry(async (attempt) => ({ ok: false, error: `try ${attempt}` }), {
      attempts: 2,
      delayMs: 0,
      onRetry: (attempt) => retried.push(attempt),
    });
    expect(res).toEqual({ ok: false, error: "try 2", attempts: 2 });
    expect(retried).toEqual([1]);
  });

  it("stops when the signal fires during the delay", async () => {
    const controller = new AbortController();
    const res = await retry(
      async () => {
        setTimeout(() => controller.abort(), 10);
        return { ok: false, error: "not yet" };
      },
      { attempts: 3, delayMs: 60_000, signal: controller.signal },
    );
    expect(res).toEqual({ ok: false, error: "aborted", attempts: 1 });
  });

  it("does not call fn when already aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    let calls = 0;
    const res = await retry(
      async () => {
        calls++;
        return { ok: true, value: 1 };
      },
      { attempts: 3, delayMs: 0, signal: controller.signal },
    );
    expect(calls).toBe(0);
    expect(res).toEqual({ ok: false, error: "aborted", attempts: 0 });
  });
});
