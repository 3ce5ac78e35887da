import { retry, retryDelayMs } from "../retry";

const base = { minDelayMs: 500, maxDelayMs: 4000, jitterRatio: 0 };

describe("retryDelayMs", () => {
  test("doubles from the minimum up to the cap", () => {
    expect([0, 1, 2, 3, 4].map((a) => retryDelayMs(a, base))).toEqual([
      500, 1000, 2000, 4000, 4000,
    ]);
  });

  test("adds bounded jitter", () => {
    expect(
      retryDelayMs(0, { ...base, jitterRatio: 0.2, randomFn: () => 1 }),
    ).toBe(600);
    expect(
      retryDelayMs(0, { ...base, jitterRatio: 0.2, randomFn: () => 0 }),
    ).toBe(500);
  });

  test("a custom delay is still capped", () => {
    expect(retryDelayMs(0, base, 60_000)).toBe(4000);
  });
});

describe("retry", () => {
  const fast = { retries: 3, minDelayMs: 1, maxDelayMs: 2, jitterRatio: 0 };

  test("stops as soon as fn succeeds", async () => {
    const attempts: number[] = [];
    const out = await retry(
      async (attempt) => {
        attempts.push(attempt);
        if (attempt < 2) throw new Error("flaky");
        return "ok";
      },
      { ...fast, shouldRetry: () => true },
    );
    expect(out).toBe("ok");
    expect(attempts).toEqual([0, 1, 2]);
  });

  test("rethrows the last error once retries run out", async () => {
    let calls = 0;
    await expect(
      retry(
        async () => {
          calls++;
          throw new Error(`fail ${calls}`);
        },
        { ...fast, shouldRetry: () => true },
      ),
    ).rejects.toThrow("fail 4");
    expect(calls).toBe(4);
  });

  test("does not retry when shouldRetry declines", async () => {
    let calls = 0;
    await expect(
      retry(
        async () => {
          calls++;
          throw new Error("fatal");
        },
        { ...fast, shouldRetry: () => ({ retry: false }) },
      ),
    ).rejects.toThrow("fatal");
    expect(calls).toBe(1);
  });

  test("an aborted signal ends the wait between attempts", async () => {
    const controller = new AbortController();
    let calls = 0;
    const pending = retry(
      async () => {
        calls++;
        throw new Error("down");
      },
      {
        retries: 3,
        minDelayMs: 10_000,
        maxDelayMs: 10_000,
        jitterRatio: 0,
        shouldRetry: () => true,
        signal: controller.signal,
      },
    );
    setTimeout(() => controller.abort(), 10);
    await expect(pending).rejects.toThrow("down");
    expect(calls).toBe(1);
  });
});
