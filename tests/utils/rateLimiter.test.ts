import { RateLimiter } from "../../src/utils/rateLimiter.js";

describe("RateLimiter", () => {
  it("does not wait for earlier tasks to finish", async () => {
    const limiter = new RateLimiter(0);
    const started: string[] = [];
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });

    const first = limiter.schedule(async () => {
      started.push("first");
      await gate;
      return 1;
    });
    const second = limiter.schedule(async () => {
      started.push("second");
      return 2;
    });

    await expect(second).resolves.toBe(2);
    expect(started).toEqual(["first", "second"]);
    release();
    await expect(first).resolves.toBe(1);
  });

  it("spaces out task starts", async () => {
    const limiter = new RateLimiter(40);
    const startedAt: number[] = [];
    await Promise.all(
      [0, 1].map(() =>
        limiter.schedule(async () => {
          startedAt.push(Date.now());
        })
      )
    );
    expect(startedAt[1] - startedAt[0]).toBeGreaterThanOrEqual(35);
  });

  it("propagates task failures", async () => {
    const limiter = new RateLimiter(0);
    await expect(limiter.schedule(() => Promise.reject(new Error("boom")))).rejects.toThrow("boom");
    await expect(limiter.schedule(async () => "after")).resolves.toBe("after");
  });
});
