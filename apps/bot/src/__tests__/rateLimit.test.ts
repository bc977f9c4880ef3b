import { describe, expect, it } from "vitest";
import { SlidingWindowLimiter } from "../rateLimit.js";

describe("SlidingWindowLimiter", () => {
  it("allows a burst per window and reports when to retry", () => {
    let now = 0;
    const limiter = new SlidingWindowLimiter(1000, 2, () => now);

    expect(limiter.hit(1)).toEqual({ allowed: true });
    now = 100;
    expect(limiter.hit(1)).toEqual({ allowed: true });
    now = 200;
    expect(limiter.hit(1)).toEqual({ allowed: false, retryAfterMs: 800 });
    expect(limiter.hit(2)).toEqual({ allowed: true });

    now = 1000;
    expect(limiter.hit(1)).toEqual({ allowed: true });
    now = 1050;
    expect(limiter.hit(1)).toEqual({ allowed: false, retryAfterMs: 50 });
  });

  it("forgets idle keys on prune", () => {
    let now = 0;
    const limiter = new SlidingWindowLimiter(1000, 1, () => now);
    limiter.hit(1);
    now = 5000;
    limiter.prune();
    expect(limiter.hit(1)).toEqual({ allowed: true });
  });
});
