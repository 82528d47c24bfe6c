import { describe, expect, it } from "vitest";
import { constantBackoff, defaultBackoff, exponentialBackoff } from "./backoff.js";

describe("defaultBackoff", () => {
  it("retries after 30s, 2m and 10m, then gives up", () => {
    expect(defaultBackoff([0])).toBe(30_000);
    expect(defaultBackoff([0, 30_000])).toBe(120_000);
    expect(defaultBackoff([0, 30_000, 150_000])).toBe(600_000);
    expect(defaultBackoff([0, 30_000, 150_000, 750_000])).toBeNull();
    expect(defaultBackoff([0, 1, 2, 3, 4])).toBeNull();
  });
});

describe("exponentialBackoff", () => {
  it("starts at the base delay and doubles per failure up to the cap", () => {
    const policy = exponentialBackoff(120_000, 1_920_000);
    const delays = [1, 2, 3, 4, 5, 9].map((n) => policy(new Array<number>(n).fill(0), "u", [], new Error("x")));
    expect(delays).toEqual([120_000, 240_000, 480_000, 960_000, 1_920_000, 1_920_000]);
  });
});

describe("constantBackoff", () => {
  it("never gives up", () => {
    const policy = constantBackoff(900_000);
    expect(policy([0], "u", [], null)).toBe(900_000);
    expect(policy(new Array<number>(50).fill(0), "u", [], null)).toBe(900_000);
  });
});
