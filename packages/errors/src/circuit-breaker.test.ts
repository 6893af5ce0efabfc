import { describe, it, expect } from "vitest";
import { createCircuitBreaker } from "./circuit-breaker.js";

describe("createCircuitBreaker", () => {
  it("passes arguments through and resolves with the result", async () => {
    const breaker = createCircuitBreaker("echo", async (a: number, b: number) => a + b);

    await expect(breaker.fire(2, 3)).resolves.toBe(5);
  });

  it("rejects calls that exceed the timeout", async () => {
    const breaker = createCircuitBreaker(
      "hang",
      () => new Promise<string>(() => undefined),
      { timeout: 20 },
    );

    await expect(breaker.fire()).rejects.toMatchObject({ code: "ETIMEDOUT" });
  });

  it("propagates errors from the wrapped function", async () => {
    const breaker = createCircuitBreaker("fail", async () => {
      throw new Error("upstream down");
    });

    await expect(breaker.fire()).rejects.toThrow("upstream down");
  });
});
