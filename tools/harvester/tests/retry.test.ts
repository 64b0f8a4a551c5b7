import { describe, expect, test } from "vitest";
import { IdleDetector } from "../pipeline/idle.js";
import { RetryGovernor, wait } from "../pipeline/retry.js";

describe("RetryGovernor", () => {
  test("allows maxRetries retries after the first failure", () => {
    const governor = new RetryGovernor(2, 500);

    expect(governor.recordFailure()).toEqual({ kind: "retry", failures: 1, backoffMs: 500 });
    expect(governor.recordFailure()).toEqual({ kind: "retry", failures: 2, backoffMs: 500 });
    expect(governor.recordFailure()).toEqual({ kind: "exhausted", failures: 3 });
  });

  test("a success resets the consecutive count", () => {
    const governor = new RetryGovernor(1, 0);

    governor.recordFailure();
    governor.recordSuccess();

    expect(governor.failures).toBe(0);
    expect(governor.recordFailure().kind).toBe("retry");
  });

  test("zero retries escalates on the first failure", () => {
    expect(new RetryGovernor(0, 100).recordFailure()).toEqual({ kind: "exhausted", failures: 1 });
  });

  test("wait resolves immediately for non-positive delays", async () => {
    await expect(wait(0)).resolves.toBeUndefined();
    await expect(wait(-5)).resolves.toBeUndefined();
  });
});

describe("IdleDetector", () => {
  test("counts consecutive iterations without new lines", () => {
    const idle = new IdleDetector(2);

    expect(idle.observe(0)).toBe(1);
    expect(idle.reached).toBe(false);
    expect(idle.observe(3)).toBe(0);
    expect(idle.observe(0)).toBe(1);
    expect(idle.observe(0)).toBe(2);
    expect(idle.reached).toBe(true);
  });

  test("starts from a restored count", () => {
    const idle = new IdleDetector(3, 2);

    expect(idle.count).toBe(2);
    expect(idle.observe(0)).toBe(3);
    expect(idle.reached).toBe(true);
  });
});
