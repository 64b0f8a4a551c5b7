export type RetryDecision = { kind: "retry"; failures: number; backoffMs: number } | {
  kind: "exhausted";
  failures: number;
};

/**
 * Counts consecutive failures of the current iteration. The budget is
 * `maxRetries` retries after the first attempt; any success resets it.
 */
export class RetryGovernor {
  private consecutiveFailures = 0;

  constructor(
    public readonly maxRetries: number,
    public readonly retryWaitMs: number
  ) {}

  recordFailure(): RetryDecision {
    this.consecutiveFailures += 1;
    if (this.consecutiveFailures > this.maxRetries) {
      return { kind: "exhausted", failures: this.consecutiveFailures };
    }
    return { kind: "retry", failures: this.consecutiveFailures, backoffMs: this.retryWaitMs };
  }

  recordSuccess(): void {
    this.consecutiveFailures = 0;
  }

  get failures(): number {
    return this.consecutiveFailures;
  }
}

export async function wait(ms: number): Promise<void> {
  if (ms <= 0) return;
  await new Promise<void>((resolve) => setTimeout(resolve, ms));
}
