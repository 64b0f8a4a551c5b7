export class IdleDetector {
  private idleCount: number;

  constructor(
    public readonly threshold: number,
    initialCount = 0
  ) {
    this.idleCount = initialCount;
  }

  /** Returns the updated count of consecutive iterations without new lines. */
  observe(newUniqueCount: number): number {
    this.idleCount = newUniqueCount > 0 ? 0 : this.idleCount + 1;
    return this.idleCount;
  }

  get count(): number {
    return this.idleCount;
  }

  get reached(): boolean {
    return this.idleCount >= this.threshold;
  }
}
