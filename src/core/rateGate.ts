export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Spaces requests to the same host at least `delayMs` apart. Slots are
 * reserved synchronously, so concurrent workers hitting one host queue up
 * behind each other instead of all passing at once.
 */
export class RateGate {
  private readonly nextSlot = new Map<string, number>();

  constructor(
    private readonly delayMs: number,
    private readonly now: () => number = Date.now,
  ) {}

  /** Milliseconds the caller has to wait for its turn; reserves that turn. */
  reserve(host: string): number {
    const now = this.now();
    const slot = Math.max(now, this.nextSlot.get(host) ?? 0);
    this.nextSlot.set(host, slot + this.delayMs);
    return slot - now;
  }

  async wait(host: string): Promise<void> {
    if (this.delayMs <= 0) return;
    const waitMs = this.reserve(host);
    if (waitMs > 0) {
      await sleep(waitMs);
    }
  }
}
