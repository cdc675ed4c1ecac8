/** Per-user minimum interval between accepted actions. Rejected calls are not queued. */
export class Throttle {
  private readonly lastAccepted = new Map<number, number>();

  constructor(
    private readonly intervalMs: number,
    private readonly now: () => number = Date.now
  ) {}

  allow(userId: number): boolean {
    const now = this.now();
    const last = this.lastAccepted.get(userId);
    if (last !== undefined && now - last < this.intervalMs) {
      return false;
    }

    this.lastAccepted.set(userId, now);
    return true;
  }
}
