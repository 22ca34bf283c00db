import { Clock, systemClock } from "../utils/clock";

interface CacheEntry<T> {
  promise: Promise<T>;
  settledAt: number | null;
}

/**
 * In-flight and recently completed work keyed by an idempotency key.
 * Callers must register synchronously, before their first await, so a
 * concurrent duplicate always finds the entry.
 */
export class IdempotencyCache<T> {
  private entries: Map<string, CacheEntry<T>> = new Map();

  constructor(
    private readonly ttlMs: () => number,
    private readonly clock: Clock = systemClock
  ) {}

  lookup(key: string): Promise<T> | undefined {
    this.prune();
    return this.entries.get(key)?.promise;
  }

  isInFlight(key: string): boolean {
    const entry = this.entries.get(key);
    return entry !== undefined && entry.settledAt === null;
  }

  register(key: string, promise: Promise<T>): void {
    const entry: CacheEntry<T> = { promise, settledAt: null };
    this.entries.set(key, entry);
    promise.then(
      () => {
        entry.settledAt = this.clock.now();
      },
      () => {
        // A crashed run must not pin the key
        if (this.entries.get(key) === entry) this.entries.delete(key);
      }
    );
  }

  forget(key: string): void {
    this.entries.delete(key);
  }

  inFlightKeys(): string[] {
    return Array.from(this.entries.entries())
      .filter(([, entry]) => entry.settledAt === null)
      .map(([key]) => key);
  }

  get size(): number {
    return this.entries.size;
  }

  private prune(): void {
    const cutoff = this.clock.now() - this.ttlMs();
    for (const [key, entry] of this.entries) {
      if (entry.settledAt !== null && entry.settledAt <= cutoff) {
        this.entries.delete(key);
      }
    }
  }
}
