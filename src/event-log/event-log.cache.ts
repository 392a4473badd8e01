interface CacheEntry<T> {
  value: T;
  expiresAt: number;
}

/**
 * Single-entry time-to-live cache for the loaded event log.
 *
 * Every invalidation starts a new generation. A writer records the generation
 * it started in and its value is discarded if the cache was invalidated while
 * it was loading, so an older load never replaces a newer one.
 */
export class EventLogCache<T> {
  private entry: CacheEntry<T> | null = null;
  private currentGeneration = 0;

  constructor(private readonly ttlMs: number) {}

  get generation(): number {
    return this.currentGeneration;
  }

  get expiresAt(): number | null {
    return this.entry?.expiresAt ?? null;
  }

  get(now: number): T | null {
    if (!this.entry || now >= this.entry.expiresAt) {
      return null;
    }
    return this.entry.value;
  }

  set(value: T, now: number, generation = this.currentGeneration): boolean {
    if (generation !== this.currentGeneration) {
      return false;
    }
    this.entry = { value, expiresAt: now + this.ttlMs };
    return true;
  }

  invalidate(): void {
    this.entry = null;
    this.currentGeneration += 1;
  }
}
