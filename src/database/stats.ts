export interface DatabaseStatsSnapshot {
  cacheHits: number;
  cacheMisses: number;
  fetchSuccesses: number;
  fetchFailures: number;
  /** Milliseconds, or -1 before the first successful fetch */
  averageFetchSuccessTime: number;
  /** Milliseconds, or -1 before the first failed fetch */
  averageFetchFailureTime: number;
}

/**
 * Cache and fetch counters for the views of one or more databases
 */
export class DatabaseStats {
  private hits = 0;
  private misses = 0;
  private successes = 0;
  private successTime = 0;
  private failures = 0;
  private failureTime = 0;

  addCacheHit(): void {
    this.hits++;
  }

  /**
   * A value that exists in the store but was not cached
   */
  addCacheMiss(): void {
    this.misses++;
  }

  addFetchSuccess(elapsedMs: number): void {
    this.successes++;
    this.successTime += elapsedMs;
  }

  /**
   * A lookup the store had no value for
   */
  addFetchFailure(elapsedMs: number): void {
    this.failures++;
    this.failureTime += elapsedMs;
  }

  get cacheHits(): number {
    return this.hits;
  }

  get cacheMisses(): number {
    return this.misses;
  }

  get fetchSuccesses(): number {
    return this.successes;
  }

  get fetchFailures(): number {
    return this.failures;
  }

  get averageFetchSuccessTime(): number {
    return this.successes > 0 ? Math.floor(this.successTime / this.successes) : -1;
  }

  get averageFetchFailureTime(): number {
    return this.failures > 0 ? Math.floor(this.failureTime / this.failures) : -1;
  }

  snapshot(): DatabaseStatsSnapshot {
    return {
      cacheHits: this.hits,
      cacheMisses: this.misses,
      fetchSuccesses: this.successes,
      fetchFailures: this.failures,
      averageFetchSuccessTime: this.averageFetchSuccessTime,
      averageFetchFailureTime: this.averageFetchFailureTime
    };
  }

  reset(): void {
    this.hits = 0;
    this.misses = 0;
    this.successes = 0;
    this.successTime = 0;
    this.failures = 0;
    this.failureTime = 0;
  }
}
