import { TEMPERATURE_CACHE_TTL_SECONDS } from '../constants/weather';
import { Clock, systemClock } from '../utils/time';

type CacheEntry = {
  temperature: number;
  expiresAt: number;
};

/**
 * Process-wide temperature readings keyed by city name (case-sensitive).
 *
 * Entries are never purged: an expired entry reads as a miss and is
 * replaced by the next successful lookup. Memory therefore grows with the
 * number of distinct cities ever queried.
 */
export class TemperatureCache {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly ttlMs: number;

  constructor(
    private readonly clock: Clock = systemClock,
    ttlSeconds: number = TEMPERATURE_CACHE_TTL_SECONDS
  ) {
    this.ttlMs = ttlSeconds * 1000;
  }

  /** Cached temperature, or undefined when missing or expired (bound is inclusive). */
  get(city: string, now: number = this.clock()): number | undefined {
    const entry = this.entries.get(city);
    if (!entry || now > entry.expiresAt) return undefined;

    return entry.temperature;
  }

  /** Last write wins. */
  put(city: string, temperature: number, now: number = this.clock()): void {
    this.entries.set(city, {
      temperature,
      expiresAt: now + this.ttlMs,
    });
  }

  get size(): number {
    return this.entries.size;
  }
}
