import { CacheWriteConflictError, LocationNotFoundError, errorMessage, isRetryableUpstreamError } from "../errors";
import { normalizeAvailability } from "./normalizer";
import type { ProviderRegistry } from "../providers/provider";
import type { AvailabilityWithCourt, Store } from "../db/store";
import type { CacheEntry, Location } from "../db/schema";
import type { AvailabilityOptions, RawAvailabilityPayload } from "../types";

export interface CacheOptions {
  freshnessMinutes: number;
  upstreamRetries: number;
  retryDelayMs: number;
}

export interface AvailabilityData {
  location: Location;
  rows: AvailabilityWithCourt[];
  cached: boolean;
  stale: boolean;
  cacheTimestamp: string | null;
}

const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Decides per (location, date) between persisted rows and a live fetch,
 * and makes sure only one live fetch per scope is in flight.
 */
export class AvailabilityCache {
  private readonly inFlight = new Map<string, Promise<AvailabilityData>>();

  constructor(
    private readonly store: Store,
    private readonly providers: ProviderRegistry,
    private readonly options: CacheOptions,
    private readonly now: () => Date = () => new Date()
  ) {}

  /**
   * Get cache age in seconds, null when the scope was never fetched
   */
  getAge(entry: CacheEntry | undefined): number | null {
    if (!entry) return null;
    return Math.floor((this.now().getTime() - new Date(entry.fetchedAt).getTime()) / 1000);
  }

  /**
   * Check if a cache entry is past the freshness threshold (or missing)
   */
  isStale(entry: CacheEntry | undefined): boolean {
    const age = this.getAge(entry);
    return age === null || age > this.options.freshnessMinutes * 60;
  }

  async getAvailability(
    locationId: number,
    date: string,
    options: AvailabilityOptions
  ): Promise<AvailabilityData> {
    // Everything up to the inFlight lookup is synchronous: two callers can
    // never both miss the map and start duplicate fetches
    const location = this.store.getLocation(locationId);
    if (!location) {
      throw new LocationNotFoundError(locationId);
    }

    const entry = this.store.getCacheEntry(locationId, date);
    const live = options.forceLiveSearch || (options.liveSearch && this.isStale(entry));

    if (!live) {
      return this.fromStore(location, date, entry, this.isStale(entry));
    }

    const key = `${locationId}|${date}`;
    const pending = this.inFlight.get(key);
    if (pending) {
      console.log(`[Cache] Joining in-flight fetch for ${location.name} on ${date}`);
      return pending;
    }

    const request = this.fetchLive(location, date).finally(() => {
      this.inFlight.delete(key);
    });
    this.inFlight.set(key, request);
    return request;
  }

  /**
   * Number of live fetches currently running
   */
  inFlightCount(): number {
    return this.inFlight.size;
  }

  /**
   * Invalidate cache entries older than `olderThanMinutes`, or all of them.
   * Availability rows stay as a stale fallback; the next live search
   * re-fetches every invalidated scope.
   */
  clearCache(olderThanMinutes?: number): number {
    const cutoff =
      olderThanMinutes === undefined
        ? undefined
        : new Date(this.now().getTime() - olderThanMinutes * 60 * 1000).toISOString();

    const cleared = this.store.deleteCacheEntries(cutoff);
    console.log(
      `[Cache] Cleared ${cleared} cache entries${olderThanMinutes === undefined ? "" : ` older than ${olderThanMinutes} minutes`}`
    );
    return cleared;
  }

  private fromStore(
    location: Location,
    date: string,
    entry: CacheEntry | undefined,
    stale: boolean
  ): AvailabilityData {
    return {
      location,
      rows: this.store.listAvailability(location.id, date),
      cached: true,
      stale,
      cacheTimestamp: entry?.fetchedAt ?? null,
    };
  }

  private async fetchWithRetry(location: Location, date: string): Promise<RawAvailabilityPayload> {
    const provider = this.providers.get(location.provider);

    for (let attempt = 0; ; attempt++) {
      try {
        return await provider.fetchAvailability(location.providerLocationId, date);
      } catch (error) {
        if (!isRetryableUpstreamError(error) || attempt >= this.options.upstreamRetries) {
          throw error;
        }
        console.log(
          `[Cache] Fetch for ${location.name} on ${date} failed (${errorMessage(error)}), retrying in ${this.options.retryDelayMs}ms`
        );
        await sleep(this.options.retryDelayMs);
      }
    }
  }

  private async fetchLive(location: Location, date: string): Promise<AvailabilityData> {
    try {
      const payload = await this.fetchWithRetry(location, date);
      const normalized = normalizeAvailability(payload, { date, timezone: location.timezone });

      if (normalized.skipped > 0) {
        console.log(
          `[Cache] ${location.name} ${date}: skipped ${normalized.skipped} malformed records (first: ${normalized.errors[0]?.message ?? "n/a"})`
        );
      }

      const fetchedAt = this.now().toISOString();
      const saved = this.store.replaceAvailability(
        location.id,
        date,
        normalized.slots,
        fetchedAt,
        normalized.skipped
      );

      console.log(
        `[Cache] ${location.name} ${date}: ${saved.inserted} new, ${saved.updated} updated, ${saved.markedUnavailable} gone`
      );

      return {
        location,
        rows: this.store.listAvailability(location.id, date),
        cached: false,
        stale: false,
        cacheTimestamp: fetchedAt,
      };
    } catch (error) {
      if (error instanceof CacheWriteConflictError) {
        console.error(`[Cache] FATAL: write conflict for ${location.name} on ${date}`, error);
        throw error;
      }

      // Serve stale over serve nothing
      const entry = this.store.getCacheEntry(location.id, date);
      const fallback = this.fromStore(location, date, entry, true);
      if (entry || fallback.rows.length > 0) {
        console.error(`[Cache] Live fetch for ${location.name} on ${date} failed, serving stale data:`, error);
        return fallback;
      }

      throw error;
    }
  }
}
