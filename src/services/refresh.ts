import { PadelWatchError, errorMessage } from "../errors";
import { assertAdmin } from "./access";
import type { AvailabilityCache } from "./cache";
import type { LocationService } from "./locations";
import type { Store } from "../db/store";
import type { CurrentUser, FailedLocation } from "../types";

export interface RefreshSummary {
  deleted: { courts: number; availabilities: number; cacheEntries: number };
  refreshed: number;
  failed: FailedLocation[];
  durationMs: number;
}

/**
 * Admin-only data maintenance
 */
export class AdminService {
  constructor(
    private readonly store: Store,
    private readonly cache: AvailabilityCache,
    private readonly locations: LocationService
  ) {}

  clearCache(user: CurrentUser, olderThanMinutes?: number): number {
    assertAdmin(user, "clear the cache");
    return this.cache.clearCache(olderThanMinutes);
  }

  /**
   * Drop every court and availability row, then rebuild each location's
   * courts from its club page. Location ids are preserved, so search orders
   * keep pointing at the same places.
   */
  async refreshAllData(user: CurrentUser): Promise<RefreshSummary> {
    assertAdmin(user, "refresh all data");
    const startTime = Date.now();

    const deleted = this.store.clearProviderData();
    console.log(
      `[Refresh] Deleted ${deleted.courts} courts, ${deleted.availabilities} availabilities, ${deleted.cacheEntries} cache entries`
    );

    const failed: FailedLocation[] = [];
    let refreshed = 0;

    for (const location of this.store.listLocations()) {
      try {
        await this.locations.addBySlug(location.provider, location.slug);
        refreshed++;
      } catch (error) {
        console.error(`[Refresh] ${location.name} failed:`, error);
        failed.push({
          locationId: location.id,
          name: location.name,
          error: error instanceof PadelWatchError ? error.code : "INTERNAL_ERROR",
          message: errorMessage(error),
        });
      }
    }

    const durationMs = Date.now() - startTime;
    console.log(`[Refresh] Refreshed ${refreshed} locations, ${failed.length} failed in ${durationMs}ms`);
    return { deleted, refreshed, failed, durationMs };
  }
}
