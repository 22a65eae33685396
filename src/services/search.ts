import { PadelWatchError, LocationNotFoundError, errorMessage } from "../errors";
import {
  assertPositiveDuration,
  createWindow,
  parseDate,
  parseTime,
  slotFits,
} from "./time-window";
import type { TimeWindow } from "./time-window";
import type { AvailabilityCache, AvailabilityData } from "./cache";
import type { ProviderRegistry } from "../providers/provider";
import type { Store } from "../db/store";
import type { Availability, Court, Location } from "../db/schema";
import type {
  AvailabilityOptions,
  CourtConfig,
  CourtMatches,
  CourtType,
  CurrentUser,
  FailedLocation,
  LocationMatches,
  MatchedSlot,
  SearchResult,
  SearchSpec,
} from "../types";

/**
 * A validated search, with its locations resolved
 */
export interface SearchPlan {
  date: string;
  window: TimeWindow;
  durationMinutes: number;
  courtType: CourtType;
  courtConfig: CourtConfig;
  locations: Location[];
  availability: AvailabilityOptions;
}

export type LocationOutcome =
  | { status: "ok"; location: Location; matches: LocationMatches }
  | { status: "failed"; location: Location; error: unknown };

export interface SearchEngineOptions {
  concurrency: number;
}

export function courtMatches(court: Court, courtType: CourtType, courtConfig: CourtConfig): boolean {
  if (courtType === "indoor" && !court.isIndoor) return false;
  if (courtType === "outdoor" && court.isIndoor) return false;
  if (courtConfig === "double" && !court.isDouble) return false;
  if (courtConfig === "single" && court.isDouble) return false;
  return true;
}

export function failedLocation(location: Location, error: unknown): FailedLocation {
  return {
    locationId: location.id,
    name: location.name,
    error: error instanceof PadelWatchError ? error.code : "INTERNAL_ERROR",
    message: errorMessage(error),
  };
}

export class SearchEngine {
  constructor(
    private readonly store: Store,
    private readonly cache: AvailabilityCache,
    private readonly providers: ProviderRegistry,
    private readonly options: SearchEngineOptions
  ) {}

  /**
   * Validate a spec and resolve its locations. Throws InvalidParameter or
   * LocationNotFound; nothing is fetched.
   */
  plan(spec: SearchSpec, user: CurrentUser): SearchPlan {
    const date = parseDate(spec.date);
    const window = createWindow(parseTime(spec.windowStart), parseTime(spec.windowEnd));
    assertPositiveDuration(spec.durationMinutes);

    let locations: Location[];
    if (spec.locationIds && spec.locationIds.length > 0) {
      locations = [];
      for (const id of new Set(spec.locationIds)) {
        const location = this.store.getLocation(id);
        if (!location) {
          throw new LocationNotFoundError(id);
        }
        locations.push(location);
      }
    } else {
      locations = this.store.listLocations();
    }

    let forceLiveSearch = spec.forceLiveSearch;
    let liveSearch = spec.liveSearch;
    if (forceLiveSearch && !user.isAdmin) {
      console.warn(`[Search] forceLiveSearch ignored for non-admin user ${user.id}`);
      forceLiveSearch = false;
      liveSearch = true;
    }

    return {
      date,
      window,
      durationMinutes: spec.durationMinutes,
      courtType: spec.courtType,
      courtConfig: spec.courtConfig,
      locations,
      availability: { liveSearch, forceLiveSearch },
    };
  }

  /**
   * Search one location. Never throws: a failure is reported in the outcome
   * so the other locations of the search carry on.
   */
  async searchLocation(plan: SearchPlan, location: Location): Promise<LocationOutcome> {
    try {
      const data = await this.cache.getAvailability(location.id, plan.date, plan.availability);
      return { status: "ok", location, matches: this.match(plan, data) };
    } catch (error) {
      console.error(`[Search] ${location.name} failed: ${errorMessage(error)}`);
      return { status: "failed", location, error };
    }
  }

  /**
   * Combine per-location outcomes into a result, in plan order. Throws the
   * first error only when every location failed.
   */
  assemble(plan: SearchPlan, outcomes: LocationOutcome[]): SearchResult {
    const byId = new Map(outcomes.map((outcome) => [outcome.location.id, outcome]));
    const ordered = plan.locations
      .map((location) => byId.get(location.id))
      .filter((outcome): outcome is LocationOutcome => outcome !== undefined);

    const locations: LocationMatches[] = [];
    const failedLocations: FailedLocation[] = [];
    let firstError: unknown = null;

    for (const outcome of ordered) {
      if (outcome.status === "ok") {
        locations.push(outcome.matches);
        continue;
      }
      firstError ??= outcome.error;
      failedLocations.push(failedLocation(outcome.location, outcome.error));
    }

    if (ordered.length > 0 && locations.length === 0) {
      throw firstError;
    }

    const timestamps = locations
      .map((entry) => entry.cacheTimestamp)
      .filter((timestamp): timestamp is string => timestamp !== null)
      .sort();

    return {
      date: plan.date,
      locations,
      failedLocations,
      staleLocationIds: locations.filter((entry) => entry.stale).map((entry) => entry.location.id),
      totalSlots: locations.reduce(
        (sum, entry) => sum + entry.courts.reduce((n, court) => n + court.slots.length, 0),
        0
      ),
      cached: locations.length > 0 && locations.every((entry) => entry.cached),
      cacheTimestamp: timestamps[0] ?? null,
    };
  }

  /**
   * Run a whole search, fetching up to `concurrency` locations at a time
   */
  async search(spec: SearchSpec, user: CurrentUser): Promise<SearchResult> {
    const plan = this.plan(spec, user);
    const outcomes: LocationOutcome[] = [];

    console.log(
      `[Search] ${plan.date} ${spec.windowStart}-${spec.windowEnd} ${plan.durationMinutes}min across ${plan.locations.length} locations`
    );

    for (let i = 0; i < plan.locations.length; i += this.options.concurrency) {
      const batch = plan.locations.slice(i, i + this.options.concurrency);
      const batchResults = await Promise.all(batch.map((location) => this.searchLocation(plan, location)));
      outcomes.push(...batchResults);
    }

    return this.assemble(plan, outcomes);
  }

  private match(plan: SearchPlan, data: AvailabilityData): LocationMatches {
    const { location } = data;
    const courts: CourtMatches[] = [];
    const byCourt = new Map<number, CourtMatches>();

    // Rows arrive ordered by court id, then start and end time
    for (const { availability, court } of data.rows) {
      if (!courtMatches(court, plan.courtType, plan.courtConfig)) continue;
      if (!availability.isAvailable) continue;

      const start = parseTime(availability.startTime);
      const span = parseTime(availability.endTime) - start;
      // A row is a bookable start for its own length only
      if (span !== plan.durationMinutes) continue;
      if (!slotFits(start, plan.durationMinutes, plan.window.start, plan.window.end)) continue;

      let entry = byCourt.get(court.id);
      if (!entry) {
        entry = {
          court: { id: court.id, name: court.name, isIndoor: court.isIndoor, isDouble: court.isDouble },
          slots: [],
        };
        byCourt.set(court.id, entry);
        courts.push(entry);
      }

      const slot: MatchedSlot = {
        id: availability.id,
        date: availability.date,
        startTime: availability.startTime,
        endTime: availability.endTime,
        durationMinutes: availability.durationMinutes,
        price: availability.price,
        currency: availability.currency,
        bookingUrl: this.bookingUrl(location, court, availability),
      };
      entry.slots.push(slot);
    }

    return {
      location: {
        id: location.id,
        name: location.name,
        slug: location.slug,
        provider: location.provider,
        city: location.city,
      },
      courts,
      cached: data.cached,
      stale: data.stale,
      cacheTimestamp: data.cacheTimestamp,
    };
  }

  private bookingUrl(location: Location, court: Court, availability: Availability): string | null {
    try {
      return this.providers.get(location.provider).bookingUrl({
        providerLocationId: location.providerLocationId,
        providerCourtId: court.providerCourtId,
        date: availability.date,
        startTime: availability.startTime,
        durationMinutes: availability.durationMinutes,
        timezone: location.timezone,
      });
    } catch (error) {
      console.warn(`[Search] No booking link for court ${court.id}: ${errorMessage(error)}`);
      return null;
    }
  }
}
