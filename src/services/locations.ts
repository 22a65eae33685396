import { LocationNotFoundError } from "../errors";
import { assertAdmin } from "./access";
import { normalizeClub } from "./normalizer";
import type { ProviderRegistry } from "../providers/provider";
import type { Store } from "../db/store";
import type { Court, Location } from "../db/schema";
import type { CurrentUser } from "../types";

export interface LocationWithCourts {
  location: Location;
  courts: Court[];
}

export interface LocationServiceOptions {
  timezone: string; // used when the provider reports none
}

export class LocationService {
  constructor(
    private readonly store: Store,
    private readonly providers: ProviderRegistry,
    private readonly options: LocationServiceOptions
  ) {}

  /**
   * Register a club by its provider slug, or refresh it if already known.
   * The location keeps its id across refreshes.
   */
  async addBySlug(providerName: string, slug: string): Promise<LocationWithCourts> {
    const provider = this.providers.get(providerName);
    const raw = await provider.fetchClubInfo(slug);
    const club = normalizeClub(raw);

    const saved = this.store.upsertLocationWithCourts(
      provider.name,
      slug,
      club,
      club.timezone ?? this.options.timezone
    );

    console.log(
      `[Locations] ${saved.location.name} (${provider.name}/${slug}): ${saved.courts.length} courts` +
        (club.skipped > 0 ? `, ${club.skipped} malformed skipped` : "")
    );
    return saved;
  }

  list(): Location[] {
    return this.store.listLocations();
  }

  get(id: number): Location {
    const location = this.store.getLocation(id);
    if (!location) {
      throw new LocationNotFoundError(id);
    }
    return location;
  }

  courts(id: number): Court[] {
    this.get(id);
    return this.store.listCourts(id);
  }

  delete(id: number, user: CurrentUser): void {
    assertAdmin(user, "delete locations");
    if (!this.store.deleteLocation(id)) {
      throw new LocationNotFoundError(id);
    }
    console.log(`[Locations] Deleted location ${id}`);
  }
}
