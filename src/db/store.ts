import { and, asc, eq, inArray, lt, notInArray, sql } from "drizzle-orm";
import { CacheWriteConflictError } from "../errors";
import {
  availabilities,
  cacheEntries,
  courts,
  locations,
  searchOrderLocations,
  searchOrderNotifications,
  searchOrders,
} from "./schema";
import type { DB } from "./client";
import type {
  Availability,
  CacheEntry,
  Court,
  Location,
  SearchOrderNotification,
  SearchOrderRow,
} from "./schema";
import type { NormalizedClub, NormalizedSlot, ProviderName } from "../types";

export interface SearchOrder extends SearchOrderRow {
  locationIds: number[]; // in the order the user gave them
}

export type SearchOrderFields = Pick<
  SearchOrderRow,
  | "date"
  | "endDate"
  | "startTime"
  | "endTime"
  | "durationMinutes"
  | "courtType"
  | "courtConfig"
  | "notifyEmail"
>;

export type SearchOrderPatch = Partial<SearchOrderFields & Pick<SearchOrderRow, "isActive">>;

export type NewNotification = Omit<
  SearchOrderNotification,
  "id" | "notified" | "notifiedAt" | "read" | "createdAt"
>;

export type NotifiedSlot = Pick<
  SearchOrderNotification,
  "availabilityId" | "locationId" | "courtName" | "date" | "startTime" | "endTime"
>;

export interface AvailabilityWithCourt {
  availability: Availability;
  court: Court;
}

export interface ReplaceAvailabilityResult {
  inserted: number;
  updated: number;
  markedUnavailable: number;
  cacheEntry: CacheEntry;
}

function isUniqueViolation(error: unknown): boolean {
  let current = error;
  while (current instanceof Error) {
    if ("code" in current && current.code === "SQLITE_CONSTRAINT_UNIQUE") return true;
    current = current.cause;
  }
  return false;
}

function slotKey(courtId: number, date: string, startTime: string, endTime: string): string {
  return `${courtId}|${date}|${startTime}|${endTime}`;
}

/**
 * Relational store. better-sqlite3 is synchronous, so every method here is
 * too; multi-statement writes run in a single transaction.
 */
export class Store {
  constructor(private readonly db: DB) {}

  // ============================================
  // Locations & courts
  // ============================================

  listLocations(): Location[] {
    return this.db.select().from(locations).orderBy(asc(locations.id)).all();
  }

  getLocation(id: number): Location | undefined {
    return this.db.select().from(locations).where(eq(locations.id, id)).get();
  }

  findLocationBySlug(provider: ProviderName, slug: string): Location | undefined {
    return this.db
      .select()
      .from(locations)
      .where(and(eq(locations.provider, provider), eq(locations.slug, slug)))
      .get();
  }

  /**
   * Insert or update a location and its courts from club info. Courts
   * missing from `club` are left alone: their availability history stays.
   */
  upsertLocationWithCourts(
    provider: ProviderName,
    slug: string,
    club: NormalizedClub,
    timezone: string
  ): { location: Location; courts: Court[] } {
    const now = new Date().toISOString();
    const fields = {
      providerLocationId: club.providerLocationId,
      name: club.name,
      timezone,
      street: club.street,
      city: club.city,
      postalCode: club.postalCode,
      country: club.country,
      latitude: club.latitude,
      longitude: club.longitude,
      phone: club.phone,
      website: club.website,
      openingHours: club.openingHours,
      updatedAt: now,
    };

    return this.db.transaction((tx) => {
      const location = tx
        .insert(locations)
        .values({ provider, slug, createdAt: now, ...fields })
        .onConflictDoUpdate({ target: [locations.provider, locations.slug], set: fields })
        .returning()
        .get();

      for (const court of club.courts) {
        const courtFields = {
          name: court.name,
          sport: court.sport,
          isIndoor: court.isIndoor,
          isDouble: court.isDouble,
        };
        tx.insert(courts)
          .values({ locationId: location.id, providerCourtId: court.providerCourtId, ...courtFields })
          .onConflictDoUpdate({ target: [courts.locationId, courts.providerCourtId], set: courtFields })
          .run();
      }

      const saved = tx
        .select()
        .from(courts)
        .where(eq(courts.locationId, location.id))
        .orderBy(asc(courts.id))
        .all();

      return { location, courts: saved };
    });
  }

  deleteLocation(id: number): boolean {
    return this.db.delete(locations).where(eq(locations.id, id)).run().changes > 0;
  }

  listCourts(locationId: number): Court[] {
    return this.db
      .select()
      .from(courts)
      .where(eq(courts.locationId, locationId))
      .orderBy(asc(courts.id))
      .all();
  }

  /**
   * Drop every court (and with them every availability row) and every
   * cache entry. Locations survive so they can be re-fetched by slug.
   */
  clearProviderData(): { courts: number; availabilities: number; cacheEntries: number } {
    return this.db.transaction((tx) => {
      const availabilityCount = tx.delete(availabilities).run().changes;
      const cacheEntryCount = tx.delete(cacheEntries).run().changes;
      const courtCount = tx.delete(courts).run().changes;
      return { courts: courtCount, availabilities: availabilityCount, cacheEntries: cacheEntryCount };
    });
  }

  // ============================================
  // Availability & cache entries
  // ============================================

  /**
   * Replace the (location, date) scope with a freshly fetched batch, in one
   * transaction. Same (court, date, start, end) updates in place; rows of the
   * scope missing from the batch are marked unavailable. Courts the
   * provider reports but we have never seen are created with their provider
   * id as name.
   */
  replaceAvailability(
    locationId: number,
    date: string,
    slots: NormalizedSlot[],
    fetchedAt: string,
    skippedCount: number
  ): ReplaceAvailabilityResult {
    try {
      return this.db.transaction((tx) => {
        const courtIds = new Map<string, number>();
        for (const court of tx.select().from(courts).where(eq(courts.locationId, locationId)).all()) {
          courtIds.set(court.providerCourtId, court.id);
        }

        const resolveCourt = (providerCourtId: string): number => {
          const known = courtIds.get(providerCourtId);
          if (known !== undefined) return known;

          const created = tx
            .insert(courts)
            .values({ locationId, providerCourtId, name: providerCourtId })
            .returning()
            .get();
          console.log(`[Store] Created unknown court ${providerCourtId} for location ${locationId}`);
          courtIds.set(providerCourtId, created.id);
          return created.id;
        };

        const scopeCourtIds = (): number[] => [...courtIds.values()];

        const existing = new Set<string>();
        if (courtIds.size > 0) {
          const rows = tx
            .select()
            .from(availabilities)
            .where(and(inArray(availabilities.courtId, scopeCourtIds()), eq(availabilities.date, date)))
            .all();
          for (const row of rows) {
            existing.add(slotKey(row.courtId, row.date, row.startTime, row.endTime));
          }
        }

        const touched = new Set<number>();
        let inserted = 0;
        let updated = 0;

        for (const slot of slots) {
          const courtId = resolveCourt(slot.providerCourtId);
          const values = {
            durationMinutes: slot.durationMinutes,
            price: slot.price,
            currency: slot.currency,
            isAvailable: slot.isAvailable,
            fetchedAt,
          };

          const row = tx
            .insert(availabilities)
            .values({ courtId, date, startTime: slot.startTime, endTime: slot.endTime, ...values })
            .onConflictDoUpdate({
              target: [
                availabilities.courtId,
                availabilities.date,
                availabilities.startTime,
                availabilities.endTime,
              ],
              set: values,
            })
            .returning()
            .get();

          const key = slotKey(courtId, date, slot.startTime, slot.endTime);
          if (existing.has(key)) {
            updated++;
          } else {
            inserted++;
            existing.add(key);
          }
          touched.add(row.id);
        }

        let markedUnavailable = 0;
        if (courtIds.size > 0) {
          const inScope = and(
            inArray(availabilities.courtId, scopeCourtIds()),
            eq(availabilities.date, date),
            eq(availabilities.isAvailable, true)
          );
          markedUnavailable = tx
            .update(availabilities)
            .set({ isAvailable: false, fetchedAt })
            .where(touched.size > 0 ? and(inScope, notInArray(availabilities.id, [...touched])) : inScope)
            .run().changes;
        }

        const entry = { fetchedAt, slotCount: slots.length, skippedCount };
        const cacheEntry = tx
          .insert(cacheEntries)
          .values({ locationId, date, ...entry })
          .onConflictDoUpdate({ target: [cacheEntries.locationId, cacheEntries.date], set: entry })
          .returning()
          .get();

        return { inserted, updated, markedUnavailable, cacheEntry };
      });
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new CacheWriteConflictError(
          `Unique constraint violated while storing location ${locationId} on ${date}`,
          { cause: error }
        );
      }
      throw error;
    }
  }

  /**
   * All stored rows for a (location, date), available or not, ordered by
   * court id then start and end time
   */
  listAvailability(locationId: number, date: string): AvailabilityWithCourt[] {
    return this.db
      .select({ availability: availabilities, court: courts })
      .from(availabilities)
      .innerJoin(courts, eq(availabilities.courtId, courts.id))
      .where(and(eq(courts.locationId, locationId), eq(availabilities.date, date)))
      .orderBy(asc(courts.id), asc(availabilities.startTime), asc(availabilities.endTime))
      .all();
  }

  getCacheEntry(locationId: number, date: string): CacheEntry | undefined {
    return this.db
      .select()
      .from(cacheEntries)
      .where(and(eq(cacheEntries.locationId, locationId), eq(cacheEntries.date, date)))
      .get();
  }

  /**
   * Drop cache entries fetched before `fetchedBefore` (all when omitted).
   * Availability rows are kept.
   */
  deleteCacheEntries(fetchedBefore?: string): number {
    const query = this.db.delete(cacheEntries);
    const result = fetchedBefore
      ? query.where(lt(cacheEntries.fetchedAt, fetchedBefore)).run()
      : query.run();
    return result.changes;
  }

  // ============================================
  // Search orders
  // ============================================

  private withLocations(row: SearchOrderRow): SearchOrder {
    const links = this.db
      .select()
      .from(searchOrderLocations)
      .where(eq(searchOrderLocations.searchOrderId, row.id))
      .orderBy(asc(searchOrderLocations.position))
      .all();
    return { ...row, locationIds: links.map((link) => link.locationId) };
  }

  createSearchOrder(userId: string, fields: SearchOrderFields, locationIds: number[]): SearchOrder {
    const now = new Date().toISOString();

    const row = this.db.transaction((tx) => {
      const created = tx
        .insert(searchOrders)
        .values({ userId, ...fields, isActive: true, createdAt: now, updatedAt: now })
        .returning()
        .get();

      locationIds.forEach((locationId, position) => {
        tx.insert(searchOrderLocations).values({ searchOrderId: created.id, locationId, position }).run();
      });

      return created;
    });

    return this.withLocations(row);
  }

  getSearchOrder(id: number): SearchOrder | undefined {
    const row = this.db.select().from(searchOrders).where(eq(searchOrders.id, id)).get();
    return row ? this.withLocations(row) : undefined;
  }

  listSearchOrders(userId: string): SearchOrder[] {
    return this.db
      .select()
      .from(searchOrders)
      .where(eq(searchOrders.userId, userId))
      .orderBy(asc(searchOrders.id))
      .all()
      .map((row) => this.withLocations(row));
  }

  listActiveSearchOrders(): SearchOrder[] {
    return this.db
      .select()
      .from(searchOrders)
      .where(eq(searchOrders.isActive, true))
      .orderBy(asc(searchOrders.id))
      .all()
      .map((row) => this.withLocations(row));
  }

  updateSearchOrder(id: number, patch: SearchOrderPatch, locationIds?: number[]): SearchOrder | undefined {
    const now = new Date().toISOString();

    const row = this.db.transaction((tx) => {
      const updated = tx
        .update(searchOrders)
        .set({ ...patch, updatedAt: now })
        .where(eq(searchOrders.id, id))
        .returning()
        .get();
      if (!updated) return undefined;

      if (locationIds) {
        tx.delete(searchOrderLocations).where(eq(searchOrderLocations.searchOrderId, id)).run();
        locationIds.forEach((locationId, position) => {
          tx.insert(searchOrderLocations).values({ searchOrderId: id, locationId, position }).run();
        });
      }

      return updated;
    });

    return row ? this.withLocations(row) : undefined;
  }

  deleteSearchOrder(id: number): boolean {
    return this.db.delete(searchOrders).where(eq(searchOrders.id, id)).run().changes > 0;
  }

  markSearchOrderChecked(id: number, checkedAt: string): void {
    this.db.update(searchOrders).set({ lastCheckedAt: checkedAt }).where(eq(searchOrders.id, id)).run();
  }

  // ============================================
  // Notifications
  // ============================================

  /**
   * Every slot already recorded for an order, with its snapshot. The
   * availability id is null for rows removed by a data refresh.
   */
  listNotifiedSlots(searchOrderId: number): NotifiedSlot[] {
    return this.db
      .select({
        availabilityId: searchOrderNotifications.availabilityId,
        locationId: searchOrderNotifications.locationId,
        courtName: searchOrderNotifications.courtName,
        date: searchOrderNotifications.date,
        startTime: searchOrderNotifications.startTime,
        endTime: searchOrderNotifications.endTime,
      })
      .from(searchOrderNotifications)
      .where(eq(searchOrderNotifications.searchOrderId, searchOrderId))
      .all();
  }

  /**
   * Insert notifications, ignoring any (order, availability) pair that is
   * already recorded. Returns only the rows actually inserted.
   */
  insertNotifications(rows: NewNotification[]): SearchOrderNotification[] {
    if (rows.length === 0) return [];
    const now = new Date().toISOString();

    return this.db.transaction((tx) =>
      rows.flatMap((row) =>
        tx
          .insert(searchOrderNotifications)
          .values({ ...row, createdAt: now })
          .onConflictDoNothing()
          .returning()
          .all()
      )
    );
  }

  listNotifications(searchOrderId: number): SearchOrderNotification[] {
    return this.db
      .select()
      .from(searchOrderNotifications)
      .where(eq(searchOrderNotifications.searchOrderId, searchOrderId))
      .orderBy(asc(searchOrderNotifications.id))
      .all();
  }

  markNotificationRead(searchOrderId: number, notificationId: number): SearchOrderNotification | undefined {
    return this.db
      .update(searchOrderNotifications)
      .set({ read: true })
      .where(
        and(
          eq(searchOrderNotifications.id, notificationId),
          eq(searchOrderNotifications.searchOrderId, searchOrderId)
        )
      )
      .returning()
      .get();
  }

  markNotified(notificationIds: number[], notifiedAt: string): number {
    if (notificationIds.length === 0) return 0;
    return this.db
      .update(searchOrderNotifications)
      .set({ notified: true, notifiedAt })
      .where(inArray(searchOrderNotifications.id, notificationIds))
      .run().changes;
  }

  /**
   * Liveness probe for /health; throws when the database is unusable
   */
  ping(): void {
    this.db.run(sql`select 1`);
  }
}
