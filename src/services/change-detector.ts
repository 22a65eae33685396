import type { NewNotification, NotifiedSlot } from "../db/store";
import type { SearchResult } from "../types";

export interface SeenMatches {
  availabilityIds: ReadonlySet<number>;
  slotKeys: ReadonlySet<string>;
}

type SlotIdentity = Pick<NotifiedSlot, "locationId" | "courtName" | "date" | "startTime" | "endTime">;

/**
 * Identity of a slot that survives a data refresh, when availability ids
 * are reissued
 */
export function slotKey(slot: SlotIdentity): string {
  return [slot.locationId, slot.courtName, slot.date, slot.startTime, slot.endTime].join("|");
}

export function seenMatches(notified: NotifiedSlot[]): SeenMatches {
  const availabilityIds = new Set<number>();
  const slotKeys = new Set<string>();

  for (const slot of notified) {
    if (slot.availabilityId !== null) availabilityIds.add(slot.availabilityId);
    slotKeys.add(slotKey(slot));
  }

  return { availabilityIds, slotKeys };
}

/**
 * Matches from a search order's results that have never been notified for
 * that order, by availability id or by slot snapshot. A slot seen on an
 * earlier pass, read or not, is never reported again.
 */
export function detectNewMatches(
  searchOrderId: number,
  results: SearchResult[],
  seen: SeenMatches
): NewNotification[] {
  const changes: NewNotification[] = [];
  const emitted = new Set<string>();

  for (const result of results) {
    for (const { location, courts } of result.locations) {
      for (const { court, slots } of courts) {
        for (const slot of slots) {
          const key = slotKey({
            locationId: location.id,
            courtName: court.name,
            date: slot.date,
            startTime: slot.startTime,
            endTime: slot.endTime,
          });
          if (seen.availabilityIds.has(slot.id) || seen.slotKeys.has(key) || emitted.has(key)) continue;
          emitted.add(key);

          changes.push({
            searchOrderId,
            availabilityId: slot.id,
            locationId: location.id,
            locationName: location.name,
            courtName: court.name,
            date: slot.date,
            startTime: slot.startTime,
            endTime: slot.endTime,
            price: slot.price,
            currency: slot.currency,
            bookingUrl: slot.bookingUrl,
          });
        }
      }
    }
  }

  if (changes.length > 0) {
    console.log(`[ChangeDetector] Order ${searchOrderId}: ${changes.length} new matches`);
  }

  return changes;
}
