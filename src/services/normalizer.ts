import { z } from "zod";
import { NormalizationError, UpstreamMalformedError, errorMessage } from "../errors";
import { MINUTES_PER_DAY, formatTime, utcToLocal } from "./time-window";
import type {
  NormalizedAvailability,
  NormalizedClub,
  NormalizedCourt,
  NormalizedSlot,
  RawAvailabilityPayload,
  RawClubPayload,
} from "../types";

export interface AvailabilityContext {
  date: string; // requested local date
  timezone: string; // location timezone
}

// ============================================
// Playtomic record schemas
// ============================================

const id = z.union([z.string().min(1), z.number()]).transform(String);

const resourceAvailabilitySchema = z.object({
  resource_id: id,
  start_date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  slots: z.array(z.unknown()),
});

const slotSchema = z.object({
  start_time: z.string().regex(/^\d{2}:\d{2}(:\d{2})?$/),
  duration: z.number().int().positive(),
  price: z.union([z.string(), z.number()]).nullish(),
});

const resourceSchema = z.object({
  resourceId: id,
  name: z.string().min(1),
  sport: z.string().optional(),
  features: z.array(z.string()).optional(),
});

const tenantSchema = z.object({
  tenant_id: id,
  tenant_name: z.string().min(1),
  address: z
    .object({
      street: z.string().nullish(),
      city: z.string().nullish(),
      postal_code: z.string().nullish(),
      country: z.string().nullish(),
      timezone: z.string().nullish(),
      coordinate: z.object({ lat: z.number(), lon: z.number() }).nullish(),
    })
    .nullish(),
  opening_hours: z.record(z.unknown()).nullish(),
  resources: z.array(z.unknown()).nullish(),
  phone: z.string().nullish(),
  website: z.string().nullish(),
});

/**
 * Court flags per Playtomic feature tag. Tags not listed here are ignored;
 * a court with no indoor/outdoor tag is outdoor and one with no
 * double/single tag is single.
 */
export const COURT_FEATURE_MAP: Record<string, Partial<Pick<NormalizedCourt, "isIndoor" | "isDouble">>> = {
  indoor: { isIndoor: true },
  outdoor: { isIndoor: false },
  roofed_outdoor: { isIndoor: false },
  double: { isDouble: true },
  single: { isDouble: false },
};

const PADEL = "PADEL";

function describeIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  return issue ? `${issue.path.join(".") || "record"}: ${issue.message}` : "invalid record";
}

/**
 * "27.5 EUR" -> { price: 27.5, currency: "EUR" }. Bare numbers carry no currency.
 */
export function parsePrice(value: string | number | null | undefined): {
  price: number | null;
  currency: string | null;
} {
  if (value === null || value === undefined) {
    return { price: null, currency: null };
  }
  if (typeof value === "number") {
    if (!Number.isFinite(value) || value < 0) {
      throw new Error(`Invalid price ${value}`);
    }
    return { price: value, currency: null };
  }

  const match = /^\s*(\d+(?:\.\d+)?)\s*([A-Za-z]{3})?\s*$/.exec(value);
  if (!match) {
    throw new Error(`Invalid price "${value}"`);
  }
  return { price: Number(match[1]), currency: match[2] ? match[2].toUpperCase() : null };
}

// ============================================
// Availability
// ============================================

function normalizePlaytomicAvailability(
  records: unknown[],
  context: AvailabilityContext
): NormalizedAvailability {
  const result: NormalizedAvailability = { slots: [], skipped: 0, outOfScope: 0, errors: [] };

  const skip = (message: string, record: unknown): void => {
    result.skipped++;
    result.errors.push(new NormalizationError(message, record));
  };

  for (const record of records) {
    const resource = resourceAvailabilitySchema.safeParse(record);
    if (!resource.success) {
      skip(`Malformed resource: ${describeIssue(resource.error)}`, record);
      continue;
    }

    const { resource_id: providerCourtId, start_date: utcDate } = resource.data;

    for (const rawSlot of resource.data.slots) {
      const slot = slotSchema.safeParse(rawSlot);
      if (!slot.success) {
        skip(`Malformed slot on court ${providerCourtId}: ${describeIssue(slot.error)}`, rawSlot);
        continue;
      }

      let converted: { price: ReturnType<typeof parsePrice>; local: { date: string; minutes: number } };
      try {
        converted = {
          price: parsePrice(slot.data.price),
          local: utcToLocal(utcDate, slot.data.start_time, context.timezone),
        };
      } catch (error) {
        skip(`Slot on court ${providerCourtId}: ${errorMessage(error)}`, rawSlot);
        continue;
      }

      const { price, local } = converted;
      const end = local.minutes + slot.data.duration;
      if (end > MINUTES_PER_DAY) {
        skip(`Slot on court ${providerCourtId} at ${formatTime(local.minutes)} crosses midnight`, rawSlot);
        continue;
      }

      if (local.date !== context.date) {
        result.outOfScope++;
        continue;
      }

      const normalized: NormalizedSlot = {
        providerCourtId,
        date: local.date,
        startTime: formatTime(local.minutes),
        endTime: formatTime(end),
        durationMinutes: slot.data.duration,
        price: price.price,
        currency: price.currency,
        isAvailable: true, // Playtomic only lists bookable slots
      };
      result.slots.push(normalized);
    }
  }

  return result;
}

/**
 * Turn a raw availability payload into local wall-clock slots for
 * `context.date`. Bad records are skipped and collected, never thrown.
 */
export function normalizeAvailability(
  raw: RawAvailabilityPayload,
  context: AvailabilityContext
): NormalizedAvailability {
  switch (raw.provider) {
    case "playtomic":
      return normalizePlaytomicAvailability(raw.records, context);
  }
}

// ============================================
// Club info
// ============================================

export function courtFlags(features: string[] = []): Pick<NormalizedCourt, "isIndoor" | "isDouble"> {
  const flags = { isIndoor: false, isDouble: false };
  for (const feature of features) {
    Object.assign(flags, COURT_FEATURE_MAP[feature.toLowerCase()] ?? {});
  }
  return flags;
}

function normalizePlaytomicClub(raw: RawClubPayload): NormalizedClub {
  const tenant = tenantSchema.safeParse(raw.tenant);
  if (!tenant.success) {
    throw new UpstreamMalformedError(`Club "${raw.slug}": ${describeIssue(tenant.error)}`);
  }

  const data = tenant.data;
  const courts: NormalizedCourt[] = [];
  let skipped = 0;

  for (const record of data.resources ?? []) {
    const resource = resourceSchema.safeParse(record);
    if (!resource.success) {
      skipped++;
      console.warn(`[Normalizer] Skipping court of "${raw.slug}": ${describeIssue(resource.error)}`);
      continue;
    }

    const { resourceId, name, sport, features } = resource.data;
    if (sport !== undefined && sport.toUpperCase() !== PADEL) continue;

    courts.push({
      providerCourtId: resourceId,
      name,
      sport: sport ?? null,
      ...courtFlags(features),
    });
  }

  return {
    providerLocationId: data.tenant_id,
    name: data.tenant_name,
    timezone: data.address?.timezone ?? null,
    street: data.address?.street ?? null,
    city: data.address?.city ?? null,
    postalCode: data.address?.postal_code ?? null,
    country: data.address?.country ?? null,
    latitude: data.address?.coordinate?.lat ?? null,
    longitude: data.address?.coordinate?.lon ?? null,
    phone: data.phone ?? null,
    website: data.website ?? null,
    openingHours: data.opening_hours ? JSON.stringify(data.opening_hours) : null,
    courts,
    skipped,
  };
}

export function normalizeClub(raw: RawClubPayload): NormalizedClub {
  switch (raw.provider) {
    case "playtomic":
      return normalizePlaytomicClub(raw);
  }
}
