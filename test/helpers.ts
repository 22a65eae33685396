import type { Transporter } from "nodemailer";
import { defaultConfig } from "../src/config";
import type { Config } from "../src/config";
import { openDatabase } from "../src/db/client";
import type { DatabaseHandle } from "../src/db/client";
import { UpstreamRejectedError } from "../src/errors";
import { createServices } from "../src/services";
import type { Services } from "../src/services";
import type { BookingTarget, CourtProvider } from "../src/providers/provider";
import type { Court, Location } from "../src/db/schema";
import type { NormalizedClub, NormalizedSlot, RawAvailabilityPayload, RawClubPayload } from "../src/types";

export const DATE = "2025-11-16";
export const TZ = "Europe/Amsterdam";
export const START = new Date("2025-11-16T08:00:00.000Z"); // 09:00 in Amsterdam

export class Clock {
  current: Date;

  constructor(start: Date = START) {
    this.current = new Date(start.getTime());
  }

  now = (): Date => new Date(this.current.getTime());

  advanceMinutes(minutes: number): void {
    this.current = new Date(this.current.getTime() + minutes * 60 * 1000);
  }
}

/**
 * In-process stand-in for a booking platform
 */
export class FakeProvider implements CourtProvider {
  readonly name = "playtomic" as const;
  availabilityCalls = 0;
  clubCalls = 0;

  private readonly availability = new Map<string, unknown[]>();
  private readonly clubs = new Map<string, unknown>();
  private readonly failures = new Map<string, Error>();
  private gate: Promise<void> | null = null;
  private releaseGate: (() => void) | null = null;

  setAvailability(tenantId: string, date: string, records: unknown[]): void {
    this.availability.set(`${tenantId}|${date}`, records);
  }

  setClub(slug: string, tenant: unknown): void {
    this.clubs.set(slug, tenant);
  }

  /** Fail every fetch for a tenant, or only those for one date */
  failFor(tenantId: string, error: Error, date?: string): void {
    this.failures.set(date ? `${tenantId}|${date}` : tenantId, error);
  }

  clearFailure(tenantId: string, date?: string): void {
    this.failures.delete(date ? `${tenantId}|${date}` : tenantId);
  }

  /** Make every fetchAvailability call wait until release() */
  hold(): void {
    this.gate = new Promise((resolve) => {
      this.releaseGate = () => resolve();
    });
  }

  release(): void {
    this.releaseGate?.();
    this.gate = null;
    this.releaseGate = null;
  }

  async fetchAvailability(tenantId: string, date: string): Promise<RawAvailabilityPayload> {
    this.availabilityCalls++;
    if (this.gate) await this.gate;

    const failure = this.failures.get(`${tenantId}|${date}`) ?? this.failures.get(tenantId);
    if (failure) throw failure;

    return { provider: this.name, records: this.availability.get(`${tenantId}|${date}`) ?? [] };
  }

  async fetchClubInfo(slug: string): Promise<RawClubPayload> {
    this.clubCalls++;
    const tenant = this.clubs.get(slug);
    if (tenant === undefined) {
      throw new UpstreamRejectedError(`No club ${slug}`, 404);
    }
    return { provider: this.name, slug, tenant };
  }

  bookingUrl(target: BookingTarget): string {
    return `https://book.test/${target.providerLocationId}/${target.providerCourtId}?start=${target.date}T${target.startTime}&duration=${target.durationMinutes}`;
  }
}

export interface TestContext {
  config: Config;
  handle: DatabaseHandle;
  services: Services;
  provider: FakeProvider;
  clock: Clock;
}

export function testConfig(overrides: Partial<Config> = {}): Config {
  const base = defaultConfig();
  return {
    ...base,
    nodeEnv: "test",
    timezone: TZ,
    databasePath: ":memory:",
    cache: { ...base.cache, retryDelayMs: 0 },
    scheduler: { ...base.scheduler, enabled: false },
    ...overrides,
  };
}

export function setup(
  options: { config?: Partial<Config>; transporter?: Transporter | null; clock?: Clock } = {}
): TestContext {
  const config = testConfig(options.config);
  const handle = openDatabase(":memory:");
  const provider = new FakeProvider();
  const clock = options.clock ?? new Clock();
  const services = createServices(config, handle.db, {
    providers: [provider],
    transporter: options.transporter ?? null,
    now: clock.now,
  });

  return { config, handle, services, provider, clock };
}

// ============================================
// Fixtures
// ============================================

export interface CourtFixture {
  id: string;
  name: string;
  isIndoor: boolean;
  isDouble: boolean;
}

export const COURT_1: CourtFixture = { id: "c1", name: "Court 1", isIndoor: true, isDouble: true };
export const COURT_2: CourtFixture = { id: "c2", name: "Court 2", isIndoor: false, isDouble: false };

export function club(tenantId: string, name: string, courts: CourtFixture[]): NormalizedClub {
  return {
    providerLocationId: tenantId,
    name,
    timezone: TZ,
    street: "Teststraat 1",
    city: "Utrecht",
    postalCode: "1234 AB",
    country: "NL",
    latitude: 52.09,
    longitude: 5.12,
    phone: null,
    website: null,
    openingHours: null,
    courts: courts.map((court) => ({
      providerCourtId: court.id,
      name: court.name,
      sport: "PADEL",
      isIndoor: court.isIndoor,
      isDouble: court.isDouble,
    })),
    skipped: 0,
  };
}

export function seedLocation(
  services: Services,
  slug: string,
  tenantId: string,
  courts: CourtFixture[] = [COURT_1, COURT_2]
): { location: Location; courts: Court[] } {
  return services.store.upsertLocationWithCourts("playtomic", slug, club(tenantId, `Club ${slug}`, courts), TZ);
}

export function slot(
  providerCourtId: string,
  startTime: string,
  endTime: string,
  durationMinutes: number,
  overrides: Partial<NormalizedSlot> = {}
): NormalizedSlot {
  return {
    providerCourtId,
    date: DATE,
    startTime,
    endTime,
    durationMinutes,
    price: 30,
    currency: "EUR",
    isAvailable: true,
    ...overrides,
  };
}

/** C1 18:00-19:30 and C2 17:00-18:00 local, as the platform reports them (UTC) */
export function scenarioRecords(): unknown[] {
  return [
    {
      resource_id: "c1",
      start_date: DATE,
      slots: [{ start_time: "17:00:00", duration: 90, price: "36 EUR" }],
    },
    {
      resource_id: "c2",
      start_date: DATE,
      slots: [{ start_time: "16:00:00", duration: 60, price: "20 EUR" }],
    },
  ];
}

export const tick = (): Promise<void> => new Promise((resolve) => setImmediate(resolve));
