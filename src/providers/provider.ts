import { UnknownProviderError } from "../errors";
import type { ProviderName, RawAvailabilityPayload, RawClubPayload } from "../types";

/**
 * What a booking link needs to point at one slot
 */
export interface BookingTarget {
  providerLocationId: string;
  providerCourtId: string;
  date: string; // local
  startTime: string; // HH:MM, local
  durationMinutes: number;
  timezone: string;
}

/**
 * A booking platform. Implementations are stateless and never retry:
 * failures surface as UpstreamUnavailable / UpstreamRejected / UpstreamMalformed.
 */
export interface CourtProvider {
  readonly name: ProviderName;
  fetchAvailability(providerLocationId: string, date: string): Promise<RawAvailabilityPayload>;
  fetchClubInfo(slug: string): Promise<RawClubPayload>;
  bookingUrl(target: BookingTarget): string;
}

/**
 * Closed set of providers, looked up by the tag stored on each location
 */
export class ProviderRegistry {
  private readonly providers = new Map<string, CourtProvider>();

  constructor(providers: CourtProvider[]) {
    for (const provider of providers) {
      this.providers.set(provider.name, provider);
    }
  }

  get(name: string): CourtProvider {
    const provider = this.providers.get(name);
    if (!provider) {
      throw new UnknownProviderError(name);
    }
    return provider;
  }

  has(name: string): boolean {
    return this.providers.has(name);
  }
}
