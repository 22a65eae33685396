import { UpstreamMalformedError } from "../errors";
import { localToUtcIso, parseTime } from "../services/time-window";
import { HttpClient, playtomicApiHeaders, playtomicPageHeaders } from "./http-client";
import type { BookingTarget, CourtProvider } from "./provider";
import type { RawAvailabilityPayload, RawClubPayload } from "../types";

const API_URL = "https://playtomic.com/api/clubs/availability";
const CLUB_URL = "https://playtomic.com/clubs";
const BOOKING_URL = "https://app.playtomic.com/login";

const SPORT_ID = "PADEL";

// Club pages are Next.js; the tenant lives in the serialized page props
const NEXT_DATA_PATTERN = /<script[^>]*id="__NEXT_DATA__"[^>]*>([\s\S]*?)<\/script>/;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Pull `props.pageProps.tenant` out of a club page
 */
export function extractTenant(html: string, slug: string): unknown {
  const match = NEXT_DATA_PATTERN.exec(html);
  if (!match) {
    throw new UpstreamMalformedError(`Club page for "${slug}" has no __NEXT_DATA__ block`);
  }

  let data: unknown;
  try {
    data = JSON.parse(match[1]);
  } catch {
    throw new UpstreamMalformedError(`Club page for "${slug}" has unparseable __NEXT_DATA__`);
  }

  const props = isRecord(data) ? data.props : undefined;
  const pageProps = isRecord(props) ? props.pageProps : undefined;
  const tenant = isRecord(pageProps) ? pageProps.tenant : undefined;

  if (!isRecord(tenant)) {
    throw new UpstreamMalformedError(`Club page for "${slug}" has no tenant data`);
  }

  return tenant;
}

export class PlaytomicProvider implements CourtProvider {
  readonly name = "playtomic" as const;

  constructor(private readonly http: HttpClient) {}

  /**
   * Fetch availability for one tenant and date. Slot times in the payload are UTC.
   */
  async fetchAvailability(tenantId: string, date: string): Promise<RawAvailabilityPayload> {
    const params = new URLSearchParams({ tenant_id: tenantId, date, sport_id: SPORT_ID });
    const url = `${API_URL}?${params.toString()}`;

    const data = await this.http.getJson(url, playtomicApiHeaders);

    if (!Array.isArray(data)) {
      throw new UpstreamMalformedError(`Availability for tenant ${tenantId} is not a list`);
    }

    return { provider: this.name, records: data };
  }

  async fetchClubInfo(slug: string): Promise<RawClubPayload> {
    const url = `${CLUB_URL}/${encodeURIComponent(slug)}`;
    const html = await this.http.getText(url, playtomicPageHeaders);

    return { provider: this.name, slug, tenant: extractTenant(html, slug) };
  }

  /**
   * Deep link into Playtomic's checkout. The `start` parameter is UTC and
   * sits double-encoded inside the login return URL.
   */
  bookingUrl(target: BookingTarget): string {
    const start = localToUtcIso(target.date, parseTime(target.startTime), target.timezone);

    const returnPath =
      `/payments?type=CUSTOMER_MATCH` +
      `&tenant_id=${target.providerLocationId}` +
      `&resource_id=${target.providerCourtId}` +
      `&start=${encodeURIComponent(start)}` +
      `&duration=${target.durationMinutes}`;

    return `${BOOKING_URL}?return_url=${encodeURIComponent(returnPath)}`;
  }
}
