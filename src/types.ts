import type { NormalizationError } from "./errors";

// ============================================
// Internal Types
// ============================================

export const PROVIDERS = ["playtomic"] as const;
export type ProviderName = (typeof PROVIDERS)[number];

export const COURT_TYPES = ["all", "indoor", "outdoor"] as const;
export type CourtType = (typeof COURT_TYPES)[number];

export const COURT_CONFIGS = ["all", "single", "double"] as const;
export type CourtConfig = (typeof COURT_CONFIGS)[number];

/**
 * Identity handed in by the auth layer. The core never authenticates,
 * it only checks `isAdmin` for admin-only operations.
 */
export interface CurrentUser {
  id: string;
  isAdmin: boolean;
}

export interface SearchSpec {
  date: string; // YYYY-MM-DD
  windowStart: string; // HH:MM
  windowEnd: string;
  durationMinutes: number;
  courtType: CourtType;
  courtConfig: CourtConfig;
  locationIds?: number[]; // empty or missing = every known location
  liveSearch: boolean;
  forceLiveSearch: boolean;
}

export interface AvailabilityOptions {
  liveSearch: boolean;
  forceLiveSearch: boolean;
}

export interface MatchedSlot {
  id: number; // availability id
  date: string;
  startTime: string;
  endTime: string;
  durationMinutes: number;
  price: number | null;
  currency: string | null;
  bookingUrl: string | null;
}

export interface CourtMatches {
  court: {
    id: number;
    name: string;
    isIndoor: boolean;
    isDouble: boolean;
  };
  slots: MatchedSlot[];
}

export interface LocationMatches {
  location: {
    id: number;
    name: string;
    slug: string;
    provider: ProviderName;
    city: string | null;
  };
  courts: CourtMatches[];
  cached: boolean;
  stale: boolean;
  cacheTimestamp: string | null;
}

export interface FailedLocation {
  locationId: number;
  name: string;
  error: string; // error code
  message: string;
}

export interface SearchResult {
  date: string;
  locations: LocationMatches[];
  failedLocations: FailedLocation[];
  staleLocationIds: number[];
  totalSlots: number;
  cached: boolean; // every location was served from cache
  cacheTimestamp: string | null; // oldest cache timestamp used
}

export type TaskStatus = "pending" | "running" | "completed" | "failed" | "cancelled";

export interface SearchTask {
  id: string;
  userId: string;
  status: TaskStatus;
  progress: number; // 0..1
  currentStep: string;
  totalLocations: number;
  processedLocations: number;
  failedLocations: FailedLocation[];
  errorMessage: string | null;
  result: SearchResult | null;
  createdAt: string;
  startedAt: string | null;
  completedAt: string | null;
  updatedAt: string;
}

// ============================================
// Normalized Provider Data
// ============================================

export interface NormalizedSlot {
  providerCourtId: string;
  date: string;
  startTime: string;
  endTime: string;
  durationMinutes: number;
  price: number | null;
  currency: string | null;
  isAvailable: boolean;
}

export interface NormalizedAvailability {
  slots: NormalizedSlot[];
  skipped: number;
  outOfScope: number; // valid slots that fall on another local date
  errors: NormalizationError[];
}

export interface NormalizedCourt {
  providerCourtId: string;
  name: string;
  sport: string | null;
  isIndoor: boolean;
  isDouble: boolean;
}

export interface NormalizedClub {
  providerLocationId: string;
  name: string;
  timezone: string | null;
  street: string | null;
  city: string | null;
  postalCode: string | null;
  country: string | null;
  latitude: number | null;
  longitude: number | null;
  phone: string | null;
  website: string | null;
  openingHours: string | null;
  courts: NormalizedCourt[];
  skipped: number;
}

// ============================================
// Playtomic API Types
// ============================================

export interface PlaytomicSlot {
  start_time: string; // "HH:MM:SS", UTC
  duration: number; // minutes
  price: string; // "27.5 EUR"
}

export interface PlaytomicResourceAvailability {
  resource_id: string;
  start_date: string; // YYYY-MM-DD, UTC
  slots: PlaytomicSlot[];
}

export type PlaytomicAvailabilityResponse = PlaytomicResourceAvailability[];

export interface PlaytomicResource {
  resourceId: string;
  name: string;
  sport?: string;
  features?: string[];
}

export interface PlaytomicTenant {
  tenant_id: string;
  tenant_name: string;
  slug?: string;
  address?: {
    street?: string;
    city?: string;
    postal_code?: string;
    country?: string;
    timezone?: string;
    coordinate?: { lat: number; lon: number };
  };
  opening_hours?: Record<string, { opening_time: string; closing_time: string }>;
  sport_ids?: string[];
  resources?: PlaytomicResource[];
  phone?: string;
  website?: string;
}

/**
 * Raw provider payloads. Records stay `unknown` until the normalizer has
 * validated them one by one, so a single bad record never poisons a batch.
 */
export interface RawAvailabilityPayload {
  provider: ProviderName;
  records: unknown[];
}

export interface RawClubPayload {
  provider: ProviderName;
  slug: string;
  tenant: unknown;
}

// ============================================
// API Response Types
// ============================================

export interface HealthResponse {
  status: "ok" | "degraded" | "error";
  database: "ok" | "error";
  scheduler: {
    enabled: boolean;
    running: boolean;
    lastPassAt: string | null;
    consecutiveFailures: number;
  };
  tasks: number;
  inFlightFetches: number;
}

export interface ErrorResponse {
  error: string;
  message: string;
}
