import { z } from "zod";
import type { Context } from "hono";
import { jsonError } from "../middleware/auth";
import { COURT_CONFIGS, COURT_TYPES, PROVIDERS } from "../types";

// ============================================
// Request schemas
// ============================================

const date = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "Date must be in YYYY-MM-DD format");
const time = z.string().regex(/^\d{1,2}:\d{2}$/, "Time must be in HH:MM format");
const duration = z.number().int().positive();

export const searchRequestSchema = z.object({
  date,
  windowStart: time,
  windowEnd: time,
  durationMinutes: duration,
  courtType: z.enum(COURT_TYPES).default("all"),
  courtConfig: z.enum(COURT_CONFIGS).default("all"),
  locationIds: z.array(z.number().int().positive()).optional(),
  liveSearch: z.boolean().default(true),
  forceLiveSearch: z.boolean().default(false),
});

export const addLocationSchema = z.object({
  provider: z.enum(PROVIDERS).default("playtomic"),
  slug: z.string().min(1).max(200),
});

export const createSearchOrderSchema = z.object({
  locationIds: z.array(z.number().int().positive()).min(1, "At least one location is required"),
  date,
  endDate: date.nullish(),
  startTime: time,
  endTime: time,
  durationMinutes: duration,
  courtType: z.enum(COURT_TYPES).default("all"),
  courtConfig: z.enum(COURT_CONFIGS).default("all"),
  notifyEmail: z.string().email().nullish(),
});

export const updateSearchOrderSchema = z.object({
  locationIds: z.array(z.number().int().positive()).min(1).optional(),
  date: date.optional(),
  endDate: date.nullish(),
  startTime: time.optional(),
  endTime: time.optional(),
  durationMinutes: duration.optional(),
  courtType: z.enum(COURT_TYPES).optional(),
  courtConfig: z.enum(COURT_CONFIGS).optional(),
  notifyEmail: z.string().email().nullish(),
  isActive: z.boolean().optional(),
});

export const clearCacheSchema = z.object({
  olderThanMinutes: z.number().int().min(0).optional(),
});

// ============================================
// Helpers
// ============================================

/**
 * Parse and validate a JSON body. An empty body counts as `{}`.
 */
export async function readJson<S extends z.ZodTypeAny>(c: Context, schema: S): Promise<z.infer<S>> {
  let body: unknown = {};
  try {
    const text = await c.req.text();
    if (text) {
      body = JSON.parse(text);
    }
  } catch {
    throw jsonError(400, "INVALID_JSON", "Request body must be valid JSON");
  }

  const parseResult = schema.safeParse(body);
  if (!parseResult.success) {
    const firstIssue = parseResult.error.issues[0];
    const errorField = firstIssue?.path.join(".") || "body";
    throw jsonError(400, "INVALID_REQUEST", `${errorField}: ${firstIssue?.message ?? "Invalid request"}`);
  }

  return parseResult.data;
}

export function idParam(c: Context, name: string): number {
  const value = Number(c.req.param(name));
  if (!Number.isInteger(value) || value <= 0) {
    throw jsonError(400, "INVALID_REQUEST", `${name}: must be a positive integer`);
  }
  return value;
}
