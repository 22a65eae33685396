import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { z } from "zod";
import { createApp } from "../src/app";
import { DATE, TZ, scenarioRecords, seedLocation, setup } from "./helpers";
import type { TestContext } from "./helpers";

const API_KEY = "test-secret";

const TENANT = {
  tenant_id: "t-1",
  tenant_name: "Padel Utrecht",
  address: { city: "Utrecht", timezone: TZ },
  resources: [
    { resourceId: "c1", name: "Court 1", sport: "PADEL", features: ["indoor", "double"] },
    { resourceId: "c2", name: "Court 2", sport: "PADEL", features: ["outdoor"] },
  ],
};

const SEARCH = {
  date: DATE,
  windowStart: "17:00",
  windowEnd: "21:00",
  durationMinutes: 90,
};

const withId = z.object({ id: z.number() });
const locationBody = z.object({ location: withId });

interface RequestOptions {
  body?: unknown;
  rawBody?: string;
  user?: string;
  admin?: boolean;
  apiKey?: string | null;
}

describe("API", () => {
  let ctx: TestContext;
  let app: ReturnType<typeof createApp>;

  const call = (method: string, path: string, options: RequestOptions = {}) => {
    const headers: Record<string, string> = { "Content-Type": "application/json" };
    const apiKey = options.apiKey === undefined ? API_KEY : options.apiKey;
    if (apiKey !== null) headers["X-API-Key"] = apiKey;
    if (options.user) headers["X-User-Id"] = options.user;
    if (options.admin) headers["X-User-Admin"] = "true";

    const body = options.rawBody ?? (options.body === undefined ? undefined : JSON.stringify(options.body));
    return app.request(path, { method, headers, body });
  };

  beforeEach(() => {
    ctx = setup({ config: { apiKey: API_KEY } });
    app = createApp(ctx.config, ctx.services);
    ctx.provider.setClub("padel-utrecht", TENANT);
    ctx.provider.setAvailability("t-1", DATE, scenarioRecords());
  });

  afterEach(() => {
    ctx.handle.close();
  });

  describe("GET /health", () => {
    it("should report status without an API key", async () => {
      const res = await call("GET", "/health", { apiKey: null });

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        status: "ok",
        database: "ok",
        scheduler: { enabled: false, running: false, lastPassAt: null, consecutiveFailures: 0 },
        tasks: 0,
        inFlightFetches: 0,
      });
    });
  });

  describe("authentication", () => {
    it("should reject requests without the API key", async () => {
      const res = await call("GET", "/locations", { apiKey: null });

      expect(res.status).toBe(401);
      expect(await res.json()).toEqual({ error: "UNAUTHORIZED", message: "Invalid or missing API key" });
    });

    it("should require a user for user-scoped routes", async () => {
      const res = await call("POST", "/search", { body: SEARCH });

      expect(res.status).toBe(401);
      expect(await res.json()).toEqual({ error: "UNAUTHORIZED", message: "X-User-Id header is required" });
    });

    it("should answer unknown routes with 404", async () => {
      const res = await call("GET", "/nope");

      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({ error: "NOT_FOUND", message: "Route GET /nope not found" });
    });
  });

  describe("/locations", () => {
    it("should add a location by slug and list its courts", async () => {
      const created = await call("POST", "/locations", { body: { slug: "padel-utrecht" }, user: "user-1" });
      expect(created.status).toBe(201);
      const body: unknown = await created.json();
      expect(body).toMatchObject({
        location: { name: "Padel Utrecht", provider: "playtomic", slug: "padel-utrecht", timezone: TZ },
      });
      const { location } = locationBody.parse(body);

      const courts = await call("GET", `/locations/${location.id}/courts`);
      expect(await courts.json()).toMatchObject({ courts: [{ name: "Court 1" }, { name: "Court 2" }] });

      const list = await call("GET", "/locations");
      expect(await list.json()).toMatchObject({ locations: [{ id: location.id }] });
    });

    it("should map provider errors to their status", async () => {
      const res = await call("POST", "/locations", { body: { slug: "unknown-club" }, user: "user-1" });

      expect(res.status).toBe(502);
      expect(await res.json()).toEqual({ error: "UPSTREAM_REJECTED", message: "No club unknown-club" });
    });

    it("should validate ids", async () => {
      const res = await call("GET", "/locations/abc");

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: "INVALID_REQUEST", message: "id: must be a positive integer" });
    });

    it("should only let admins delete locations", async () => {
      const { location } = seedLocation(ctx.services, "a", "t-1");

      const denied = await call("DELETE", `/locations/${location.id}`, { user: "user-1" });
      expect(denied.status).toBe(403);
      expect(await denied.json()).toEqual({ error: "FORBIDDEN", message: "Only admins may delete locations" });

      const deleted = await call("DELETE", `/locations/${location.id}`, { user: "root", admin: true });
      expect(deleted.status).toBe(204);

      const missing = await call("GET", `/locations/${location.id}`);
      expect(missing.status).toBe(404);
      expect(await missing.json()).toEqual({ error: "LOCATION_NOT_FOUND", message: `Location ${location.id} not found` });
    });
  });

  describe("POST /search", () => {
    it("should return matching slots", async () => {
      const { location } = seedLocation(ctx.services, "a", "t-1");

      const res = await call("POST", "/search", { body: SEARCH, user: "user-1" });

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        totalSlots: 1,
        failedLocations: [],
        locations: [
          {
            location: { id: location.id },
            courts: [{ court: { name: "Court 1" }, slots: [{ startTime: "18:00", endTime: "19:30" }] }],
          },
        ],
      });
    });

    it("should reject a malformed body", async () => {
      const res = await call("POST", "/search", { body: { ...SEARCH, windowStart: "7pm" }, user: "user-1" });

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: "INVALID_REQUEST",
        message: "windowStart: Time must be in HH:MM format",
      });
    });

    it("should reject invalid JSON", async () => {
      const res = await call("POST", "/search", { rawBody: "{", user: "user-1" });

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: "INVALID_JSON", message: "Request body must be valid JSON" });
    });

    it("should reject a window that ends before it starts", async () => {
      const res = await call("POST", "/search", { body: { ...SEARCH, windowEnd: "16:00" }, user: "user-1" });

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: "INVALID_PARAMETER",
        message: "Time window end 16:00 must be after start 17:00",
      });
    });

    it("should report unknown locations", async () => {
      const res = await call("POST", "/search", { body: { ...SEARCH, locationIds: [999] }, user: "user-1" });

      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({ error: "LOCATION_NOT_FOUND", message: "Location 999 not found" });
    });
  });

  describe("/tasks/search", () => {
    it("should run a search in the background", async () => {
      seedLocation(ctx.services, "a", "t-1");

      const started = await call("POST", "/tasks/search", { body: SEARCH, user: "user-1" });
      expect(started.status).toBe(202);
      const { taskId, status } = z.object({ taskId: z.string(), status: z.string() }).parse(await started.json());
      expect(status).toBe("pending");

      await vi.waitFor(async () => {
        const res = await call("GET", `/tasks/search/${taskId}`, { user: "user-1" });
        expect(await res.json()).toMatchObject({ status: "completed", progress: 1 });
      });

      const hidden = await call("GET", `/tasks/search/${taskId}`, { user: "user-2" });
      expect(hidden.status).toBe(404);
      expect(await hidden.json()).toEqual({ error: "TASK_NOT_FOUND", message: `Task ${taskId} not found` });
    });
  });

  describe("/search-orders", () => {
    it("should create, execute and read notifications of an order", async () => {
      const { location } = seedLocation(ctx.services, "a", "t-1");

      const created = await call("POST", "/search-orders", {
        body: { locationIds: [location.id], date: DATE, startTime: "17:00", endTime: "21:00", durationMinutes: 90 },
        user: "user-1",
      });
      expect(created.status).toBe(201);
      const body: unknown = await created.json();
      expect(body).toMatchObject({ userId: "user-1", isActive: true, locationIds: [location.id] });
      const order = withId.parse(body);

      const executed = await call("POST", `/search-orders/${order.id}/execute`, { user: "user-1" });
      expect(await executed.json()).toMatchObject({
        matches: 1,
        newNotifications: [{ courtName: "Court 1", startTime: "18:00" }],
      });

      const listed = await call("GET", `/search-orders/${order.id}/notifications`, { user: "user-1" });
      const { notifications } = z.object({ notifications: z.array(withId) }).parse(await listed.json());
      expect(notifications).toHaveLength(1);
      const notificationId = notifications[0]?.id ?? 0;

      const read = await call("POST", `/search-orders/${order.id}/notifications/${notificationId}/read`, {
        user: "user-1",
      });
      expect(await read.json()).toMatchObject({ id: notificationId, read: true });

      const patched = await call("PATCH", `/search-orders/${order.id}`, { body: { isActive: false }, user: "user-1" });
      expect(await patched.json()).toMatchObject({ id: order.id, isActive: false });

      const foreign = await call("GET", `/search-orders/${order.id}`, { user: "user-2" });
      expect(foreign.status).toBe(403);

      const mine = await call("GET", "/search-orders", { user: "user-1" });
      expect(await mine.json()).toMatchObject({ searchOrders: [{ id: order.id }] });

      const deleted = await call("DELETE", `/search-orders/${order.id}`, { user: "user-1" });
      expect(deleted.status).toBe(204);
    });

    it("should reject an order without locations", async () => {
      const res = await call("POST", "/search-orders", {
        body: { locationIds: [], date: DATE, startTime: "17:00", endTime: "21:00", durationMinutes: 90 },
        user: "user-1",
      });

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: "INVALID_REQUEST",
        message: "locationIds: At least one location is required",
      });
    });
  });

  describe("/admin", () => {
    it("should clear the cache for admins only", async () => {
      seedLocation(ctx.services, "a", "t-1");
      await call("POST", "/search", { body: SEARCH, user: "user-1" });

      const denied = await call("POST", "/admin/cache/clear", { user: "user-1" });
      expect(denied.status).toBe(403);

      const cleared = await call("POST", "/admin/cache/clear", { user: "root", admin: true });
      expect(await cleared.json()).toEqual({ cleared: 1, olderThanMinutes: null });
    });

    it("should rebuild courts from club pages and report failures", async () => {
      const added = await call("POST", "/locations", { body: { slug: "padel-utrecht" }, user: "root" });
      const { location } = locationBody.parse(await added.json());
      const orphan = seedLocation(ctx.services, "gone", "t-9").location;
      await call("POST", "/search", { body: { ...SEARCH, locationIds: [location.id] }, user: "root" });

      const res = await call("POST", "/admin/refresh", { user: "root", admin: true });

      expect(await res.json()).toMatchObject({
        deleted: { courts: 4, availabilities: 2, cacheEntries: 1 },
        refreshed: 1,
        failed: [{ locationId: orphan.id, name: "Club gone", error: "UPSTREAM_REJECTED", message: "No club gone" }],
      });
      expect(ctx.services.store.listCourts(location.id)).toHaveLength(2);
      expect(ctx.services.store.getLocation(location.id)?.id).toBe(location.id);
    });
  });
});
