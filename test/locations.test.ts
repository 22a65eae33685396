import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { ForbiddenError, LocationNotFoundError, UnknownProviderError } from "../src/errors";
import { setup } from "./helpers";
import type { TestContext } from "./helpers";

describe("LocationService", () => {
  let ctx: TestContext;

  beforeEach(() => {
    ctx = setup({ config: { timezone: "Europe/Madrid" } });
  });

  afterEach(() => {
    ctx.handle.close();
  });

  it("should fall back to the configured timezone", async () => {
    ctx.provider.setClub("club", { tenant_id: "t-1", tenant_name: "Club", resources: [] });

    const { location, courts } = await ctx.services.locations.addBySlug("playtomic", "club");

    expect(location.timezone).toBe("Europe/Madrid");
    expect(location.city).toBeNull();
    expect(courts).toEqual([]);
  });

  it("should keep the location id when a club is added again", async () => {
    ctx.provider.setClub("club", {
      tenant_id: "t-1",
      tenant_name: "Club",
      resources: [{ resourceId: "c1", name: "Court 1" }],
    });
    const first = await ctx.services.locations.addBySlug("playtomic", "club");

    ctx.provider.setClub("club", {
      tenant_id: "t-1",
      tenant_name: "Club Renamed",
      resources: [
        { resourceId: "c1", name: "Court 1" },
        { resourceId: "c2", name: "Court 2", features: ["indoor"] },
      ],
    });
    const second = await ctx.services.locations.addBySlug("playtomic", "club");

    expect(second.location.id).toBe(first.location.id);
    expect(second.location.name).toBe("Club Renamed");
    expect(second.courts.map((court) => [court.providerCourtId, court.isIndoor])).toEqual([
      ["c1", false],
      ["c2", true],
    ]);
  });

  it("should reject providers it does not know", async () => {
    await expect(ctx.services.locations.addBySlug("matchi", "club")).rejects.toBeInstanceOf(UnknownProviderError);
  });

  it("should report missing locations", () => {
    expect(() => ctx.services.locations.get(42)).toThrow(LocationNotFoundError);
    expect(() => ctx.services.locations.courts(42)).toThrow(LocationNotFoundError);
    expect(() => ctx.services.locations.delete(42, { id: "root", isAdmin: true })).toThrow(LocationNotFoundError);
  });

  it("should only let admins delete", async () => {
    ctx.provider.setClub("club", { tenant_id: "t-1", tenant_name: "Club" });
    const { location } = await ctx.services.locations.addBySlug("playtomic", "club");

    expect(() => ctx.services.locations.delete(location.id, { id: "user-1", isAdmin: false })).toThrow(ForbiddenError);
    ctx.services.locations.delete(location.id, { id: "root", isAdmin: true });
    expect(ctx.services.locations.list()).toEqual([]);
  });
});
