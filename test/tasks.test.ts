import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { InvalidParameterError, TaskNotFoundError, UpstreamRejectedError } from "../src/errors";
import { isTerminal } from "../src/services/tasks";
import { DATE, scenarioRecords, seedLocation, setup, tick } from "./helpers";
import type { TestContext } from "./helpers";
import type { CurrentUser, SearchSpec } from "../src/types";

const USER: CurrentUser = { id: "user-1", isAdmin: false };
const OTHER: CurrentUser = { id: "user-2", isAdmin: false };
const ADMIN: CurrentUser = { id: "admin", isAdmin: true };

const SPEC: SearchSpec = {
  date: DATE,
  windowStart: "17:00",
  windowEnd: "21:00",
  durationMinutes: 90,
  courtType: "all",
  courtConfig: "all",
  liveSearch: true,
  forceLiveSearch: false,
};

describe("TaskRunner", () => {
  let ctx: TestContext;

  beforeEach(() => {
    ctx = setup();
    seedLocation(ctx.services, "a", "t-1");
    ctx.provider.setAvailability("t-1", DATE, scenarioRecords());
  });

  afterEach(() => {
    ctx.handle.close();
  });

  it("should run a search to completion in the background", async () => {
    const taskId = ctx.services.tasks.start(SPEC, USER);

    const queued = ctx.services.tasks.getStatus(taskId, USER);
    expect(queued).toMatchObject({ status: "pending", progress: 0, totalLocations: 1, processedLocations: 0 });

    await vi.waitFor(() => {
      expect(ctx.services.tasks.getStatus(taskId).status).toBe("completed");
    });

    const done = ctx.services.tasks.getStatus(taskId, USER);
    expect(done.progress).toBe(1);
    expect(done.processedLocations).toBe(1);
    expect(done.currentStep).toBe("Found 1 slots");
    expect(done.result?.totalSlots).toBe(1);
    expect(done.startedAt).toBe("2025-11-16T08:00:00.000Z");
    expect(done.completedAt).toBe("2025-11-16T08:00:00.000Z");
    expect(done.errorMessage).toBeNull();
  });

  it("should return the same data on repeated polls of a finished task", async () => {
    const taskId = ctx.services.tasks.start(SPEC, USER);
    await vi.waitFor(() => {
      expect(ctx.services.tasks.getStatus(taskId).status).toBe("completed");
    });

    const first = ctx.services.tasks.getStatus(taskId, USER);
    ctx.clock.advanceMinutes(5);
    const second = ctx.services.tasks.getStatus(taskId, USER);

    expect(second).toEqual(first);
    expect(second.updatedAt).toBe("2025-11-16T08:00:00.000Z");
    expect(ctx.provider.availabilityCalls).toBe(1);
  });

  it("should list failed locations next to the result", async () => {
    seedLocation(ctx.services, "b", "t-2");
    ctx.provider.failFor("t-2", new UpstreamRejectedError("Forbidden", 403));
    const taskId = ctx.services.tasks.start(SPEC, USER);

    await vi.waitFor(() => {
      expect(ctx.services.tasks.getStatus(taskId).status).toBe("completed");
    });

    const done = ctx.services.tasks.getStatus(taskId, USER);
    expect(done.processedLocations).toBe(2);
    expect(done.failedLocations).toEqual([
      { locationId: 2, name: "Club b", error: "UPSTREAM_REJECTED", message: "Forbidden" },
    ]);
    expect(done.result?.failedLocations).toEqual(done.failedLocations);
  });

  it("should reject an invalid search before creating a task", () => {
    expect(() => ctx.services.tasks.start({ ...SPEC, windowStart: "22:00" }, USER)).toThrow(InvalidParameterError);
    expect(ctx.services.tasks.size()).toBe(0);
  });

  it("should never start a task cancelled while pending", async () => {
    const taskId = ctx.services.tasks.start(SPEC, USER);
    const cancelled = ctx.services.tasks.cancel(taskId, USER);

    expect(cancelled.status).toBe("cancelled");
    expect(cancelled.currentStep).toBe("Search cancelled");

    await tick();
    await tick();

    expect(ctx.services.tasks.getStatus(taskId).status).toBe("cancelled");
    expect(ctx.provider.availabilityCalls).toBe(0);
  });

  it("should drop the result of a task cancelled mid-flight", async () => {
    ctx.provider.hold();
    const taskId = ctx.services.tasks.start(SPEC, USER);

    await tick();
    const running = ctx.services.tasks.getStatus(taskId);
    expect(running.status).toBe("running");
    expect(running.progress).toBe(0.05);
    expect(running.currentStep).toBe("Checking Club a");

    ctx.services.tasks.cancel(taskId, USER);
    ctx.provider.release();

    await vi.waitFor(() => {
      expect(ctx.services.cache.inFlightCount()).toBe(0);
    });
    await tick();

    const final = ctx.services.tasks.getStatus(taskId);
    expect(final.status).toBe("cancelled");
    expect(final.result).toBeNull();
    expect(final.processedLocations).toBe(0);
  });

  it("should fail when every location failed", async () => {
    ctx.provider.failFor("t-1", new UpstreamRejectedError("Forbidden", 403));
    const taskId = ctx.services.tasks.start(SPEC, USER);

    await vi.waitFor(() => {
      expect(isTerminal(ctx.services.tasks.getStatus(taskId).status)).toBe(true);
    });

    const failed = ctx.services.tasks.getStatus(taskId);
    expect(failed.status).toBe("failed");
    expect(failed.errorMessage).toBe("Forbidden");
    expect(failed.currentStep).toBe("Search failed");
    expect(failed.result).toBeNull();
  });

  it("should hide tasks from other non-admin users", () => {
    const taskId = ctx.services.tasks.start(SPEC, USER);

    expect(() => ctx.services.tasks.getStatus(taskId, OTHER)).toThrow(TaskNotFoundError);
    expect(() => ctx.services.tasks.cancel(taskId, OTHER)).toThrow(TaskNotFoundError);
    expect(ctx.services.tasks.getStatus(taskId, ADMIN).userId).toBe("user-1");
    expect(() => ctx.services.tasks.getStatus("missing")).toThrow("Task missing not found");
  });

  it("should leave a finished task alone on cancel", async () => {
    const taskId = ctx.services.tasks.start(SPEC, USER);
    await vi.waitFor(() => {
      expect(ctx.services.tasks.getStatus(taskId).status).toBe("completed");
    });

    expect(ctx.services.tasks.cancel(taskId, USER).status).toBe("completed");
  });

  it("should purge finished tasks past their retention", async () => {
    const taskId = ctx.services.tasks.start(SPEC, USER);
    await vi.waitFor(() => {
      expect(ctx.services.tasks.getStatus(taskId).status).toBe("completed");
    });

    expect(ctx.services.tasks.purgeExpired(24)).toBe(0);

    ctx.clock.advanceMinutes(25 * 60);
    expect(ctx.services.tasks.purgeExpired(24)).toBe(1);
    expect(ctx.services.tasks.size()).toBe(0);
  });

  it("should purge expired tasks when a new one starts", async () => {
    const oldId = ctx.services.tasks.start(SPEC, USER);
    await vi.waitFor(() => {
      expect(ctx.services.tasks.getStatus(oldId).status).toBe("completed");
    });

    ctx.clock.advanceMinutes(25 * 60);
    const newId = ctx.services.tasks.start(SPEC, USER);

    expect(ctx.services.tasks.size()).toBe(1);
    expect(() => ctx.services.tasks.getStatus(oldId)).toThrow(TaskNotFoundError);
    expect(ctx.services.tasks.getStatus(newId).status).toBe("pending");
  });
});
