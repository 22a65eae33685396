import { Hono } from "hono";
import type { AppEnv } from "../env";
import type { HealthResponse } from "../types";

const health = new Hono<AppEnv>();

health.get("/", (c) => {
  const { store, scheduler, tasks, cache } = c.get("services");

  let database: HealthResponse["database"] = "ok";
  try {
    store.ping();
  } catch (error) {
    console.error("[Health] Database check failed:", error);
    database = "error";
  }

  const schedulerStatus = scheduler.status();

  // Determine overall status
  let status: HealthResponse["status"] = "ok";
  if (database === "error") {
    status = "error";
  } else if (schedulerStatus.consecutiveFailures > 0) {
    status = "degraded";
  }

  const response: HealthResponse = {
    status,
    database,
    scheduler: schedulerStatus,
    tasks: tasks.size(),
    inFlightFetches: cache.inFlightCount(),
  };

  const httpStatus = status === "error" ? 503 : 200;
  return c.json(response, httpStatus);
});

export default health;
