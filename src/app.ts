import { Hono } from "hono";
import { HTTPException } from "hono/http-exception";
import { logger } from "hono/logger";
import { PadelWatchError } from "./errors";
import { apiKeyAuth, identifyUser } from "./middleware/auth";
import adminRoute from "./routes/admin";
import healthRoute from "./routes/health";
import locationsRoute from "./routes/locations";
import searchRoute from "./routes/search";
import searchOrdersRoute from "./routes/search-orders";
import tasksRoute from "./routes/tasks";
import type { Config } from "./config";
import type { AppEnv } from "./env";
import type { Services } from "./services";
import type { ErrorResponse } from "./types";

export function createApp(config: Config, services: Services): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  // Middleware
  if (config.nodeEnv !== "test") {
    app.use("*", logger());
  }
  app.use("*", async (c, next) => {
    c.set("config", config);
    c.set("services", services);
    await next();
  });
  app.use("*", identifyUser);

  // Public routes (no auth required)
  app.route("/health", healthRoute);

  // Protected routes (API key required)
  app.use("*", apiKeyAuth);
  app.route("/locations", locationsRoute);
  app.route("/search", searchRoute);
  app.route("/tasks", tasksRoute);
  app.route("/search-orders", searchOrdersRoute);
  app.route("/admin", adminRoute);

  // Root route
  app.get("/", (c) => {
    return c.json({
      name: "padelwatch",
      description: "Padel court availability search with cached results and standing search orders",
      endpoints: {
        health: "GET /health",
        locations: "GET|POST /locations",
        search: "POST /search",
        tasks: "POST /tasks/search, GET /tasks/search/:id",
        searchOrders: "GET|POST /search-orders",
        admin: "POST /admin/cache/clear, POST /admin/refresh",
      },
    });
  });

  // 404 handler
  app.notFound((c) => {
    return c.json<ErrorResponse>(
      {
        error: "NOT_FOUND",
        message: `Route ${c.req.method} ${c.req.path} not found`,
      },
      404
    );
  });

  // Error handler
  app.onError((err, c) => {
    if (err instanceof HTTPException) {
      return err.getResponse();
    }

    if (err instanceof PadelWatchError) {
      return c.json<ErrorResponse>({ error: err.code, message: err.message }, err.status);
    }

    console.error("Unhandled error:", err);
    return c.json<ErrorResponse>(
      {
        error: "INTERNAL_ERROR",
        message: "An unexpected error occurred",
      },
      500
    );
  });

  return app;
}
