import { serve } from "@hono/node-server";
import { createApp } from "./app";
import { loadConfig } from "./config";
import { openDatabase } from "./db/client";
import { createServices } from "./services";

const config = loadConfig();
const database = openDatabase(config.databasePath);
const services = createServices(config, database.db);
const app = createApp(config, services);

services.scheduler.start();

const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
  console.log(`[Startup] padelwatch listening on http://localhost:${info.port}`);
  console.log(`[Startup] Database: ${config.databasePath}, timezone: ${config.timezone}`);
});

function shutdown(signal: string): void {
  console.log(`[Shutdown] ${signal} received`);
  services.scheduler.stop();
  server.close(() => {
    database.close();
    process.exit(0);
  });
}

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
