import { Hono } from "hono";
import { currentUser } from "../middleware/auth";
import { clearCacheSchema, readJson } from "./validation";
import type { AppEnv } from "../env";

const admin = new Hono<AppEnv>();

admin.post("/cache/clear", async (c) => {
  const user = currentUser(c);
  const { olderThanMinutes } = await readJson(c, clearCacheSchema);
  const cleared = c.get("services").admin.clearCache(user, olderThanMinutes);
  return c.json({ cleared, olderThanMinutes: olderThanMinutes ?? null });
});

admin.post("/refresh", async (c) => {
  const summary = await c.get("services").admin.refreshAllData(currentUser(c));
  return c.json(summary);
});

export default admin;
