import { Hono } from "hono";
import { currentUser } from "../middleware/auth";
import { readJson, searchRequestSchema } from "./validation";
import type { AppEnv } from "../env";

const tasks = new Hono<AppEnv>();

tasks.post("/search", async (c) => {
  const user = currentUser(c);
  const spec = await readJson(c, searchRequestSchema);
  const taskId = c.get("services").tasks.start(spec, user);
  return c.json({ taskId, status: "pending" }, 202);
});

tasks.get("/search/:id", (c) => {
  const task = c.get("services").tasks.getStatus(c.req.param("id"), currentUser(c));
  return c.json(task);
});

tasks.post("/search/:id/cancel", (c) => {
  const task = c.get("services").tasks.cancel(c.req.param("id"), currentUser(c));
  return c.json(task);
});

export default tasks;
