import { Hono } from "hono";
import { currentUser } from "../middleware/auth";
import {
  createSearchOrderSchema,
  idParam,
  readJson,
  updateSearchOrderSchema,
} from "./validation";
import type { AppEnv } from "../env";

const searchOrders = new Hono<AppEnv>();

searchOrders.get("/", (c) => {
  const user = currentUser(c);
  return c.json({ searchOrders: c.get("services").orders.list(user.id) });
});

searchOrders.post("/", async (c) => {
  const user = currentUser(c);
  const input = await readJson(c, createSearchOrderSchema);
  return c.json(c.get("services").orders.create(user, input), 201);
});

searchOrders.get("/:id", (c) => {
  return c.json(c.get("services").orders.get(idParam(c, "id"), currentUser(c)));
});

searchOrders.patch("/:id", async (c) => {
  const user = currentUser(c);
  const patch = await readJson(c, updateSearchOrderSchema);
  return c.json(c.get("services").orders.update(idParam(c, "id"), patch, user));
});

searchOrders.delete("/:id", (c) => {
  c.get("services").orders.delete(idParam(c, "id"), currentUser(c));
  return c.body(null, 204);
});

searchOrders.post("/:id/execute", async (c) => {
  const check = await c.get("services").orders.executeNow(idParam(c, "id"), currentUser(c));
  return c.json(check);
});

searchOrders.get("/:id/notifications", (c) => {
  const notifications = c.get("services").orders.listNotifications(idParam(c, "id"), currentUser(c));
  return c.json({ notifications });
});

searchOrders.post("/:id/notifications/:notificationId/read", (c) => {
  const notification = c
    .get("services")
    .orders.markNotificationRead(idParam(c, "id"), idParam(c, "notificationId"), currentUser(c));
  return c.json(notification);
});

export default searchOrders;
