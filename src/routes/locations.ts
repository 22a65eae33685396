import { Hono } from "hono";
import { currentUser } from "../middleware/auth";
import { addLocationSchema, idParam, readJson } from "./validation";
import type { AppEnv } from "../env";

const locations = new Hono<AppEnv>();

locations.get("/", (c) => {
  return c.json({ locations: c.get("services").locations.list() });
});

locations.post("/", async (c) => {
  const { provider, slug } = await readJson(c, addLocationSchema);
  const saved = await c.get("services").locations.addBySlug(provider, slug);
  return c.json(saved, 201);
});

locations.get("/:id", (c) => {
  return c.json({ location: c.get("services").locations.get(idParam(c, "id")) });
});

locations.get("/:id/courts", (c) => {
  return c.json({ courts: c.get("services").locations.courts(idParam(c, "id")) });
});

locations.delete("/:id", (c) => {
  c.get("services").locations.delete(idParam(c, "id"), currentUser(c));
  return c.body(null, 204);
});

export default locations;
