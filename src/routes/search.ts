import { Hono } from "hono";
import { currentUser } from "../middleware/auth";
import { readJson, searchRequestSchema } from "./validation";
import type { AppEnv } from "../env";

const search = new Hono<AppEnv>();

search.post("/", async (c) => {
  const user = currentUser(c);
  const spec = await readJson(c, searchRequestSchema);
  const result = await c.get("services").engine.search(spec, user);
  return c.json(result);
});

export default search;
