import type { Context, Next } from "hono";
import { HTTPException } from "hono/http-exception";
import type { AppEnv } from "../env";
import type { CurrentUser } from "../types";

export function jsonError(status: 400 | 401, error: string, message: string): HTTPException {
  return new HTTPException(status, {
    res: new Response(JSON.stringify({ error, message }), {
      status,
      headers: { "Content-Type": "application/json" },
    }),
  });
}

/**
 * API key authentication middleware
 * Checks for X-API-Key header matching configured API key; an empty key disables the check
 */
export async function apiKeyAuth(c: Context<AppEnv>, next: Next): Promise<Response | void> {
  const expected = c.get("config").apiKey;
  if (!expected) {
    await next();
    return;
  }

  const apiKey = c.req.header("X-API-Key");

  if (!apiKey || apiKey !== expected) {
    return c.json(
      {
        error: "UNAUTHORIZED",
        message: "Invalid or missing API key",
      },
      401
    );
  }

  await next();
}

/**
 * Caller identity from the fronting auth layer: X-User-Id and X-User-Admin
 */
export async function identifyUser(c: Context<AppEnv>, next: Next): Promise<void> {
  const id = c.req.header("X-User-Id")?.trim();
  const admin = c.req.header("X-User-Admin")?.toLowerCase() === "true";

  c.set("user", id ? { id, isAdmin: admin } : null);
  await next();
}

export function currentUser(c: Context<AppEnv>): CurrentUser {
  const user = c.get("user");
  if (!user) {
    throw jsonError(401, "UNAUTHORIZED", "X-User-Id header is required");
  }
  return user;
}
