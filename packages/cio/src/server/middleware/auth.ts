import type { Context } from "hono";
import { createMiddleware } from "hono/factory";
import { getConfig, setupLogger } from "@cio/connector";

const logger = setupLogger("webhooky:auth");

// =============================================================================
// Bearer token check
// =============================================================================
export const authMiddleware = createMiddleware(async (c, next) => {
  const expected = getConfig().WEBHOOKY_BEARER_TOKEN;
  const header = c.req.header("Authorization");

  if (expected === undefined) {
    logger.warn("WEBHOOKY_BEARER_TOKEN is not set, rejecting request");
    return createUnauthorizedResponse(c);
  }
  if (!header?.startsWith("Bearer ") || header.substring(7) !== expected) {
    return createUnauthorizedResponse(c);
  }

  await next();
});

export function createUnauthorizedResponse(c: Context): Response {
  return c.json({ error: "Unauthorized" }, 401, { "WWW-Authenticate": "Bearer" });
}
