/**
 * Webhooky on Node
 */

import { serve, type ServerType } from "@hono/node-server";
import { getConfig, getDbClient, parseBind, setupLogger, type Queryable } from "@cio/connector";
import { createApp } from "./server/app.js";

const logger = setupLogger("webhooky");

export function startServer(db: Queryable = getDbClient(), bind = getConfig().WEBHOOKY_BIND): ServerType {
  const { hostname, port } = parseBind(bind);
  const app = createApp({ db });
  return serve({ fetch: app.fetch, hostname, port }, (info) => {
    logger.info(`Listening on ${hostname}:${info.port}`);
  });
}
