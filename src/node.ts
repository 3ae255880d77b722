// ---------------------------------------------------------------------------
// Node.js HTTP server entrypoint (for deployment).
// ---------------------------------------------------------------------------

import { serve } from "@hono/node-server";
import { buildApp } from "./app.js";

const { app, config, logger, store } = await buildApp();

const server = serve({
  fetch: app.fetch,
  port: config.port,
});

logger.info({ port: config.port }, "listening");

function shutdown(signal: string): void {
  logger.info({ signal }, "shutting down");
  server.close(() => {
    store.close().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error({ err: err instanceof Error ? err.message : String(err) }, "store close failed");
        process.exit(1);
      },
    );
  });
}

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
