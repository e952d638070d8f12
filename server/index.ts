/**
 * Server entry - builds the gateway context and listens.
 */

import { createApp } from "./app.js";
import { getGatewayContext } from "./context.js";
import {
  DEFAULT_ENCRYPTION_KEY,
  getEncryptionKey,
  getHost,
  getPersistenceDriver,
  getPort,
} from "../src/lib/config.js";
import { closeDb } from "../src/lib/db/index.js";

async function start() {
  if (getEncryptionKey() === DEFAULT_ENCRYPTION_KEY) {
    console.warn("[Server] ENCRYPTION_KEY is not set; using the default key. Set it before storing real keys.");
  }
  const ctx = getGatewayContext();
  const app = createApp();
  const port = getPort();
  const host = getHost();
  const server = app.listen(port, host, () => {
    console.log(`[Server] Video gateway running at http://${host}:${port} (persistence: ${getPersistenceDriver()})`);
  });

  const shutdown = async () => {
    console.log("[Server] Shutting down; waiting for in-flight jobs");
    server.close();
    await ctx.orchestrator.drain();
    await closeDb();
    process.exit(0);
  };
  process.once("SIGINT", () => {
    shutdown().catch((e) => {
      console.error("[Server] Shutdown failed:", e);
      process.exit(1);
    });
  });
  process.once("SIGTERM", () => {
    shutdown().catch((e) => {
      console.error("[Server] Shutdown failed:", e);
      process.exit(1);
    });
  });
}

start().catch((e) => {
  console.error("[Server] Failed to start:", e);
  process.exit(1);
});
