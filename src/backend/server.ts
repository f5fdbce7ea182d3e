import Fastify from "fastify";
import fastifyWebSocket from "@fastify/websocket";
import { fileURLToPath } from "url";
import { logger } from "./logger.js";
import { loadSettings, type Settings } from "./modules/settings/index.js";
import { createRuntimeManager, type RuntimeManager } from "./modules/runtime-cache/runtime-manager.js";
import { registerRuntimeRoutes, type RuntimeRouteOptions } from "./api/runtimes.js";
import { registerWsRoutes, broadcast } from "./api/ws.js";

export async function buildServer(manager: RuntimeManager, routeOptions: RuntimeRouteOptions = {}) {
  const app = Fastify({
    logger: {
      level: process.env.RTD_LOG_LEVEL ?? (process.env.NODE_ENV === "production" ? "info" : "debug"),
      transport: process.env.NODE_ENV !== "production" && process.env.RTD_LOG_LEVEL !== "silent"
        ? { target: "pino-pretty", options: { colorize: true } }
        : undefined,
    },
  });

  // WebSocket support
  await app.register(fastifyWebSocket);

  // Health check
  app.get("/api/health", async () => ({
    status: "ok",
    version: "0.1.0",
    cacheRoot: manager.store.root,
    registry: manager.registry.name,
    current: manager.currentVersion(),
    timestamp: Date.now(),
  }));

  await registerRuntimeRoutes(app, manager, routeOptions);
  await registerWsRoutes(app);

  return app;
}

/** Creates the manager with install progress pushed to WebSocket clients. */
export function createManagerForSettings(settings: Settings): RuntimeManager {
  return createRuntimeManager(settings, {
    onProgress: (snapshot) =>
      broadcast({ type: "install_progress", ...snapshot, timestamp: Date.now() }),
  });
}

async function main() {
  const settings = await loadSettings();
  const manager = createManagerForSettings(settings);

  // Recovery must finish before any request can touch the cache
  await manager.init();

  const app = await buildServer(manager, { leaseTtlMs: settings.api.leaseTtlMs });
  const port = Number(process.env.RTD_PORT ?? 9430);
  const host = process.env.RTD_HOST ?? "127.0.0.1";

  try {
    await app.listen({ port, host });
    logger.info({ url: `http://${host}:${port}` }, "Runtime depot ready");
  } catch (err) {
    app.log.error(err);
    process.exit(1);
  }

  const shutdown = () => {
    app
      .close()
      .then(() => process.exit(0))
      .catch((err) => {
        logger.error({ err }, "Shutdown error");
        process.exit(1);
      });
  };
  process.once("SIGINT",  shutdown);
  process.once("SIGTERM", shutdown);
}

// Allow importing buildServer() from tests without starting a listener
if (process.argv[1] === fileURLToPath(import.meta.url)) {
  main().catch((err) => {
    logger.fatal({ err }, "Startup failed");
    process.exit(1);
  });
}
