// src/server.ts
import type { Server } from "node:http";
import { loadEnv, readEnv } from "./env/EnvLoader";

/**
 * Env files are applied before anything that reads LOG_LEVEL is loaded,
 * hence the dynamic imports.
 */
export async function startServer(): Promise<Server> {
  loadEnv();
  const env = readEnv();

  const { logger } = await import("./utils/logger");
  const { createApp } = await import("./app/createApp");
  const { buildRouter } = await import("./app/buildRouter");

  const app = createApp({ router: buildRouter(), serviceName: env.SERVICE_NAME });

  return new Promise<Server>((resolve) => {
    const server = app.listen(env.PORT, () => {
      logger.info({ port: env.PORT }, "listening");
      resolve(server);
    });
  });
}
