import { config as loadEnv } from "dotenv";
import type { FastifyInstance } from "fastify";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";

const MODULE_DIR = dirname(fileURLToPath(import.meta.url));
const REPO_ROOT = join(MODULE_DIR, "..", "..", "..");
loadEnv({ path: join(REPO_ROOT, ".env") });
loadEnv();

import { createLogger } from "@bond-mc/logger";

import { loadConfig, type ApiConfig } from "./config.js";
import { createFastifyServer } from "./server.js";

const logger = createLogger("services/api");
let server: FastifyInstance | null = null;
let activeConfig: ApiConfig | null = null;

const start = async (): Promise<void> => {
  try {
    const config = loadConfig();
    activeConfig = config;
    server = createFastifyServer({
      config,
      logger: createLogger("services/api", { level: config.logLevel }),
    });
    await server.listen({ port: config.port, host: config.host });
    logger.info("API listening", {
      port: config.port,
      host: config.host,
      maxSimulations: config.maxSimulations,
      shockStdDev: config.shockStdDev,
    });
  } catch (error) {
    logger.error("Failed to start API", {
      error: error instanceof Error ? error.message : String(error),
    });
    process.exit(1);
  }
};

const shutdown = async (): Promise<void> => {
  if (!server) {
    process.exit(0);
    return;
  }
  logger.info("Shutting down API server", {
    port: activeConfig?.port,
    maxSimulations: activeConfig?.maxSimulations,
    shockStdDev: activeConfig?.shockStdDev,
  });
  await server.close();
  process.exit(0);
};

process.on("SIGINT", () => {
  void shutdown();
});
process.on("SIGTERM", () => {
  void shutdown();
});

void start();
