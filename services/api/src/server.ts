import Fastify, { type FastifyInstance } from "fastify";

import { createLogger, type Logger } from "@bond-mc/logger";

import { DEFAULT_API_CONFIG, type ApiConfig } from "./config.js";
import { registerPricingRoutes } from "./routes/pricing.js";

export interface CreateFastifyServerOptions {
  readonly config?: Partial<ApiConfig>;
  readonly logger?: Logger;
}

/**
 * Creates the Fastify server and wires the pricing routes.
 */
export const createFastifyServer = (options: CreateFastifyServerOptions = {}): FastifyInstance => {
  const config: ApiConfig = { ...DEFAULT_API_CONFIG, ...options.config };
  const logger = options.logger ?? createLogger("services/api", { level: config.logLevel });

  const app = Fastify({
    logger: false,
  });

  app.addHook("onSend", async (request, reply, payload) => {
    if (request.method !== "OPTIONS") {
      reply.header("access-control-allow-origin", request.headers.origin ?? "*");
    }
    return payload;
  });

  app.options("/api/*", async (request, reply) => {
    reply
      .header("access-control-allow-origin", request.headers.origin ?? "*")
      .header("access-control-allow-methods", "GET,POST,OPTIONS")
      .header(
        "access-control-allow-headers",
        request.headers["access-control-request-headers"] ?? "content-type",
      )
      .code(204)
      .send();
  });

  registerPricingRoutes(app, {
    logger,
    maxSimulations: config.maxSimulations,
    shockStdDev: config.shockStdDev,
  });

  return app;
};
