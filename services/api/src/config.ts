import { z } from "zod";

import { PricingEnvSchema, assertValid } from "@bond-mc/sdk";
import type { LogLevel } from "@bond-mc/logger";

/**
 * Runtime settings for the pricing service, read from the environment.
 */
export interface ApiConfig {
  readonly port: number;
  readonly host: string;
  readonly logLevel: LogLevel;
  /** Largest `simulations` value a single request may ask for. */
  readonly maxSimulations: number;
  /** Standard deviation of each curve-point shock. */
  readonly shockStdDev: number;
}

const EnvSchema = PricingEnvSchema.extend({
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  HOST: z.string().min(1).default("0.0.0.0"),
  MAX_SIMULATIONS: z.coerce.number().int().positive().default(200_000),
});

export const DEFAULT_API_CONFIG: ApiConfig = {
  port: 3000,
  host: "0.0.0.0",
  logLevel: "info",
  maxSimulations: 200_000,
  shockStdDev: 0.005,
};

/**
 * Parses the service configuration.
 *
 * @throws InvalidInputError naming the first bad variable.
 */
export const loadConfig = (env: NodeJS.ProcessEnv = process.env): ApiConfig => {
  const parsed = assertValid(EnvSchema, env, "environment");
  return {
    port: parsed.PORT,
    host: parsed.HOST,
    logLevel: parsed.LOG_LEVEL,
    maxSimulations: parsed.MAX_SIMULATIONS,
    shockStdDev: parsed.SHOCK_STD_DEV,
  };
};
