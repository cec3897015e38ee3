import { PricingEnvSchema, assertValid } from "@bond-mc/sdk";
import type { LogLevel } from "@bond-mc/logger";

export interface CliConfig {
  readonly logLevel: LogLevel;
  /** Standard deviation of each curve-point shock. */
  readonly shockStdDev: number;
}

/**
 * Reads the settings the CLI shares with the pricing service.
 *
 * @throws InvalidInputError naming the first bad variable.
 */
export const loadCliConfig = (env: NodeJS.ProcessEnv = process.env): CliConfig => {
  const parsed = assertValid(PricingEnvSchema, env, "environment");
  return {
    logLevel: parsed.LOG_LEVEL,
    shockStdDev: parsed.SHOCK_STD_DEV,
  };
};
