import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { randomUUID } from "node:crypto";

import {
  DEMO_CURVE,
  InvalidInputError,
  PricingRequestSchema,
  assertValid,
  isInvalidInputError,
  type PricingResult,
  type YieldCurveInput,
} from "@bond-mc/sdk";
import { YieldCurve } from "@bond-mc/curve";
import { BondValuationEngine } from "@bond-mc/engine";
import type { Logger } from "@bond-mc/logger";

export interface PricingRouteDeps {
  readonly logger: Logger;
  readonly maxSimulations: number;
  readonly shockStdDev: number;
}

const buildCurve = (input: YieldCurveInput): YieldCurve => {
  try {
    return new YieldCurve(input.maturities, input.rates);
  } catch (error) {
    if (isInvalidInputError(error)) {
      throw new InvalidInputError(`curve.${error.field}`, error.message);
    }
    throw error;
  }
};

export const registerPricingRoutes = (app: FastifyInstance, deps: PricingRouteDeps): void => {
  const { logger } = deps;

  app.get("/api/health", async (_request: FastifyRequest, reply: FastifyReply) => {
    return reply.send({ status: "ok" });
  });

  app.get("/api/curves/demo", async (_request: FastifyRequest, reply: FastifyReply) => {
    return reply.send({ maturities: DEMO_CURVE.maturities, rates: DEMO_CURVE.rates });
  });

  /**
   * POST /api/price
   * Static and Monte Carlo price of one bond
   */
  app.post(
    "/api/price",
    async (
      request: FastifyRequest<{ Body: unknown }>,
      reply: FastifyReply,
    ): Promise<FastifyReply> => {
      const requestId = randomUUID();

      try {
        const pricing = assertValid(PricingRequestSchema, request.body, "PricingRequest");

        if (pricing.simulations > deps.maxSimulations) {
          throw new InvalidInputError(
            "simulations",
            `Number of simulations must not exceed ${deps.maxSimulations}`,
          );
        }

        const curve = buildCurve(pricing.curve ?? DEMO_CURVE);
        const engine = new BondValuationEngine(
          {
            ...pricing.bond,
            curve,
            simulationCount: pricing.simulations,
            seed: pricing.seed,
            shockStdDev: deps.shockStdDev,
          },
          { logger },
        );

        const { staticPrice, monteCarlo } = engine.value();
        const result: PricingResult = {
          requestId,
          bond: { ...engine.bond },
          isZeroCoupon: engine.isZeroCoupon,
          staticPrice,
          monteCarlo,
          cashFlows: engine.cashFlows(),
        };

        logger.info("Bond priced", {
          requestId,
          staticPrice,
          mean: monteCarlo.mean,
          stdDev: monteCarlo.stdDev,
          simulations: monteCarlo.simulations,
        });

        return reply.code(200).send(result);
      } catch (error) {
        if (isInvalidInputError(error)) {
          logger.warn("Rejected pricing request", {
            requestId,
            field: error.field,
            error: error.message,
          });
          return reply.code(400).send({ message: error.message, field: error.field });
        }

        logger.error("Pricing failed", {
          requestId,
          error: error instanceof Error ? error.message : String(error),
        });
        return reply.code(500).send({ message: "Pricing failed" });
      }
    },
  );
};
