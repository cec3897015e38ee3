import type { BondTerms, CashFlow, MonteCarloSummary } from "@bond-mc/sdk";
import type { YieldCurve } from "@bond-mc/curve";
import type { Logger } from "@bond-mc/logger";
import type { NormalSource } from "@bond-mc/stats";

/**
 * Inputs accepted by the valuation engine.
 */
export interface ValuationEngineConfig extends BondTerms {
  /** Base curve the static price is computed against. */
  readonly curve: YieldCurve;
  /** Number of Monte Carlo trials. */
  readonly simulationCount: number;
  /** Seed for the shock generator; drawn from OS entropy when omitted. */
  readonly seed?: number;
  /** Standard deviation of each curve-point shock. Defaults to 0.005 (50bp). */
  readonly shockStdDev?: number;
}

export interface ValuationEngineOptions {
  /** Receives one debug entry per completed Monte Carlo run. */
  readonly logger?: Logger;
  /** Replaces the seeded Normal generator, e.g. one per worker. */
  readonly normal?: NormalSource;
}

export type { CashFlow };

export type MonteCarloResult = MonteCarloSummary;

export interface Valuation {
  readonly staticPrice: number;
  readonly monteCarlo: MonteCarloResult;
}
