import { z } from "zod";

import {
  BondTermsSchema,
  InvalidInputError,
  SimulationCountSchema,
  assertValid,
  type BondTerms,
} from "@bond-mc/sdk";
import { YieldCurve } from "@bond-mc/curve";
import { createLogger, type Logger } from "@bond-mc/logger";
import { NormalSampler, SeededRandom, createSeed, summarize, type NormalSource } from "@bond-mc/stats";

import type {
  CashFlow,
  MonteCarloResult,
  Valuation,
  ValuationEngineConfig,
  ValuationEngineOptions,
} from "./types.js";

export const DEFAULT_SHOCK_STD_DEV = 0.005;

// Field order is validation order; the first failure wins.
const EngineInputSchema = BondTermsSchema.extend({
  simulationCount: SimulationCountSchema,
  seed: z.number().int("Seed must be a whole number").nonnegative("Seed cannot be negative").optional(),
  shockStdDev: z
    .number()
    .finite("Shock standard deviation must be finite")
    .nonnegative("Shock standard deviation cannot be negative")
    .optional(),
});

/**
 * `(1 + rate / periodsPerYear) ^ periods`, rejecting rates at or below
 * `-periodsPerYear` and growth that underflows to zero.
 */
const growthFactor = (rate: number, time: number, periodsPerYear: number, periods: number): number => {
  const base = 1 + rate / periodsPerYear;
  const growth = Math.pow(base, periods);
  if (!(base > 0) || !(growth > 0)) {
    throw new InvalidInputError(
      "curve",
      `Curve rate ${rate} at ${time} years leaves no positive discount base`,
    );
  }
  return growth;
};

/**
 * Prices a fixed- or zero-coupon bond against a yield curve, statically and
 * under random curve shocks.
 *
 * The only mutable state is the shock generator, which is owned by the
 * engine and advances on every draw.
 */
export class BondValuationEngine {
  public readonly bond: Readonly<BondTerms>;
  public readonly curve: YieldCurve;
  public readonly simulationCount: number;
  public readonly shockStdDev: number;
  public readonly isZeroCoupon: boolean;
  /** Seed behind the shock generator, undefined when a source was injected. */
  public readonly seed: number | undefined;

  private readonly normal: NormalSource;
  private readonly logger: Logger;

  public constructor(config: ValuationEngineConfig, options: ValuationEngineOptions = {}) {
    const input = assertValid(EngineInputSchema, {
      faceValue: config.faceValue,
      couponRate: config.couponRate,
      yearsToMaturity: config.yearsToMaturity,
      couponsPerYear: config.couponsPerYear,
      simulationCount: config.simulationCount,
      seed: config.seed,
      shockStdDev: config.shockStdDev,
    });

    this.bond = Object.freeze({
      faceValue: input.faceValue,
      couponRate: input.couponRate,
      yearsToMaturity: input.yearsToMaturity,
      couponsPerYear: input.couponsPerYear,
    });
    this.curve = config.curve;
    this.simulationCount = input.simulationCount;
    this.shockStdDev = input.shockStdDev ?? DEFAULT_SHOCK_STD_DEV;
    this.isZeroCoupon = input.couponRate === 0 && input.couponsPerYear === 1;
    this.logger = options.logger ?? createLogger("packages/engine");

    if (options.normal) {
      this.seed = undefined;
      this.normal = options.normal;
    } else {
      this.seed = input.seed ?? createSeed();
      this.normal = new NormalSampler(new SeededRandom(this.seed), 0, this.shockStdDev);
    }
  }

  /**
   * Present value of the bond against `curve`, using per-period compounding.
   * Shared by the static price and every Monte Carlo trial.
   *
   * @throws InvalidInputError when a curve rate leaves no positive discount base.
   */
  public price(curve: YieldCurve): number {
    const { faceValue, couponRate, yearsToMaturity, couponsPerYear } = this.bond;

    if (this.isZeroCoupon) {
      const rate = curve.interpolate(yearsToMaturity);
      return faceValue / growthFactor(rate, yearsToMaturity, 1, yearsToMaturity);
    }

    const periods = yearsToMaturity * couponsPerYear;
    const couponPayment = (faceValue * couponRate) / couponsPerYear;
    let price = 0;

    for (let i = 1; i <= periods; i++) {
      const time = i / couponsPerYear;
      price += couponPayment / growthFactor(curve.interpolate(time), time, couponsPerYear, i);
    }

    const finalYtm = curve.interpolate(yearsToMaturity);
    price += faceValue / growthFactor(finalYtm, yearsToMaturity, couponsPerYear, periods);

    return price;
  }

  /**
   * Payment schedule behind {@link price}, with the face value folded into
   * the final payment.
   */
  public cashFlows(curve: YieldCurve = this.curve): CashFlow[] {
    const { faceValue, couponRate, yearsToMaturity, couponsPerYear } = this.bond;

    if (this.isZeroCoupon) {
      const rate = curve.interpolate(yearsToMaturity);
      const discountFactor = 1 / growthFactor(rate, yearsToMaturity, 1, yearsToMaturity);
      return [
        {
          period: 1,
          time: yearsToMaturity,
          amount: faceValue,
          rate,
          discountFactor,
          presentValue: faceValue * discountFactor,
        },
      ];
    }

    const periods = yearsToMaturity * couponsPerYear;
    const couponPayment = (faceValue * couponRate) / couponsPerYear;
    const flows: CashFlow[] = [];

    for (let i = 1; i <= periods; i++) {
      const time = i / couponsPerYear;
      const rate = curve.interpolate(time);
      const discountFactor = 1 / growthFactor(rate, time, couponsPerYear, i);
      const amount = i === periods ? couponPayment + faceValue : couponPayment;
      flows.push({ period: i, time, amount, rate, discountFactor, presentValue: amount * discountFactor });
    }

    return flows;
  }

  public staticPrice(): number {
    return this.price(this.curve);
  }

  /**
   * Integer-year copy of the base curve with an independent Normal shock on
   * each point, floored at zero.
   */
  public shiftCurve(): YieldCurve {
    const maturities: number[] = [];
    const rates: number[] = [];

    for (let year = 1; year <= this.bond.yearsToMaturity; year++) {
      const shifted = this.curve.interpolate(year) + this.normal.sample();
      maturities.push(year);
      rates.push(Math.max(0, shifted));
    }

    return new YieldCurve(maturities, rates);
  }

  /**
   * Reprices the bond against `simulationCount` shifted curves.
   * A single trial reports a standard deviation of 0.
   */
  public monteCarlo(): MonteCarloResult {
    const startedAt = Date.now();
    const prices: number[] = [];

    for (let i = 0; i < this.simulationCount; i++) {
      prices.push(this.price(this.shiftCurve()));
    }

    const summary = summarize(prices);
    const result: MonteCarloResult = {
      simulations: summary.count,
      mean: summary.mean,
      stdDev: summary.stdDev,
      standardError: summary.standardError,
      p05: summary.p05,
      p95: summary.p95,
      ...(this.seed !== undefined ? { seed: this.seed } : {}),
    };

    this.logger.debug("Monte Carlo run completed", {
      simulations: result.simulations,
      mean: result.mean,
      stdDev: result.stdDev,
      seed: this.seed,
      durationMs: Date.now() - startedAt,
    });

    return result;
  }

  public value(): Valuation {
    return {
      staticPrice: this.staticPrice(),
      monteCarlo: this.monteCarlo(),
    };
  }
}
