// Source of truth for request/response shapes shared by the pricing packages,
// the HTTP service and the CLI.

import { z } from "zod";

/** -----------------------------------------------------------------------
 *  Errors
 *  -------------------------------------------------------------------- */

/**
 * Raised synchronously when a curve, bond or simulation setting breaks a
 * construction precondition. Nothing is built when this is thrown.
 */
export class InvalidInputError extends Error {
  /** Name of the offending input field (e.g. "faceValue"). */
  public readonly field: string;

  public constructor(field: string, message: string) {
    super(message);
    this.name = "InvalidInputError";
    this.field = field;
  }
}

/** Type guard usable across package boundaries. */
export const isInvalidInputError = (error: unknown): error is InvalidInputError => {
  return error instanceof InvalidInputError;
};

/** -----------------------------------------------------------------------
 *  Yield curve input
 *  -------------------------------------------------------------------- */

/** A single (maturity, rate) knot. Rates are decimals (0.03 for 3%). */
export interface CurvePoint {
  /** Time to maturity in years. */
  maturity: number;
  /** Annual rate at that maturity. */
  rate: number;
}

/** Runtime validator for {@link CurvePoint}. */
export const CurvePointSchema = z.object({
  maturity: z.number().finite().positive(),
  rate: z.number().finite(),
});

/**
 * Curve as two matched sequences. Ordering and length agreement are checked
 * by the curve itself so the same rules apply to every construction path.
 */
export interface YieldCurveInput {
  maturities: number[];
  rates: number[];
}

/** Runtime validator for {@link YieldCurveInput}. */
export const YieldCurveInputSchema = z.object({
  maturities: z.array(z.number().finite()).min(1),
  rates: z.array(z.number().finite()).min(1),
});

/**
 * Demonstration curve used when a caller does not bring its own.
 */
export const DEMO_CURVE: Readonly<YieldCurveInput> = Object.freeze({
  maturities: [1, 2, 3, 5, 10, 30],
  rates: [0.01, 0.015, 0.02, 0.025, 0.03, 0.035],
});

/** -----------------------------------------------------------------------
 *  Bond terms
 *  -------------------------------------------------------------------- */

/**
 * Fixed-coupon or zero-coupon bond.
 * A bond is treated as zero-coupon only when `couponRate` is 0 and
 * `couponsPerYear` is 1.
 */
export interface BondTerms {
  /** Redemption amount paid at maturity. */
  faceValue: number;
  /** Annual coupon as a decimal (0.05 for 5%). */
  couponRate: number;
  /** Whole years until redemption. */
  yearsToMaturity: number;
  /** Coupon payments per year. */
  couponsPerYear: number;
}

/**
 * Runtime validator for {@link BondTerms}. Key order is the order in which
 * fields are checked, and the first failure is the one reported.
 */
export const BondTermsSchema = z.object({
  faceValue: z
    .number({ invalid_type_error: "Face value must be a number" })
    .finite("Face value must be finite")
    .positive("Face value must be positive"),
  couponRate: z
    .number({ invalid_type_error: "Coupon rate must be a number" })
    .finite("Coupon rate must be finite")
    .nonnegative("Coupon rate cannot be negative"),
  yearsToMaturity: z
    .number({ invalid_type_error: "Years to maturity must be a number" })
    .int("Years to maturity must be a whole number")
    .positive("Years to maturity must be positive"),
  couponsPerYear: z
    .number({ invalid_type_error: "Coupons per year must be a number" })
    .int("Coupons per year must be a whole number")
    .positive("Coupons per year must be positive"),
});

/** Simulation count validator shared by the engine and the API. */
export const SimulationCountSchema = z
  .number({ invalid_type_error: "Number of simulations must be a number" })
  .int("Number of simulations must be a whole number")
  .positive("Number of simulations must be positive");

/** -----------------------------------------------------------------------
 *  PricingRequest / PricingResult
 *  -------------------------------------------------------------------- */

/** Body of `POST /api/price`. */
export interface PricingRequest {
  bond: BondTerms;
  /** Falls back to {@link DEMO_CURVE} when omitted. */
  curve?: YieldCurveInput;
  /** Number of Monte Carlo trials. */
  simulations: number;
  /** Optional RNG seed for reproducible runs. */
  seed?: number;
}

/** Runtime validator for {@link PricingRequest}. */
export const PricingRequestSchema = z.object({
  bond: BondTermsSchema,
  curve: YieldCurveInputSchema.optional(),
  simulations: SimulationCountSchema,
  seed: z.number().int().nonnegative().optional(),
});

/** Aggregate of the Monte Carlo trial prices. */
export interface MonteCarloSummary {
  simulations: number;
  mean: number;
  stdDev: number;
  standardError: number;
  p05: number;
  p95: number;
  /** Seed that drove the shocks; absent when an external source was injected. */
  seed?: number;
}

/**
 * One discounted payment in the coupon schedule.
 */
export interface CashFlow {
  /** Payment index, starting at 1. */
  readonly period: number;
  /** Payment time in years. */
  readonly time: number;
  /** Coupon, plus face value on the final payment. */
  readonly amount: number;
  /** Curve rate used for discounting. */
  readonly rate: number;
  readonly discountFactor: number;
  readonly presentValue: number;
}

/** Runtime validator for {@link CashFlow}. */
export const CashFlowSchema = z.object({
  period: z.number().int().positive(),
  time: z.number().positive(),
  amount: z.number().nonnegative(),
  rate: z.number(),
  discountFactor: z.number().nonnegative(),
  presentValue: z.number().nonnegative(),
});

/** Reply of `POST /api/price`. */
export interface PricingResult {
  requestId: string;
  bond: BondTerms;
  isZeroCoupon: boolean;
  staticPrice: number;
  monteCarlo: MonteCarloSummary;
  /** Payment schedule discounted against the base curve. */
  cashFlows: CashFlow[];
}

/** Runtime validator for {@link PricingResult}. */
export const PricingResultSchema = z.object({
  requestId: z.string().min(1),
  bond: BondTermsSchema,
  isZeroCoupon: z.boolean(),
  staticPrice: z.number().finite(),
  monteCarlo: z.object({
    simulations: z.number().int().positive(),
    mean: z.number().finite(),
    stdDev: z.number().nonnegative(),
    standardError: z.number().nonnegative(),
    p05: z.number(),
    p95: z.number(),
    seed: z.number().int().optional(),
  }),
  cashFlows: z.array(CashFlowSchema),
});

/** -----------------------------------------------------------------------
 *  Runtime settings shared by the service and the CLI
 *  -------------------------------------------------------------------- */

/**
 * Environment variables every pricing entry point honours. Values arrive as
 * strings and are coerced.
 */
export const PricingEnvSchema = z.object({
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
  SHOCK_STD_DEV: z.coerce.number().finite().nonnegative().default(0.005),
});

/** -----------------------------------------------------------------------
 *  Helper: runtime assertion using zod
 *  -------------------------------------------------------------------- */

/**
 * Validates the supplied payload against the provided schema.
 *
 * Only the first issue is reported, so callers see the earliest failing
 * field in schema order.
 *
 * @param label - Descriptive label prefixed to the error message.
 * @throws InvalidInputError naming the first offending field.
 */
export function assertValid<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  value: unknown,
  label?: string,
): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue && issue.path.length > 0 ? issue.path.join(".") : "(root)";
    const detail = issue?.message ?? "invalid value";
    throw new InvalidInputError(field, label ? `Invalid ${label}: ${field}: ${detail}` : detail);
  }
  return parsed.data;
}
