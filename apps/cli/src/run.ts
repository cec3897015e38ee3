import { DEMO_CURVE, InvalidInputError } from "@bond-mc/sdk";
import { YieldCurve } from "@bond-mc/curve";
import { BondValuationEngine, type Valuation } from "@bond-mc/engine";
import type { Logger } from "@bond-mc/logger";

/**
 * Terminal seam: prompts, standard output and the error stream.
 */
export interface CliIO {
  ask(question: string): Promise<string>;
  out(line: string): void;
  err(line: string): void;
}

export interface RunCliOptions {
  readonly logger?: Logger;
  /** Fixes the shock generator; drawn from OS entropy when omitted. */
  readonly seed?: number;
  /** Standard deviation of each curve-point shock. */
  readonly shockStdDev?: number;
}

interface Prompt {
  readonly question: string;
  readonly label: string;
}

const PROMPTS = {
  faceValue: { question: "Enter bond face value: ", label: "Face value" },
  couponRate: { question: "Enter annual coupon rate (as a decimal): ", label: "Coupon rate" },
  yearsToMaturity: { question: "Enter years to maturity: ", label: "Years to maturity" },
  couponsPerYear: { question: "Enter coupons per year: ", label: "Coupons per year" },
  simulationCount: {
    question: "Enter number of Monte Carlo simulations: ",
    label: "Number of simulations",
  },
} satisfies Record<string, Prompt>;

type PromptField = keyof typeof PROMPTS;

export const parseNumberInput = (raw: string, field: string, label: string): number => {
  const trimmed = raw.trim();
  const value = Number(trimmed);
  if (trimmed.length === 0 || Number.isNaN(value)) {
    throw new InvalidInputError(field, `${label} must be a number, got "${trimmed}"`);
  }
  return value;
};

export const formatCurrency = (value: number): string => `$${value.toFixed(2)}`;

export const formatResults = (valuation: Valuation): string[] => {
  const { staticPrice, monteCarlo } = valuation;
  return [
    "",
    "Results:",
    `Static Bond Price: ${formatCurrency(staticPrice)}`,
    `Monte Carlo Bond Price: ${formatCurrency(monteCarlo.mean)} ± ${formatCurrency(monteCarlo.stdDev)}`,
  ];
};

/**
 * Collects bond terms, prices them against the demonstration curve and
 * prints the results.
 *
 * @returns Process exit status: 0 on success, 1 on any failure.
 */
export const runCli = async (io: CliIO, options: RunCliOptions = {}): Promise<number> => {
  try {
    const ask = async (field: PromptField): Promise<number> => {
      const { question, label } = PROMPTS[field];
      return parseNumberInput(await io.ask(question), field, label);
    };

    const faceValue = await ask("faceValue");
    const couponRate = await ask("couponRate");
    const yearsToMaturity = await ask("yearsToMaturity");
    const couponsPerYear = await ask("couponsPerYear");
    const simulationCount = await ask("simulationCount");

    const engine = new BondValuationEngine(
      {
        faceValue,
        couponRate,
        yearsToMaturity,
        couponsPerYear,
        simulationCount,
        curve: new YieldCurve(DEMO_CURVE.maturities, DEMO_CURVE.rates),
        seed: options.seed,
        shockStdDev: options.shockStdDev,
      },
      { logger: options.logger },
    );

    for (const line of formatResults(engine.value())) {
      io.out(line);
    }
    return 0;
  } catch (error) {
    io.err(`Error: ${error instanceof Error ? error.message : String(error)}`);
    return 1;
  }
};
