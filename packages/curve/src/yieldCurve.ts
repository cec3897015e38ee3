import { InvalidInputError, type CurvePoint } from "@bond-mc/sdk";

/**
 * Immutable term structure with flat extrapolation and linear interpolation
 * between knots.
 *
 * Maturities must be positive and strictly increasing, one rate per maturity.
 */
export class YieldCurve {
  public readonly maturities: readonly number[];
  public readonly rates: readonly number[];

  public constructor(maturities: readonly number[], rates: readonly number[]) {
    if (maturities.length !== rates.length) {
      throw new InvalidInputError("rates", "Maturities and rates must have the same size");
    }
    if (maturities.length === 0) {
      throw new InvalidInputError("maturities", "Yield curve needs at least one point");
    }

    for (let i = 0; i < maturities.length; i++) {
      const maturity = maturities[i]!;
      if (!Number.isFinite(maturity) || maturity <= 0) {
        throw new InvalidInputError("maturities", `Maturity at index ${i} must be positive`);
      }
      if (i > 0 && maturity <= maturities[i - 1]!) {
        throw new InvalidInputError(
          "maturities",
          `Maturities must be strictly increasing (index ${i}: ${maturity})`,
        );
      }
      if (!Number.isFinite(rates[i]!)) {
        throw new InvalidInputError("rates", `Rate at index ${i} must be finite`);
      }
    }

    this.maturities = Object.freeze([...maturities]);
    this.rates = Object.freeze([...rates]);
  }

  public static fromPoints(points: readonly CurvePoint[]): YieldCurve {
    return new YieldCurve(
      points.map((p) => p.maturity),
      points.map((p) => p.rate),
    );
  }

  public get size(): number {
    return this.maturities.length;
  }

  public get firstMaturity(): number {
    return this.maturities[0]!;
  }

  public get lastMaturity(): number {
    return this.maturities[this.maturities.length - 1]!;
  }

  public points(): CurvePoint[] {
    return this.maturities.map((maturity, i) => ({ maturity, rate: this.rates[i]! }));
  }

  /**
   * Rate applicable at time `t` (years).
   *
   * Flat below the first and above the last maturity; a knot returns its own
   * rate unchanged.
   */
  public interpolate(t: number): number {
    const last = this.maturities.length - 1;
    if (t <= this.maturities[0]!) {
      return this.rates[0]!;
    }
    if (t >= this.maturities[last]!) {
      return this.rates[last]!;
    }

    const index = this.lowerBound(t);
    const t1 = this.maturities[index]!;
    const r1 = this.rates[index]!;
    if (t1 === t) {
      return r1;
    }

    const t0 = this.maturities[index - 1]!;
    const r0 = this.rates[index - 1]!;
    return r0 + ((r1 - r0) * (t - t0)) / (t1 - t0);
  }

  /** Index of the first maturity >= t. */
  private lowerBound(t: number): number {
    let lo = 0;
    let hi = this.maturities.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      if (this.maturities[mid]! < t) {
        lo = mid + 1;
      } else {
        hi = mid;
      }
    }
    return lo;
  }
}
