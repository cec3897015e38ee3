/**
 * Seeded pseudo-random sources for Monte Carlo trials
 *
 * Every consumer owns its generator. Independent workers need independently
 * seeded instances; one instance must never be shared across them.
 */

import { randomInt } from "node:crypto";
import type { NormalSource, UniformSource } from "./types.js";

const MODULUS = 2147483648;

/**
 * Draw a seed from the operating system's entropy pool
 */
export function createSeed(): number {
  return randomInt(0, MODULUS - 1);
}

/**
 * Seeded random number generator for reproducible simulations
 */
export class SeededRandom implements UniformSource {
  private state: number;

  public constructor(seed: number) {
    this.state = Math.trunc(seed) & 0x7fffffff;
  }

  /**
   * Generate next random number in [0, 1)
   * Using a simple LCG (Linear Congruential Generator) modulo 2^31
   */
  public next(): number {
    this.state = (Math.imul(this.state, 1103515245) + 12345) & 0x7fffffff;
    return this.state / MODULUS;
  }
}

/**
 * Normal(mean, stdDev) draws via the Box-Muller transform.
 *
 * Each transform yields two independent variates; the second is kept for the
 * next call.
 */
export class NormalSampler implements NormalSource {
  private spare: number | null = null;

  public constructor(
    private readonly rng: UniformSource,
    public readonly mean = 0,
    public readonly stdDev = 1,
  ) {
    if (!Number.isFinite(stdDev) || stdDev < 0) {
      throw new Error(`Standard deviation must be non-negative, got ${stdDev}`);
    }
  }

  public sample(): number {
    return this.mean + this.stdDev * this.standard();
  }

  private standard(): number {
    if (this.spare !== null) {
      const value = this.spare;
      this.spare = null;
      return value;
    }

    let u1 = this.rng.next();
    while (u1 === 0) {
      u1 = this.rng.next();
    }
    const u2 = this.rng.next();

    const radius = Math.sqrt(-2 * Math.log(u1));
    const angle = 2 * Math.PI * u2;
    this.spare = radius * Math.sin(angle);
    return radius * Math.cos(angle);
  }
}
