import { strict as assert } from "node:assert";
import test from "node:test";

import { PricingResultSchema } from "@bond-mc/sdk";
import { YieldCurve } from "@bond-mc/curve";
import { BondValuationEngine } from "@bond-mc/engine";
import { createLogger } from "@bond-mc/logger";

import { createFastifyServer } from "../src/server.js";

// Keeps request logs out of the test output
const quietLogger = createLogger("test/api", { level: "error" });

const parBond = {
  faceValue: 1000,
  couponRate: 0.05,
  yearsToMaturity: 10,
  couponsPerYear: 2,
};

const flatCurve = { maturities: [1, 30], rates: [0.05, 0.05] };

// ============================================================================
// Pricing Routes Tests
// ============================================================================

test("GET /api/health reports ok", async (t) => {
  const app = createFastifyServer({ logger: quietLogger });
  t.after(async () => {
    await app.close();
  });

  const response = await app.inject({ method: "GET", url: "/api/health" });

  assert.equal(response.statusCode, 200);
  assert.deepEqual(response.json(), { status: "ok" });
});

test("GET /api/curves/demo returns the demonstration curve", async (t) => {
  const app = createFastifyServer({ logger: quietLogger });
  t.after(async () => {
    await app.close();
  });

  const response = await app.inject({ method: "GET", url: "/api/curves/demo" });

  assert.equal(response.statusCode, 200);
  assert.deepEqual(response.json(), {
    maturities: [1, 2, 3, 5, 10, 30],
    rates: [0.01, 0.015, 0.02, 0.025, 0.03, 0.035],
  });
});

test("POST /api/price prices a par bond against a supplied curve", async (t) => {
  const app = createFastifyServer({ logger: quietLogger });
  t.after(async () => {
    await app.close();
  });

  const response = await app.inject({
    method: "POST",
    url: "/api/price",
    payload: { bond: parBond, curve: flatCurve, simulations: 250, seed: 11 },
  });

  assert.equal(response.statusCode, 200);
  const body = PricingResultSchema.parse(response.json());
  assert.ok(body.requestId.length > 0);
  assert.deepEqual(body.bond, parBond);
  assert.equal(body.isZeroCoupon, false);
  assert.ok(Math.abs(body.staticPrice - 1000) < 0.01);
  assert.equal(body.cashFlows.length, 20);
  assert.deepEqual(body.cashFlows[0], {
    period: 1,
    time: 0.5,
    amount: 25,
    rate: 0.05,
    discountFactor: 1 / (1 + 0.05 / 2),
    presentValue: 25 * (1 / (1 + 0.05 / 2)),
  });
  assert.equal(body.cashFlows[19]?.amount, 1025);

  const expected = new BondValuationEngine(
    {
      ...parBond,
      curve: new YieldCurve(flatCurve.maturities, flatCurve.rates),
      simulationCount: 250,
      seed: 11,
    },
    { logger: quietLogger },
  ).monteCarlo();
  assert.deepEqual(body.monteCarlo, expected);
});

test("POST /api/price falls back to the demonstration curve", async (t) => {
  const app = createFastifyServer({ logger: quietLogger });
  t.after(async () => {
    await app.close();
  });

  const response = await app.inject({
    method: "POST",
    url: "/api/price",
    payload: {
      bond: { faceValue: 1000, couponRate: 0, yearsToMaturity: 10, couponsPerYear: 1 },
      simulations: 10,
      seed: 1,
    },
  });

  assert.equal(response.statusCode, 200);
  const body = response.json();
  assert.equal(body.isZeroCoupon, true);
  // demo curve is at 3% for ten years
  assert.equal(body.staticPrice, 1000 / Math.pow(1 + 0.03, 10));
  assert.equal(body.monteCarlo.simulations, 10);
  assert.equal(body.monteCarlo.seed, 1);
});

test("POST /api/price rejects an invalid bond with the offending field", async (t) => {
  const app = createFastifyServer({ logger: quietLogger });
  t.after(async () => {
    await app.close();
  });

  const response = await app.inject({
    method: "POST",
    url: "/api/price",
    payload: { bond: { ...parBond, faceValue: -1 }, simulations: 10 },
  });

  assert.equal(response.statusCode, 400);
  assert.deepEqual(response.json(), {
    message: "Invalid PricingRequest: bond.faceValue: Face value must be positive",
    field: "bond.faceValue",
  });
});

test("POST /api/price rejects a missing body", async (t) => {
  const app = createFastifyServer({ logger: quietLogger });
  t.after(async () => {
    await app.close();
  });

  const response = await app.inject({ method: "POST", url: "/api/price" });

  assert.equal(response.statusCode, 400);
  assert.equal(response.json().field, "(root)");
});

test("POST /api/price rejects mismatched curve sequences", async (t) => {
  const app = createFastifyServer({ logger: quietLogger });
  t.after(async () => {
    await app.close();
  });

  const response = await app.inject({
    method: "POST",
    url: "/api/price",
    payload: {
      bond: parBond,
      curve: { maturities: [1, 2, 3], rates: [0.01, 0.02] },
      simulations: 10,
    },
  });

  assert.equal(response.statusCode, 400);
  assert.deepEqual(response.json(), {
    message: "Maturities and rates must have the same size",
    field: "curve.rates",
  });
});

test("POST /api/price rejects an unsorted curve", async (t) => {
  const app = createFastifyServer({ logger: quietLogger });
  t.after(async () => {
    await app.close();
  });

  const response = await app.inject({
    method: "POST",
    url: "/api/price",
    payload: {
      bond: parBond,
      curve: { maturities: [5, 1], rates: [0.01, 0.02] },
      simulations: 10,
    },
  });

  assert.equal(response.statusCode, 400);
  assert.equal(response.json().field, "curve.maturities");
});

test("POST /api/price rejects a curve that cannot discount", async (t) => {
  const app = createFastifyServer({ logger: quietLogger });
  t.after(async () => {
    await app.close();
  });

  const response = await app.inject({
    method: "POST",
    url: "/api/price",
    payload: {
      bond: { faceValue: 1000, couponRate: 0, yearsToMaturity: 2, couponsPerYear: 1 },
      curve: { maturities: [1, 30], rates: [-1, -1] },
      simulations: 10,
      seed: 5,
    },
  });

  assert.equal(response.statusCode, 400);
  assert.deepEqual(response.json(), {
    message: "Curve rate -1 at 2 years leaves no positive discount base",
    field: "curve",
  });
});

test("POST /api/price enforces the configured simulation cap", async (t) => {
  const app = createFastifyServer({ logger: quietLogger, config: { maxSimulations: 100 } });
  t.after(async () => {
    await app.close();
  });

  const response = await app.inject({
    method: "POST",
    url: "/api/price",
    payload: { bond: parBond, simulations: 101 },
  });

  assert.equal(response.statusCode, 400);
  assert.deepEqual(response.json(), {
    message: "Number of simulations must not exceed 100",
    field: "simulations",
  });
});

test("POST /api/price applies the configured shock size", async (t) => {
  const app = createFastifyServer({ logger: quietLogger, config: { shockStdDev: 0 } });
  t.after(async () => {
    await app.close();
  });

  const response = await app.inject({
    method: "POST",
    url: "/api/price",
    payload: { bond: parBond, curve: flatCurve, simulations: 20, seed: 3 },
  });

  assert.equal(response.statusCode, 200);
  const body = response.json();
  assert.ok(body.monteCarlo.stdDev < 1e-9);
  assert.ok(Math.abs(body.monteCarlo.mean - body.staticPrice) < 1e-9);
});

test("responses carry the CORS origin header", async (t) => {
  const app = createFastifyServer({ logger: quietLogger });
  t.after(async () => {
    await app.close();
  });

  const response = await app.inject({
    method: "GET",
    url: "/api/health",
    headers: { origin: "http://localhost:5173" },
  });

  assert.equal(response.headers["access-control-allow-origin"], "http://localhost:5173");
});
