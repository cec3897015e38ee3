export { BondValuationEngine, DEFAULT_SHOCK_STD_DEV } from "./engine.js";
export type {
  CashFlow,
  MonteCarloResult,
  Valuation,
  ValuationEngineConfig,
  ValuationEngineOptions,
} from "./types.js";
