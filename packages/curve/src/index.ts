/**
 * Term-structure model used to discount bond cash flows
 * @packageDocumentation
 */

export { YieldCurve } from "./yieldCurve.js";
