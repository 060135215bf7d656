/**
 * Decimal: safe financial math facade.
 *
 * All quantities, prices, notionals and balances are Decimal. Raw `number`
 * is reserved for ratios (percentages, thresholds) and indicator math.
 */

export { LibDecimal as Decimal } from "../lib/decimal/index.js";
export type { DecimalInput } from "../lib/decimal/index.js";
