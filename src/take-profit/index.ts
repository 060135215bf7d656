export { MAX_LEG_PROFIT, MAX_LEG_SHARE, MIN_LEG_PROFIT, isTakeProfitOrder } from "./classifier.js";
export type { ClassifierContext } from "./classifier.js";
export { distributeLegQuantities } from "./distribution.js";
export { AVG_PRICE_EPSILON, TakeProfitManager } from "./take-profit-manager.js";
export type { TakeProfitManagerConfig } from "./take-profit-manager.js";
export { LegStatus } from "./types.js";
export type {
	CancelSummary,
	DynamicTakeProfitSource,
	PlacementSummary,
	TakeProfitContext,
	TakeProfitEvents,
	TakeProfitLeg,
} from "./types.js";
