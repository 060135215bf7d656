/**
 * Take-profit bounded context: legs, placement summaries and events.
 */

import type { Decimal } from "../shared/decimal.js";
import type { TradingSymbol, VenueOrderId } from "../shared/identifiers.js";

export const LegStatus = {
	Pending: "pending",
	Filled: "filled",
} as const;

export type LegStatus = (typeof LegStatus)[keyof typeof LegStatus];

/** One limit sell in the set that exits the position in tranches. */
export interface TakeProfitLeg {
	/** 1..N; higher levels sit further above the average price. */
	readonly level: number;
	readonly orderId: VenueOrderId;
	readonly targetPrice: Decimal;
	readonly quantity: Decimal;
	readonly status: LegStatus;
	readonly placedAtMs: number;
}

export interface PlacementSummary {
	readonly placed: number;
	/** Legs below the venue's minimum quantity or notional. */
	readonly skipped: number;
	readonly failed: number;
	/** Placement stopped early because the batch budget ran low. */
	readonly timedOut: boolean;
	readonly legs: readonly TakeProfitLeg[];
}

export interface CancelSummary {
	readonly cancelled: number;
	readonly failed: number;
	/** True when the venue query failed and tracked ids were used instead. */
	readonly fromMemory: boolean;
}

/** Inputs handed to a dynamic take-profit source. */
export interface TakeProfitContext {
	readonly symbol: TradingSymbol;
	readonly avgPrice: Decimal;
	readonly totalQuantity: Decimal;
}

/**
 * Returns the take-profit distance of the last leg as a fraction
 * (0.02 = 2%), e.g. from volatility indicators.
 */
export type DynamicTakeProfitSource = (context: TakeProfitContext) => number | Promise<number>;

export type TakeProfitEvents = {
	legFilled: (leg: TakeProfitLeg) => void;
	legsPlaced: (summary: PlacementSummary) => void;
};
