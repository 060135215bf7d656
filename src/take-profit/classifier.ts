import { Decimal } from "../shared/decimal.js";
import type { TradingSymbol, VenueOrderId } from "../shared/identifiers.js";
import { OrderSide, OrderType } from "../venue/types.js";
import type { OpenOrder } from "../venue/types.js";

/** Profit band, relative to the average entry, that a take-profit leg sits in. */
export const MIN_LEG_PROFIT = Decimal.from("0.001");
export const MAX_LEG_PROFIT = Decimal.from("0.15");
/** Larger orders look like full exits, not legs. */
export const MAX_LEG_SHARE = Decimal.from("0.7");

export interface ClassifierContext {
	readonly symbol: TradingSymbol;
	/** Current average entry; null or zero when unknown. */
	readonly avgPrice: Decimal | null;
	/** Live size plus the quantity of legs that already filled. */
	readonly estimatedFullPosition: Decimal;
	readonly trackedIds: ReadonlySet<VenueOrderId>;
}

/**
 * Decides whether a venue order is one of this bot's take-profit legs.
 *
 * Orders on the venue may come from a previous run or from a human, so
 * membership is judged from the order itself: a sell limit on the tracked
 * symbol, priced above the average entry within the profit band, and sized
 * at most 70% of the position. Without a known average price only ids the
 * manager placed itself are trusted.
 */
export function isTakeProfitOrder(order: OpenOrder, ctx: ClassifierContext): boolean {
	if (order.symbol !== ctx.symbol) return false;
	if (ctx.avgPrice === null || !ctx.avgPrice.isPositive()) {
		return ctx.trackedIds.has(order.orderId);
	}
	if (order.side !== OrderSide.Sell || order.type !== OrderType.Limit) return false;
	if (order.price === null || order.quantity === null) return false;
	if (!order.price.gt(ctx.avgPrice)) return false;

	const profit = order.price.sub(ctx.avgPrice).div(ctx.avgPrice);
	if (profit.lt(MIN_LEG_PROFIT) || profit.gt(MAX_LEG_PROFIT)) return false;

	if (ctx.estimatedFullPosition.isPositive()) {
		return order.quantity.lte(ctx.estimatedFullPosition.mul(MAX_LEG_SHARE));
	}
	return true;
}
