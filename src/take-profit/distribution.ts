import { Decimal } from "../shared/decimal.js";
import type { TradingConstraints } from "../venue/types.js";

export type QuantityConstraints = Pick<TradingConstraints, "minOrderQty" | "qtyStep">;

/**
 * Splits `total` into `levels` leg quantities.
 *
 * Each leg gets `total × fraction` (default 1/levels), raised to the minimum
 * order quantity and floored to the quantity step; the remainder goes to the
 * last leg. When that would overspend, as many legs as `total` can fund get
 * the minimum, the rest is spread over them step-floored, any leftover lands
 * on the last funded leg and unfunded legs get zero.
 *
 * The result always sums to at most `total`.
 *
 * @example
 * distributeLegQuantities(Decimal.from("1.003"), 5, 0.2, { minOrderQty: d("0.001"), qtyStep: d("0.001") })
 * // → [0.2, 0.2, 0.2, 0.2, 0.203]
 */
export function distributeLegQuantities(
	total: Decimal,
	levels: number,
	fraction: number | undefined,
	constraints: QuantityConstraints,
): Decimal[] {
	if (levels < 1 || !total.isPositive()) {
		return Array.from({ length: Math.max(levels, 0) }, () => Decimal.zero());
	}
	const { minOrderQty, qtyStep } = constraints;
	const even = fraction === undefined ? total.div(levels) : total.mul(fraction);
	const base = Decimal.max(even, minOrderQty).floorToStep(qtyStep);

	if (base.mul(levels).lte(total)) {
		const legs = Array.from({ length: levels }, () => base);
		const remainder = total.sub(base.mul(levels));
		legs[levels - 1] = base.add(remainder);
		return legs;
	}

	const legs = Array.from({ length: levels }, () => Decimal.zero());
	if (!minOrderQty.isPositive()) {
		legs[levels - 1] = total;
		return legs;
	}
	const funded = Math.min(levels, Math.floor(total.div(minOrderQty).toNumber()));
	if (funded === 0) return legs;

	const remainder = total.sub(minOrderQty.mul(funded));
	const extra = remainder.div(funded).floorToStep(qtyStep);
	for (let i = 0; i < funded; i++) {
		legs[i] = minOrderQty.add(extra);
	}
	const leftover = remainder.sub(extra.mul(funded));
	legs[funded - 1] = minOrderQty.add(extra).add(leftover);
	return legs;
}
