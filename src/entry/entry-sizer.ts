/**
 * DCA entry sizer.
 *
 * Each entry spends `baseAmount × min(1 + 0.5 × level, maxMultiplier)` of the
 * quote asset, converted to base quantity and floored to the venue's step.
 */

import { Decimal } from "../shared/decimal.js";
import type { DecimalInput } from "../shared/decimal.js";
import { OrderError } from "../shared/errors.js";
import { err, ok } from "../shared/result.js";
import type { Result } from "../shared/result.js";
import type { TradingConstraints } from "../venue/types.js";

/** Per-level growth of the entry amount. */
export const LEVEL_STEP = Decimal.from("0.5");

export interface EntrySizingInput {
	readonly baseAmount: DecimalInput;
	/** Entries already made; 0 for the first. */
	readonly dcaLevel: number;
	readonly maxMultiplier: DecimalInput;
	readonly price: Decimal;
	readonly balance: Decimal;
	readonly constraints: TradingConstraints;
}

export interface EntrySize {
	readonly multiplier: Decimal;
	readonly quantity: Decimal;
	/** quantity × price after flooring. */
	readonly notional: Decimal;
}

export function entryMultiplier(dcaLevel: number, maxMultiplier: DecimalInput): Decimal {
	return Decimal.min(Decimal.one().add(LEVEL_STEP.mul(dcaLevel)), Decimal.from(maxMultiplier));
}

export function sizeEntry(input: EntrySizingInput): Result<EntrySize, OrderError> {
	const { price, balance, constraints } = input;
	if (!price.isPositive()) {
		return err(
			new OrderError(
				"cannot size an entry without a price",
				{ price: price.toString() },
				{ retryable: false, code: "INVALID_PARAMETERS" },
			),
		);
	}

	const multiplier = entryMultiplier(input.dcaLevel, input.maxMultiplier);
	const amount = Decimal.from(input.baseAmount).mul(multiplier);
	const quantity = amount.div(price).floorToStep(constraints.qtyStep);
	const notional = quantity.mul(price);
	const context = { quantity: quantity.toString(), price: price.toString(), level: input.dcaLevel };

	if (quantity.isZero() || quantity.lt(constraints.minOrderQty)) {
		return err(
			new OrderError(
				`entry quantity ${quantity.toString()} below minimum ${constraints.minOrderQty.toString()}`,
				context,
				{ retryable: false, code: "BELOW_MIN_QTY" },
			),
		);
	}
	if (notional.lt(constraints.minOrderValue)) {
		return err(
			new OrderError(
				`entry notional ${notional.toString()} below minimum ${constraints.minOrderValue.toString()}`,
				context,
				{ retryable: false, code: "BELOW_MIN_NOTIONAL" },
			),
		);
	}
	if (notional.gt(balance)) {
		return err(
			new OrderError(
				`insufficient balance for entry: need ${notional.toString()}, have ${balance.toString()}`,
				{ ...context, balance: balance.toString() },
				{ retryable: false, code: "INSUFFICIENT_BALANCE" },
			),
		);
	}
	return ok({ multiplier, quantity, notional });
}
