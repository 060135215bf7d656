/**
 * Position domain types.
 */

import type { Decimal } from "../shared/decimal.js";
import type { TradingSymbol } from "../shared/identifiers.js";

/**
 * Point-in-time copy of the local position replica. Size, notional and
 * average price are always overwritten from the venue's report, never
 * computed from fills.
 */
export interface PositionSnapshot {
	readonly symbol: TradingSymbol;
	/** Long-only. */
	readonly side: "long";
	readonly size: Decimal;
	readonly notional: Decimal;
	readonly avgPrice: Decimal;
	/** Count of scale-in entries made into the current position. */
	readonly dcaLevel: number;
	readonly tradableBalance: Decimal;
	readonly updatedAtMs: number;
}

/** What a position sync did to the replica. */
export const SyncOutcome = {
	/** The venue reported a position; the replica now mirrors it. */
	Updated: "updated",
	/** No position on either side. */
	Flat: "flat",
	/** The venue is flat but the replica was open; the replica was reset. */
	Reset: "reset",
} as const;

export type SyncOutcome = (typeof SyncOutcome)[keyof typeof SyncOutcome];

export interface PositionSyncResult {
	readonly outcome: SyncOutcome;
	readonly snapshot: PositionSnapshot;
}

export interface ResyncNotice {
	/** The replica as it was before the reset. */
	readonly previous: PositionSnapshot;
	readonly atMs: number;
}

export type SynchronizerEvents = {
	/** The venue flattened the position out-of-band; dependent state must be cleared. */
	resyncRequired: (notice: ResyncNotice) => void;
	positionChanged: (snapshot: PositionSnapshot) => void;
};

export function isOpen(snapshot: PositionSnapshot): boolean {
	return snapshot.size.isPositive();
}
