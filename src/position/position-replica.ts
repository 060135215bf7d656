import { AsyncLock } from "../lib/lock/index.js";
import { Decimal } from "../shared/decimal.js";
import type { TradingSymbol } from "../shared/identifiers.js";
import type { Clock } from "../shared/time.js";
import { SystemClock } from "../shared/time.js";
import type { PositionSnapshot } from "./types.js";

type PositionFields = Omit<PositionSnapshot, "symbol" | "side" | "updatedAtMs">;

/**
 * Local copy of the venue position behind a lock.
 *
 * Readers get the current frozen snapshot; writers run read-modify-write
 * sections through `update`, which never interleave.
 */
export class PositionReplica {
	private current: PositionSnapshot;
	private readonly lock = new AsyncLock();
	private readonly clock: Clock;

	constructor(symbol: TradingSymbol, clock: Clock = SystemClock) {
		this.clock = clock;
		const initial: PositionSnapshot = {
			symbol,
			side: "long",
			size: Decimal.zero(),
			notional: Decimal.zero(),
			avgPrice: Decimal.zero(),
			dcaLevel: 0,
			tradableBalance: Decimal.zero(),
			updatedAtMs: clock.now(),
		};
		this.current = Object.freeze(initial);
	}

	snapshot(): PositionSnapshot {
		return this.current;
	}

	/**
	 * Applies `fn` to the latest snapshot under the lock. Returning null leaves
	 * the replica untouched.
	 */
	update<T>(
		fn: (current: PositionSnapshot) => { readonly patch: Partial<PositionFields> | null; readonly result: T },
	): Promise<T> {
		return this.lock.run(() => {
			const { patch, result } = fn(this.current);
			if (patch !== null) {
				this.current = Object.freeze({ ...this.current, ...patch, updatedAtMs: this.clock.now() });
			}
			return result;
		});
	}

	/** Back to flat with DCA level 0; the tradable balance is kept. */
	reset(): Promise<PositionSnapshot> {
		return this.update(() => ({
			patch: { size: Decimal.zero(), notional: Decimal.zero(), avgPrice: Decimal.zero(), dcaLevel: 0 },
			result: undefined,
		})).then(() => this.current);
	}
}
