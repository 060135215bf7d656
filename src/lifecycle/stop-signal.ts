/**
 * Close-once stop request shared by the loop and everything it awaits.
 *
 * The underlying AbortSignal cancels sleeps and in-flight retries; `stop`
 * may be called any number of times but only the first reason sticks.
 */
export class StopSignal {
	private readonly controller = new AbortController();
	private stopReason: string | null = null;

	get signal(): AbortSignal {
		return this.controller.signal;
	}

	get requested(): boolean {
		return this.stopReason !== null;
	}

	get reason(): string | null {
		return this.stopReason;
	}

	/** @returns true for the call that actually requested the stop */
	stop(reason: string): boolean {
		if (this.stopReason !== null) return false;
		this.stopReason = reason;
		this.controller.abort(reason);
		return true;
	}
}
