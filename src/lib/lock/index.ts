/**
 * AsyncLock: serializes async critical sections on a shared entity.
 *
 * Each `run` waits for the previous holder to settle before starting, so a
 * read-modify-write that spans awaits never interleaves with another one.
 * A failing section releases the lock and propagates its error to its own
 * caller only.
 */
export class AsyncLock {
	private tail: Promise<void> = Promise.resolve();
	private pending = 0;

	/** Runs `fn` once every earlier section has finished. */
	run<T>(fn: () => Promise<T> | T): Promise<T> {
		this.pending++;
		const result = this.tail.then(() => fn());
		this.tail = result.then(
			() => this.release(),
			() => this.release(),
		);
		return result;
	}

	/** True while a section is running or queued. */
	get isLocked(): boolean {
		return this.pending > 0;
	}

	private release(): void {
		this.pending--;
	}
}
