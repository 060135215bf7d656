/**
 * Fixed-capacity FIFO for error reports. When full, new reports are dropped
 * and counted; producers never block.
 */
export class BoundedErrorQueue<T> {
	readonly capacity: number;
	private items: T[] = [];
	private droppedCount = 0;

	constructor(capacity = 100) {
		if (!Number.isInteger(capacity) || capacity < 1) {
			throw new RangeError(`capacity must be a positive integer, got ${capacity}`);
		}
		this.capacity = capacity;
	}

	/** @returns false when the queue was full and the report was dropped */
	push(item: T): boolean {
		if (this.items.length >= this.capacity) {
			this.droppedCount++;
			return false;
		}
		this.items.push(item);
		return true;
	}

	/** Removes and returns every queued report, oldest first. */
	drain(): T[] {
		const drained = this.items;
		this.items = [];
		return drained;
	}

	get size(): number {
		return this.items.length;
	}

	get dropped(): number {
		return this.droppedCount;
	}
}
