import EventEmitter from "eventemitter3";

/**
 * Generic typed event map -- keys are event names, values are handler signatures.
 * Example: { resyncRequired: (reason: string) => void }
 */
// biome-ignore lint/suspicious/noExplicitAny: base constraint for event handler signatures
export type EventMap = Record<string, (...args: any[]) => void>;

type Listener = (...args: unknown[]) => void;

/** Receives exceptions thrown by listeners so they never reach the emitter's caller. */
export type ListenerErrorHandler = (event: string, error: unknown) => void;

/**
 * Type-safe event emitter over eventemitter3.
 *
 * Listener exceptions are isolated: they go to `onListenerError` and the
 * remaining listeners still run. `emitDeferred` schedules delivery on a
 * microtask so the emitting code path never waits on observers.
 *
 * @example
 * ```ts
 * type Events = { legFilled: (level: number) => void };
 * const emitter = new TypedEmitter<Events>();
 * emitter.on("legFilled", (level) => console.log(level));
 * emitter.emit("legFilled", 2);
 * ```
 */
export class TypedEmitter<TEvents extends EventMap> {
	private readonly ee = new EventEmitter();
	private readonly onListenerError: ListenerErrorHandler;
	private readonly guards = new Map<string, Map<unknown, Listener>>();

	constructor(onListenerError: ListenerErrorHandler = () => {}) {
		this.onListenerError = onListenerError;
	}

	on<K extends keyof TEvents & string>(event: K, handler: TEvents[K]): this {
		this.ee.on(event, this.guard(event, handler));
		return this;
	}

	off<K extends keyof TEvents & string>(event: K, handler: TEvents[K]): this {
		const guarded = this.guards.get(event)?.get(handler);
		if (guarded) {
			this.ee.off(event, guarded);
			this.guards.get(event)?.delete(handler);
		}
		return this;
	}

	once<K extends keyof TEvents & string>(event: K, handler: TEvents[K]): this {
		this.ee.once(event, this.guard(event, handler));
		return this;
	}

	/**
	 * Invokes every handler synchronously, isolating their failures.
	 * @returns true if the event had listeners
	 */
	emit<K extends keyof TEvents & string>(event: K, ...args: Parameters<TEvents[K]>): boolean {
		return this.ee.emit(event, ...args);
	}

	/** Schedules `emit` on a microtask. */
	emitDeferred<K extends keyof TEvents & string>(event: K, ...args: Parameters<TEvents[K]>): void {
		queueMicrotask(() => {
			this.emit(event, ...args);
		});
	}

	private guard(event: string, handler: (...args: never[]) => void): Listener {
		const guarded: Listener = (...args) => {
			try {
				Reflect.apply(handler, undefined, args);
			} catch (e) {
				this.onListenerError(event, e);
			}
		};
		let byHandler = this.guards.get(event);
		if (!byHandler) {
			byHandler = new Map();
			this.guards.set(event, byHandler);
		}
		byHandler.set(handler, guarded);
		return guarded;
	}

	removeAllListeners<K extends keyof TEvents & string>(event?: K): this {
		if (event) {
			this.ee.removeAllListeners(event);
			this.guards.delete(event);
		} else {
			this.ee.removeAllListeners();
			this.guards.clear();
		}
		return this;
	}

	listenerCount<K extends keyof TEvents & string>(event: K): number {
		return this.ee.listenerCount(event);
	}
}
