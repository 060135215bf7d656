/**
 * LoopStateMachine: validated coordinator lifecycle.
 *
 * All transitions go through transition() which validates the move.
 * History is bounded (last N transitions) for debugging.
 */

import type { Result } from "../shared/result.js";
import { err, ok } from "../shared/result.js";
import type { Clock } from "../shared/time.js";
import { SystemClock } from "../shared/time.js";
import { LoopState, StateErrorKind } from "./types.js";
import type { HaltReason, LoopTransition, StateError, TransitionRecord } from "./types.js";

const MAX_HISTORY = 100;

export class LoopStateMachine {
	private current: LoopState = LoopState.Idle;
	private enteredAt: number;
	private haltReason: HaltReason | null = null;
	private readonly transitions: TransitionRecord[] = [];
	private readonly clock: Clock;

	constructor(clock: Clock = SystemClock) {
		this.clock = clock;
		this.enteredAt = clock.now();
	}

	// ── Queries ────────────────────────────────────────────────────

	state(): LoopState {
		return this.current;
	}

	/** Why the loop halted, while halted or after. */
	halted(): HaltReason | null {
		return this.haltReason;
	}

	isRunning(): boolean {
		return this.current === LoopState.Running;
	}

	timeInState(): number {
		return this.clock.now() - this.enteredAt;
	}

	/** Bounded transition history (most recent last) */
	history(): readonly TransitionRecord[] {
		return this.transitions;
	}

	// ── Transitions ────────────────────────────────────────────────

	transition(t: LoopTransition): Result<LoopState, StateError> {
		const from = this.current;
		if (from === LoopState.Stopped) {
			return err({ kind: StateErrorKind.AlreadyTerminal, message: "Loop already stopped", from, transition: t.type });
		}

		const to = nextState(from, t);
		if (to === null) {
			return err({
				kind: StateErrorKind.InvalidTransition,
				message: `Cannot transition from ${from} via ${t.type}`,
				from,
				transition: t.type,
			});
		}

		if (t.type === "halt") this.haltReason = t.reason;
		if (this.transitions.length >= MAX_HISTORY) {
			this.transitions.shift();
		}
		this.transitions.push({ from, to, transition: t.type, timestamp: this.clock.now() });
		this.current = to;
		this.enteredAt = this.clock.now();
		return ok(to);
	}
}

function nextState(from: LoopState, t: LoopTransition): LoopState | null {
	switch (t.type) {
		case "start":
			if (from === LoopState.Idle) return LoopState.Starting;
			break;
		case "started":
			if (from === LoopState.Starting) return LoopState.Running;
			break;
		case "halt":
			if (from === LoopState.Starting || from === LoopState.Running) return LoopState.Halted;
			break;
		case "stop":
			// Any non-terminal state can stop
			if (from !== LoopState.Stopping) return LoopState.Stopping;
			break;
		case "stopped":
			if (from === LoopState.Stopping) return LoopState.Stopped;
			break;
	}
	return null;
}
