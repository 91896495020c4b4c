import {
	COOLDOWN_CONFIG,
	type CompletionCallback,
	type CooldownState,
} from "./types";

const noop: CompletionCallback = () => {};

/**
 * Countdown measured in simulation ticks.
 * No timers, no clock - the owner calls tick() once per step.
 *
 * Ready:   active=false
 * Running: active=true, paused=false
 * Paused:  active=true, paused=true
 *
 * A duration that is not a positive finite number leaves the cooldown
 * permanently ready.
 */
export class Cooldown {
	private readonly duration: number;
	private readonly onComplete: CompletionCallback;
	private readonly enabled: boolean;

	private remaining = 0;
	private active = false;
	private paused = false;

	constructor(duration: number, onComplete: CompletionCallback = noop) {
		this.duration = duration;
		this.onComplete = onComplete;
		this.enabled = Number.isFinite(duration) && duration > 0;
	}

	// ===== Operations =====

	/**
	 * Restart from the full duration. Also restarts a running or paused
	 * countdown.
	 */
	start(): void {
		if (!this.enabled) return;
		this.remaining = this.duration;
		this.active = true;
		this.paused = false;
	}

	/**
	 * Advance one tick. Fires onComplete on the tick that reaches zero,
	 * after the cooldown is already ready again.
	 */
	tick(): void {
		if (!this.active || this.paused) return;

		this.remaining -= COOLDOWN_CONFIG.TICK_QUANTUM;
		if (this.remaining > 0) return;

		this.remaining = 0;
		this.active = false;
		this.onComplete();
	}

	pause(): void {
		this.paused = true;
	}

	/** Un-suspends ticking. Does not reactivate a ready cooldown. */
	resume(): void {
		this.paused = false;
	}

	/** Cancel without firing onComplete. */
	reset(): void {
		this.remaining = 0;
		this.active = false;
		this.paused = false;
	}

	// ===== Queries =====

	isReady(): boolean {
		return !this.active;
	}

	/** Elapsed fraction of the duration, 0 at start() and 1 when ready. */
	progress(): number {
		if (!this.enabled) return COOLDOWN_CONFIG.COMPLETE_PROGRESS;
		const elapsed = 1 - this.remaining / this.duration;
		return Math.min(1, Math.max(0, elapsed));
	}

	getDuration(): number {
		return this.duration;
	}

	getRemaining(): number {
		return this.remaining;
	}

	isActive(): boolean {
		return this.active;
	}

	/** Raw pause flag; may be set while ready. */
	isPaused(): boolean {
		return this.paused;
	}

	getState(): CooldownState {
		if (!this.active) return { type: "ready" };
		if (this.paused) return { type: "paused", remaining: this.remaining };
		return { type: "running", remaining: this.remaining };
	}
}
