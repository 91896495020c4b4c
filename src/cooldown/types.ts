/**
 * Types for tick-driven cooldowns.
 */

export type CooldownState =
	| { type: "ready" }
	| { type: "running"; remaining: number } // counting down
	| { type: "paused"; remaining: number }; // active, ticks ignored

export type CompletionCallback = () => void;

// Configuration constants
export const COOLDOWN_CONFIG = {
	TICK_QUANTUM: 1, // ticks removed per tick() call
	COMPLETE_PROGRESS: 1, // progress() of a ready cooldown
} as const;
