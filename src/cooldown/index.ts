/**
 * Cooldown module.
 * Tick-counted timers for per-ability gating in a frame loop.
 */

export { Cooldown } from "./Cooldown";
export type { CompletionCallback, CooldownState } from "./types";
export { COOLDOWN_CONFIG } from "./types";
