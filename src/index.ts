export { COOLDOWN_CONFIG, Cooldown } from "./cooldown";
export type { CompletionCallback, CooldownState } from "./cooldown";
export type { CooldownConfig, CooldownControls } from "./hooks/useCooldown";
export { useCooldown } from "./hooks/useCooldown";
export { FrameService, type FrameServiceType } from "./services/FrameService";
