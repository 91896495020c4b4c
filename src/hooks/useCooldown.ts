import { useCallback, useEffect, useRef, useState } from "react";
import { Cooldown } from "../cooldown/Cooldown";
import type { CooldownState } from "../cooldown/types";
import { FrameService, type FrameServiceType } from "../services/FrameService";

export interface CooldownConfig {
	duration: number; // ticks; read on first render only
	onComplete?: () => void;
	autoTick?: boolean; // tick once per animation frame
	frameService?: FrameServiceType;
}

export interface CooldownControls {
	state: CooldownState;
	progress: number;
	isReady: boolean;
	start: () => void;
	pause: () => void;
	resume: () => void;
	reset: () => void;
	tick: () => void;
}

interface CooldownSnapshot {
	state: CooldownState;
	progress: number;
}

function readSnapshot(cooldown: Cooldown): CooldownSnapshot {
	return { state: cooldown.getState(), progress: cooldown.progress() };
}

/**
 * Hook owning a single Cooldown.
 * Single Responsibility: drive the cooldown from animation frames and
 * expose its state for rendering.
 */
export function useCooldown({
	duration,
	onComplete,
	autoTick = true,
	frameService = FrameService,
}: CooldownConfig): CooldownControls {
	const onCompleteRef = useRef(onComplete);

	useEffect(() => {
		onCompleteRef.current = onComplete;
	}, [onComplete]);

	const [cooldown] = useState(
		() =>
			new Cooldown(duration, () => {
				try {
					onCompleteRef.current?.();
				} catch (err) {
					console.error("Cooldown completion handler failed:", err);
				}
			}),
	);
	const [snapshot, setSnapshot] = useState(() => readSnapshot(cooldown));

	const sync = useCallback(() => {
		setSnapshot(readSnapshot(cooldown));
	}, [cooldown]);

	const tick = useCallback(() => {
		// Idle frames change nothing, skip the re-render
		if (!cooldown.isActive() || cooldown.isPaused()) return;
		cooldown.tick();
		sync();
	}, [cooldown, sync]);

	const start = useCallback(() => {
		cooldown.start();
		sync();
	}, [cooldown, sync]);

	const pause = useCallback(() => {
		cooldown.pause();
		sync();
	}, [cooldown, sync]);

	const resume = useCallback(() => {
		cooldown.resume();
		sync();
	}, [cooldown, sync]);

	const reset = useCallback(() => {
		cooldown.reset();
		sync();
	}, [cooldown, sync]);

	// Frame loop
	useEffect(() => {
		if (!autoTick) return;

		let frameId = frameService.requestFrame(function loop() {
			tick();
			frameId = frameService.requestFrame(loop);
		});

		return () => {
			frameService.cancelFrame(frameId);
		};
	}, [autoTick, frameService, tick]);

	return {
		state: snapshot.state,
		progress: snapshot.progress,
		isReady: snapshot.state.type === "ready",
		start,
		pause,
		resume,
		reset,
		tick,
	};
}
