/**
 * Humble Object for animation-frame scheduling.
 * Isolates window.requestAnimationFrame for testability.
 */

export const FrameService = {
	/**
	 * Request a callback on the next frame.
	 * Returns the request ID for cancelling.
	 */
	requestFrame(callback: () => void): number {
		return window.requestAnimationFrame(() => callback());
	},

	/**
	 * Cancel a pending frame request.
	 */
	cancelFrame(id: number): void {
		window.cancelAnimationFrame(id);
	},
};

export type FrameServiceType = typeof FrameService;
