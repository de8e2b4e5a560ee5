import { EventEmitter } from "node:events";
import { logger } from "../utils/logger";

export interface WakeDetectorOptions {
	checkIntervalMs: number;
	/** Extra delay beyond one tick that counts as a sleep. */
	thresholdMs: number;
}

export type WakeDetectorEvents = {
	resume: [sleptMs: number];
};

/**
 * Emits `resume` after the machine wakes from sleep, detected as a timer
 * tick that arrives far later than scheduled.
 */
export class WakeDetector extends EventEmitter<WakeDetectorEvents> {
	private timer: ReturnType<typeof setInterval> | null = null;
	private lastTick = 0;

	constructor(
		private readonly options: WakeDetectorOptions,
		private readonly now: () => number = Date.now,
	) {
		super();
	}

	public start(): void {
		if (this.timer) return;
		this.lastTick = this.now();
		this.timer = setInterval(() => this.tick(), this.options.checkIntervalMs);
		// A sleep check alone should not keep the daemon alive
		this.timer.unref();
	}

	public stop(): void {
		if (this.timer) {
			clearInterval(this.timer);
			this.timer = null;
		}
	}

	private tick(): void {
		const current = this.now();
		const elapsed = current - this.lastTick;
		this.lastTick = current;

		if (elapsed > this.options.checkIntervalMs + this.options.thresholdMs) {
			const sleptMs = elapsed - this.options.checkIntervalMs;
			logger.info({ sleptMs }, "System resume detected");
			this.emit("resume", sleptMs);
		}
	}
}
