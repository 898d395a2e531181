/**
 * Tick driver
 *
 * Calls the game's tick on a fixed cadence through a relative interval
 * from accurate-intervals: each tick is timed from the previous one, so a
 * slow tick delays the next instead of causing a burst of catch-up ticks.
 * Pausing, resuming or changing the interval clears the running interval
 * and starts a fresh one timed from now.
 *
 * - `setInterval(0)` pauses; any other value is clamped and re-arms from now
 * - a tick reporting a crashed world halts scheduling until `rearm()`
 * - `stop()` cancels synchronously; no tick runs after it returns
 *
 * @example
 * ```ts
 * const driver = new TickDriver({ tick: () => game.tick(), intervalMs: 250 });
 * driver.start();
 * // after a reset command
 * driver.rearm();
 * ```
 *
 * @module tick-driver
 */
import { clearCustomInterval, setRelativeInterval } from "accurate-intervals";
import logger from "./logger.js";
import { clampTickInterval } from "./registry/config.js";

/** Source of repeating timers; returns a function that clears the interval. */
export interface TickScheduler {
	every(callback: () => void, ms: number): () => void;
}

export const INTERVAL_SCHEDULER: TickScheduler = {
	every(callback, ms) {
		const interval = setRelativeInterval(callback, ms);
		return () => clearCustomInterval(interval);
	},
};

export interface TickDriverOptions {
	/** Runs one tick; returns whether the world is crashed. */
	tick: () => boolean;
	intervalMs: number;
	scheduler?: TickScheduler;
}

export class TickDriver {
	private readonly tick: () => boolean;
	private readonly scheduler: TickScheduler;
	private intervalMs: number;
	private cancel?: () => void;
	private stopped = true;
	private halted = false;

	constructor(options: TickDriverOptions) {
		this.tick = options.tick;
		this.scheduler = options.scheduler ?? INTERVAL_SCHEDULER;
		this.intervalMs = clampTickInterval(options.intervalMs);
	}

	get interval(): number {
		return this.intervalMs;
	}

	/** Whether an interval is running. */
	get armed(): boolean {
		return this.cancel !== undefined;
	}

	/** Whether scheduling stopped because the world crashed. */
	get crashed(): boolean {
		return this.halted;
	}

	start(): void {
		this.stopped = false;
		this.halted = false;
		this.disarm();
		this.arm();
		logger.info(
			this.intervalMs === 0
				? "Tick driver started paused"
				: `Tick driver started at ${this.intervalMs}ms`
		);
	}

	setInterval(ms: number): void {
		this.intervalMs = clampTickInterval(ms);
		this.disarm();
		if (!this.stopped && !this.halted) this.arm();
		logger.debug(`Tick interval set to ${this.intervalMs}ms`);
	}

	/** Resume after a crash halted the driver. */
	rearm(): void {
		this.halted = false;
		this.disarm();
		if (!this.stopped) this.arm();
	}

	stop(): void {
		this.stopped = true;
		this.disarm();
		logger.debug("Tick driver stopped");
	}

	private arm(): void {
		if (this.intervalMs === 0) return;
		this.cancel = this.scheduler.every(() => this.fire(), this.intervalMs);
	}

	private disarm(): void {
		if (!this.cancel) return;
		this.cancel();
		this.cancel = undefined;
	}

	private fire(): void {
		if (this.stopped || this.halted) return;
		let crashed = false;
		try {
			crashed = this.tick();
		} catch (error) {
			logger.error(`Tick failed: ${error}`);
		}
		if (crashed) {
			this.halted = true;
			this.disarm();
			logger.info("World crashed, tick driver halted until reset");
		}
	}
}
