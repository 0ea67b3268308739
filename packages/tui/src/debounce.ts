/** Minimum time between real viewport updates (about 60 Hz). */
export const DEFAULT_UPDATE_INTERVAL_MS = 16;

/** Monotonic clock in milliseconds. */
export type Clock = () => number;

export interface DebounceSchedulerOptions {
	intervalMs?: number;
	clock?: Clock;
}

/**
 * Throttles an effectful update to at most one run per interval without ever losing one.
 *
 * Requests that arrive too soon after the last run only raise the dirty flag. The flag
 * is cleared by the next run, which is either an eligible request, a forced update, or
 * a periodic {@link flushIfDirty} driven by an independent tick.
 */
export class DebounceScheduler {
	#lastUpdateAt = Number.NEGATIVE_INFINITY;
	#dirty = false;
	readonly #intervalMs: number;
	readonly #clock: Clock;

	constructor(
		private readonly update: () => void,
		options: DebounceSchedulerOptions = {},
	) {
		this.#intervalMs = options.intervalMs ?? DEFAULT_UPDATE_INTERVAL_MS;
		this.#clock = options.clock ?? (() => performance.now());
	}

	get dirty(): boolean {
		return this.#dirty;
	}

	get intervalMs(): number {
		return this.#intervalMs;
	}

	/** Time of the last real update, or -Infinity before the first. */
	get lastUpdateAt(): number {
		return this.#lastUpdateAt;
	}

	/**
	 * Run the update now if the interval has elapsed, otherwise mark dirty and defer.
	 * @returns whether the update ran
	 */
	requestUpdate(): boolean {
		const now = this.#clock();
		if (now - this.#lastUpdateAt < this.#intervalMs) {
			this.#dirty = true;
			return false;
		}
		this.#run(now);
		return true;
	}

	/** Run the update regardless of the throttle. */
	forceUpdate(): void {
		this.#run(this.#clock());
	}

	/**
	 * Run the update if a deferred request is pending.
	 * @returns whether the update ran
	 */
	flushIfDirty(): boolean {
		if (!this.#dirty) return false;
		this.#run(this.#clock());
		return true;
	}

	#run(now: number): void {
		// Stamped before the update: a request raised during it is throttled and stays pending
		this.#dirty = false;
		this.#lastUpdateAt = now;
		this.update();
	}
}
