import { logger } from "@streamview/utils";
import { resolveViewportConfig, type ViewportConfig } from "../config";
import { ContentBuffer } from "../content-buffer";
import { type Clock, DebounceScheduler } from "../debounce";
import type { ViewportTheme } from "../theme";
import type { Component, TUI } from "../tui";
import { truncateToWidth } from "../utils";
import { WrapCache } from "../wrap-cache";
import { type DisplaySurface, ScrollView } from "./scroll-view";

export interface StreamViewportOptions {
	/** Widget that paints the wrapped text; a {@link ScrollView} by default */
	surface?: DisplaySurface;
	/** UI asked to repaint after each surface update */
	ui?: TUI | null;
	config?: Partial<ViewportConfig>;
	/** Clock for the update throttle (milliseconds) */
	clock?: Clock;
}

export interface ViewportStats {
	/** Real updates run (wrap recomputed) */
	updates: number;
	/** Updates that changed the surface content */
	surfaceWrites: number;
	/** Append-driven requests that were throttled and left dirty */
	deferred: number;
	fullWraps: number;
	incrementalWraps: number;
}

/**
 * Everything a producer and the render loop share. Held by reference only, so any
 * holder of the viewport sees the same buffer, cache and flags.
 */
interface ViewportState {
	buffer: ContentBuffer;
	cache: WrapCache;
	wrapWidth: number;
	height: number;
	ready: boolean;
	frozen: boolean;
	/** Wrapped text last handed to the surface */
	pushed: string;
}

const PLACEHOLDER = "Loading...";

/**
 * Streaming text viewport: an append-only transcript wrapped to the terminal width and
 * pushed to a scrollable surface at a bounded rate.
 *
 * Producers call {@link append} as often as tokens arrive. Each append asks the
 * scheduler for an update; within one interval of the previous update the request only
 * marks the viewport dirty, and the pending text is shown by the next eligible append,
 * a tick calling {@link flushIfDirty}, or {@link forceUpdate} at end of stream.
 * All of it runs on the event loop; an update never awaits, so reading the buffer,
 * recomputing the cache and writing the surface happen as one step.
 */
export class StreamViewport implements Component {
	readonly #state: ViewportState;
	readonly #scheduler: DebounceScheduler;
	readonly #surface: DisplaySurface;
	readonly #config: ViewportConfig;
	readonly #ui: TUI | null;
	#updates = 0;
	#surfaceWrites = 0;
	#deferred = 0;

	constructor(
		private readonly theme: ViewportTheme,
		options: StreamViewportOptions = {},
	) {
		this.#config = resolveViewportConfig(options.config);
		this.#surface = options.surface ?? new ScrollView();
		this.#ui = options.ui ?? null;
		this.#state = {
			buffer: new ContentBuffer(),
			cache: new WrapCache(this.#config.minWrapWidth),
			wrapWidth: 0,
			height: 0,
			ready: false,
			frozen: false,
			pushed: "",
		};
		this.#scheduler = new DebounceScheduler(() => this.#doUpdate(), {
			intervalMs: this.#config.updateIntervalMs,
			clock: options.clock,
		});
	}

	get config(): Readonly<ViewportConfig> {
		return this.#config;
	}

	get stats(): ViewportStats {
		return {
			updates: this.#updates,
			surfaceWrites: this.#surfaceWrites,
			deferred: this.#deferred,
			fullWraps: this.#state.cache.fullWraps,
			incrementalWraps: this.#state.cache.incrementalWraps,
		};
	}

	/** Width text is wrapped to (surface width minus padding) */
	get wrapWidth(): number {
		return this.#state.wrapWidth;
	}

	get dirty(): boolean {
		return this.#scheduler.dirty;
	}

	isReady(): boolean {
		return this.#state.ready;
	}

	isFrozen(): boolean {
		return this.#state.frozen;
	}

	append(text: string): void {
		if (!this.#state.buffer.append(text)) return;
		this.#requestUpdate();
	}

	appendLine(text: string): void {
		this.#state.buffer.appendLine(text);
		this.#requestUpdate();
	}

	/** Empty the transcript, drop the wrap cache, unfreeze and repaint immediately. */
	clear(): void {
		this.#state.buffer.clear();
		this.#state.cache.invalidate();
		this.#state.frozen = false;
		this.forceUpdate();
	}

	setSize(width: number, height: number): void {
		const wrapWidth = width - this.#config.horizontalPadding;
		if (wrapWidth !== this.#state.wrapWidth) {
			this.#state.cache.invalidate();
		}
		this.#state.wrapWidth = wrapWidth;
		this.#state.height = Math.max(0, height);
		this.#surface.setSize(width, height);
		this.#state.ready = true;
		this.forceUpdate();
	}

	/**
	 * Stop (or resume) following the newest output. While frozen the surface still
	 * receives new content but keeps its scroll position; unfreezing jumps to the bottom.
	 */
	setFrozen(frozen: boolean): void {
		this.#state.frozen = frozen;
		if (!frozen && this.#state.ready) {
			this.#surface.gotoBottom();
			this.#ui?.requestRender();
		}
	}

	forceUpdate(): void {
		if (!this.#state.ready) return;
		this.#scheduler.forceUpdate();
	}

	/**
	 * Apply a deferred update, if any. Meant for a periodic tick.
	 * @returns whether an update ran
	 */
	flushIfDirty(): boolean {
		if (!this.#state.ready) return false;
		return this.#scheduler.flushIfDirty();
	}

	/** Full untouched transcript */
	content(): string {
		return this.#state.buffer.snapshot();
	}

	/** Wrapped text currently shown by the surface */
	view(): string {
		return this.#state.pushed;
	}

	isAtBottom(): boolean {
		return this.#surface.atBottom();
	}

	scrollPercent(): number {
		return this.#surface.scrollPercent();
	}

	scrollToBottom(): void {
		this.#surface.gotoBottom();
		this.#ui?.requestRender();
	}

	/** Forward scroll keys to the surface; scrolling away from the bottom freezes, reaching it resumes. */
	handleInput(data: string): void {
		if (!this.#surface.handleInput?.(data)) return;
		this.setFrozen(!this.#surface.atBottom());
		this.#ui?.requestRender();
	}

	invalidate(): void {
		this.#state.cache.invalidate();
		this.forceUpdate();
	}

	render(width: number): string[] {
		if (!this.#state.ready) {
			return [truncateToWidth(this.theme.placeholder(PLACEHOLDER), width)];
		}
		const lines = this.#surface.visibleLines().map(line => truncateToWidth(line, width));
		while (lines.length < this.#state.height) {
			lines.push("");
		}
		return lines;
	}

	#requestUpdate(): void {
		if (!this.#state.ready) return;
		if (!this.#scheduler.requestUpdate()) {
			this.#deferred++;
		}
	}

	#doUpdate(): void {
		const start = performance.now();
		const state = this.#state;
		const wrapped = state.cache.recompute(state.buffer.snapshot(), state.wrapWidth);
		this.#updates++;

		if (wrapped !== state.pushed || this.#surfaceWrites === 0) {
			this.#surface.setContent(wrapped);
			state.pushed = wrapped;
			this.#surfaceWrites++;
		}
		if (!state.frozen) {
			this.#surface.gotoBottom();
		}
		this.#ui?.requestRender();

		const duration = performance.now() - start;
		if (duration > this.#config.updateIntervalMs) {
			logger.warn("viewport update over frame budget", {
				duration: Math.round(duration * 100) / 100,
				contentLength: state.buffer.length,
				width: state.wrapWidth,
			});
		}
	}
}
