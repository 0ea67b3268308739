import type { ViewportTheme } from "../theme";
import type { Component, TUI } from "../tui";
import { truncateToWidth } from "../utils";

/**
 * Spinner line that also serves as the periodic tick of a streaming view.
 *
 * Every interval it advances the frame, calls {@link onTick} (typically
 * `viewport.flushIfDirty()`) and asks the UI to repaint.
 */
export class Loader implements Component {
	#frames: string[];
	#currentFrame = 0;
	#intervalId?: NodeJS.Timeout;
	#ui: TUI | null;
	#line = "";

	/** Runs on every tick, before the frame is redrawn. */
	onTick?: () => void;

	constructor(
		ui: TUI | null,
		private readonly theme: ViewportTheme,
		private message: string = "Streaming...",
		private readonly intervalMs = 80,
	) {
		this.#ui = ui;
		this.#frames = theme.symbols.spinnerFrames.length > 0 ? theme.symbols.spinnerFrames : ["*"];
		this.start();
	}

	get running(): boolean {
		return this.#intervalId !== undefined;
	}

	render(width: number): string[] {
		return [truncateToWidth(this.#line, width)];
	}

	invalidate(): void {
		this.#updateDisplay();
	}

	start(): void {
		if (this.#intervalId) return;
		this.#updateDisplay();
		this.#intervalId = setInterval(() => {
			this.#currentFrame = (this.#currentFrame + 1) % this.#frames.length;
			this.onTick?.();
			this.#updateDisplay();
		}, this.intervalMs);
	}

	stop(): void {
		if (this.#intervalId) {
			clearInterval(this.#intervalId);
			this.#intervalId = undefined;
		}
	}

	setMessage(message: string): void {
		this.message = message;
		this.#updateDisplay();
	}

	#updateDisplay(): void {
		const frame = this.#frames[this.#currentFrame] ?? "";
		this.#line = `${this.theme.spinner(frame)} ${this.theme.message(this.message)}`;
		this.#ui?.requestRender();
	}
}
