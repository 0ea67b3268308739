/**
 * Minimal full-screen TUI with row-level differential rendering
 */
import * as fs from "node:fs";
import * as path from "node:path";
import { getDebugLogPath, logger } from "@streamview/utils";
import type { Terminal } from "./terminal";
import { hasEscape, truncateToWidth } from "./utils";

const SEGMENT_RESET = "\x1b[0m";

type InputListenerResult = { consume?: boolean; data?: string } | undefined;
type InputListener = (data: string) => InputListenerResult;

/**
 * Component interface - all components must implement this
 */
export interface Component {
	/**
	 * Render the component to lines for the given viewport width
	 * @param width - Current viewport width
	 * @returns Array of strings, each representing a line
	 */
	render(width: number): string[];

	/**
	 * Optional handler for keyboard input when component has focus
	 */
	handleInput?(data: string): void;

	/**
	 * Invalidate any cached rendering state.
	 * Called when theme changes or when component needs to re-render from scratch.
	 */
	invalidate(): void;
}

/**
 * Container - a component that contains other components
 */
export class Container implements Component {
	children: Component[] = [];

	addChild(component: Component): void {
		this.children.push(component);
	}

	invalidate(): void {
		for (const child of this.children) {
			child.invalidate();
		}
	}

	render(width: number): string[] {
		width = Math.max(1, width);
		const lines: string[] = [];
		for (const child of this.children) {
			lines.push(...child.render(width));
		}
		return lines;
	}
}

/**
 * TUI - owns the terminal and paints the component tree onto exactly one screen of rows.
 *
 * Render requests are coalesced onto one `process.nextTick`. A frame that has the same
 * size as the previous one only rewrites the rows whose text changed; the first frame
 * and every size change repaint the whole screen.
 */
export class TUI extends Container {
	terminal: Terminal;
	#previousLines: string[] = [];
	#previousWidth = 0;
	#previousHeight = 0;
	#focusedComponent: Component | null = null;
	#inputListeners = new Set<InputListener>();
	#renderRequested = false;
	#fullRedrawCount = 0;
	#stopped = true;

	/** Called with the new terminal size before the frame that follows a resize. */
	onResize?: (width: number, height: number) => void;

	constructor(terminal: Terminal) {
		super();
		this.terminal = terminal;
	}

	get fullRedraws(): number {
		return this.#fullRedrawCount;
	}

	setFocus(component: Component | null): void {
		this.#focusedComponent = component;
	}

	addInputListener(listener: InputListener): () => void {
		this.#inputListeners.add(listener);
		return () => {
			this.#inputListeners.delete(listener);
		};
	}

	start(): void {
		this.#stopped = false;
		this.terminal.start(
			data => this.#handleInput(data),
			() => this.#handleResize(),
		);
		this.terminal.hideCursor();
		this.onResize?.(this.terminal.columns, this.terminal.rows);
		this.requestRender(true);
	}

	stop(): void {
		this.#stopped = true;
		this.terminal.showCursor();
		this.terminal.stop();
	}

	requestRender(force = false): void {
		if (force) {
			this.#previousLines = [];
			this.#previousWidth = 0;
			this.#previousHeight = 0;
		}
		if (this.#renderRequested) return;
		this.#renderRequested = true;
		process.nextTick(() => {
			this.#renderRequested = false;
			this.#doRender();
		});
	}

	#handleResize(): void {
		this.onResize?.(this.terminal.columns, this.terminal.rows);
		this.requestRender();
	}

	#handleInput(data: string): void {
		let current = data;
		for (const listener of this.#inputListeners) {
			const result = listener(current);
			if (result?.consume) {
				return;
			}
			if (result?.data !== undefined) {
				current = result.data;
			}
		}
		if (current.length === 0) return;
		if (this.#focusedComponent?.handleInput) {
			this.#focusedComponent.handleInput(current);
			this.requestRender();
		}
	}

	/** Fit rendered lines to the screen: first `height` rows, each clamped to `width`. */
	#frame(width: number, height: number): string[] {
		const lines = this.render(width).slice(0, height);
		const frame: string[] = [];
		for (const line of lines) {
			const clamped = truncateToWidth(line, width);
			// Reset styles at the end of each row so colors never bleed into the next one
			frame.push(hasEscape(clamped) ? clamped + SEGMENT_RESET : clamped);
		}
		return frame;
	}

	#moveToScreenPosition(row: number, col = 0): string {
		return `\x1b[${Math.max(0, row) + 1};${Math.max(0, col) + 1}H`;
	}

	#doRender(): void {
		if (this.#stopped) return;
		const width = this.terminal.columns;
		const height = this.terminal.rows;
		const newLines = this.#frame(width, height);

		const sizeChanged = this.#previousWidth !== width || this.#previousHeight !== height;
		let buffer = "\x1b[?2026h"; // Begin synchronized output

		if (sizeChanged) {
			this.#fullRedrawCount += 1;
			this.#logRedraw(`size ${this.#previousWidth}x${this.#previousHeight} -> ${width}x${height}`);
			buffer += "\x1b[2J";
			for (let i = 0; i < newLines.length; i++) {
				buffer += this.#moveToScreenPosition(i) + newLines[i];
			}
		} else {
			const rows = Math.max(newLines.length, this.#previousLines.length);
			let changed = 0;
			for (let i = 0; i < rows; i++) {
				const oldLine = this.#previousLines[i] ?? "";
				const newLine = newLines[i] ?? "";
				if (oldLine === newLine) continue;
				changed++;
				// Erase the whole row first; erasing after the text can eat the last column
				buffer += `${this.#moveToScreenPosition(i)}\x1b[2K${newLine}`;
			}
			if (changed === 0) {
				return;
			}
		}

		buffer += this.#moveToScreenPosition(height - 1);
		buffer += "\x1b[?2026l"; // End synchronized output
		this.terminal.write(buffer);
		this.#previousLines = newLines;
		this.#previousWidth = width;
		this.#previousHeight = height;
	}

	#logRedraw(reason: string): void {
		if (process.env.STREAMVIEW_DEBUG_REDRAW !== "1") return;
		const logPath = getDebugLogPath();
		try {
			fs.mkdirSync(path.dirname(logPath), { recursive: true });
			fs.appendFileSync(logPath, `[${new Date().toISOString()}] fullRender: ${reason}\n`);
		} catch (err) {
			logger.debug("redraw log write failed", { path: logPath, error: String(err) });
		}
	}
}
