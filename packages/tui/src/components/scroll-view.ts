import type { Component } from "../tui";
import { truncateToWidth } from "../utils";

/**
 * The widget a {@link StreamViewport} paints into. It owns the scroll position; the
 * viewport only replaces its content and asks it to follow the bottom.
 */
export interface DisplaySurface {
	setContent(text: string): void;
	setSize(width: number, height: number): void;
	gotoBottom(): void;
	atBottom(): boolean;
	/** 0 at the top, 1 at the bottom (or when everything fits) */
	scrollPercent(): number;
	visibleLines(): string[];
	/** Apply a scroll key; returns whether the data was one */
	handleInput?(data: string): boolean;
}

type ScrollAction = "up" | "down" | "pageUp" | "pageDown" | "top" | "bottom";

const SCROLL_KEYS = new Map<string, ScrollAction>([
	["\x1b[A", "up"],
	["\x1bOA", "up"],
	["\x1b[B", "down"],
	["\x1bOB", "down"],
	["\x1b[5~", "pageUp"],
	["\x1b[6~", "pageDown"],
	["\x1b[H", "top"],
	["\x1b[1~", "top"],
	["\x1b[F", "bottom"],
	["\x1b[4~", "bottom"],
]);

/**
 * Line viewport over a block of text: a window of `height` lines starting at `yOffset`.
 */
export class ScrollView implements Component, DisplaySurface {
	#lines: string[] = [""];
	#yOffset = 0;
	#width = 0;
	#height = 0;

	constructor(width = 0, height = 0) {
		this.setSize(width, height);
	}

	get yOffset(): number {
		return this.#yOffset;
	}

	get lineCount(): number {
		return this.#lines.length;
	}

	get width(): number {
		return this.#width;
	}

	get height(): number {
		return this.#height;
	}

	setContent(text: string): void {
		this.#lines = text.split("\n");
		if (this.#yOffset > this.#lines.length - 1) {
			this.gotoBottom();
		}
	}

	setSize(width: number, height: number): void {
		this.#width = Math.max(0, width);
		this.#height = Math.max(0, height);
		this.#yOffset = Math.min(this.#yOffset, this.#maxYOffset());
	}

	atBottom(): boolean {
		return this.#yOffset >= this.#maxYOffset();
	}

	atTop(): boolean {
		return this.#yOffset <= 0;
	}

	scrollPercent(): number {
		if (this.#height >= this.#lines.length) return 1;
		const percent = this.#yOffset / (this.#lines.length - this.#height);
		return Math.min(1, Math.max(0, percent));
	}

	visibleLines(): string[] {
		return this.#lines.slice(this.#yOffset, this.#yOffset + this.#height);
	}

	scrollBy(delta: number): void {
		this.#yOffset = Math.min(this.#maxYOffset(), Math.max(0, this.#yOffset + delta));
	}

	pageUp(): void {
		this.scrollBy(-Math.max(1, this.#height));
	}

	pageDown(): void {
		this.scrollBy(Math.max(1, this.#height));
	}

	gotoTop(): void {
		this.#yOffset = 0;
	}

	gotoBottom(): void {
		this.#yOffset = this.#maxYOffset();
	}

	/**
	 * Apply a scroll key.
	 * @returns whether the data was a scroll key
	 */
	handleInput(data: string): boolean {
		const action = SCROLL_KEYS.get(data);
		if (!action) return false;
		switch (action) {
			case "up":
				this.scrollBy(-1);
				break;
			case "down":
				this.scrollBy(1);
				break;
			case "pageUp":
				this.pageUp();
				break;
			case "pageDown":
				this.pageDown();
				break;
			case "top":
				this.gotoTop();
				break;
			case "bottom":
				this.gotoBottom();
				break;
		}
		return true;
	}

	invalidate(): void {}

	render(width: number): string[] {
		return this.visibleLines().map(line => truncateToWidth(line, width));
	}

	#maxYOffset(): number {
		return Math.max(0, this.#lines.length - this.#height);
	}
}
