import { logger } from "@streamview/utils";
import { wrapText } from "./wrap";

/** Widths at or below this are rendered raw; wrapping them would leave a column of single characters. */
export const DEFAULT_MIN_WRAP_WIDTH = 20;

/**
 * Wrapped view of a {@link ContentBuffer}, recomputed incrementally as the buffer grows.
 *
 * Alongside the full wrapped string the cache remembers the *settled* prefix: the
 * content up to and including its last "\n" together with the wrapped form of it.
 * Lines before a newline can never change while the width stays the same, so on
 * growth only the open last line plus the new suffix is wrapped again and appended
 * to the settled part. The result is always identical to `wrapText(content, width)`.
 */
export class WrapCache {
	#cachedWrapped = "";
	#lastContentLen = 0;
	/** Length of the settled prefix inside #cachedWrapped */
	#lastWrappedLen = 0;
	/** Length of the settled prefix inside the content */
	#settledContentLen = 0;
	#width = 0;
	#valid = false;
	#fullWraps = 0;
	#incrementalWraps = 0;

	constructor(private readonly minWrapWidth = DEFAULT_MIN_WRAP_WIDTH) {}

	get width(): number {
		return this.#width;
	}

	get valid(): boolean {
		return this.#valid;
	}

	get fullWraps(): number {
		return this.#fullWraps;
	}

	get incrementalWraps(): number {
		return this.#incrementalWraps;
	}

	/** Last computed value, without recomputing. */
	get value(): string {
		return this.#cachedWrapped;
	}

	/** Drop the cache; the next recompute wraps everything again. */
	invalidate(): void {
		this.#cachedWrapped = "";
		this.#lastContentLen = 0;
		this.#lastWrappedLen = 0;
		this.#settledContentLen = 0;
		this.#valid = false;
	}

	recompute(content: string, width: number): string {
		if (width <= this.minWrapWidth) {
			this.#store(content, width, content, 0, 0);
			return content;
		}

		if (!this.#valid || width !== this.#width || content.length < this.#lastContentLen) {
			return this.#fullWrap(content, width);
		}

		if (content.length === this.#lastContentLen) {
			return this.#cachedWrapped;
		}

		this.#incrementalWraps++;
		return this.#wrapFrom(content, this.#settledContentLen, this.#lastWrappedLen, width);
	}

	#fullWrap(content: string, width: number): string {
		const reason = !this.#valid ? "cold" : width !== this.#width ? "width-changed" : "content-replaced";
		this.#fullWraps++;
		const wrapped = logger.time("viewport:full-wrap", () => this.#wrapFrom(content, 0, 0, width));
		logger.debug("viewport full rewrap", { reason, width, contentLength: content.length });
		return wrapped;
	}

	/**
	 * Wrap `content` from `start` on, keeping the first `settledWrappedLen` characters of the
	 * cached output. The new text is split at its last "\n" so the settled prefix advances
	 * past every line that is now complete.
	 */
	#wrapFrom(content: string, start: number, settledWrappedLen: number, width: number): string {
		const open = content.slice(start);
		const newline = open.lastIndexOf("\n");
		const completed = newline === -1 ? "" : wrapText(open.slice(0, newline + 1), width);
		const tail = wrapText(open.slice(newline + 1), width);
		const settled = this.#cachedWrapped.slice(0, settledWrappedLen) + completed;
		const wrapped = settled + tail;
		this.#store(content, width, wrapped, start + newline + 1, settled.length);
		return wrapped;
	}

	#store(content: string, width: number, wrapped: string, settledContentLen: number, settledWrappedLen: number) {
		this.#cachedWrapped = wrapped;
		this.#lastContentLen = content.length;
		this.#settledContentLen = settledContentLen;
		this.#lastWrappedLen = settledWrappedLen;
		this.#width = width;
		this.#valid = true;
	}
}
