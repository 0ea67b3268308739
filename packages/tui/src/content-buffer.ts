/**
 * Append-only transcript of streamed text.
 *
 * The only mutations are appending a suffix and resetting to empty, so the length
 * never decreases between resets and any earlier snapshot is a prefix of a later one.
 */
export class ContentBuffer {
	#content = "";

	get length(): number {
		return this.#content.length;
	}

	/**
	 * Append text verbatim.
	 * @returns false for an empty string (nothing changed)
	 */
	append(text: string): boolean {
		if (!text) return false;
		this.#content += text;
		return true;
	}

	appendLine(text: string): boolean {
		this.#content += `${text}\n`;
		return true;
	}

	clear(): void {
		this.#content = "";
	}

	snapshot(): string {
		return this.#content;
	}
}
