import stringWidth from "string-width";

// Grapheme segmenter (shared instance)
const segmenter = new Intl.Segmenter(undefined, { granularity: "grapheme" });

/**
 * Get the shared grapheme segmenter instance.
 */
export function getSegmenter(): Intl.Segmenter {
	return segmenter;
}

// CSI, OSC (BEL or ST terminated) and two-character escapes
const ANSI_ESCAPE = /\x1b(?:\[[0-?]*[ -/]*[@-~]|\][^\x07\x1b]*(?:\x07|\x1b\\)|[@-Z\\-_])/y;
const SGR_RESET = "\x1b[0m";

/**
 * True when every character is printable ASCII (0x20..0x7e).
 * Such text is one column per character and carries no escape sequences.
 */
export function isPrintableAscii(str: string): boolean {
	for (let i = 0; i < str.length; i++) {
		const code = str.charCodeAt(i);
		if (code < 0x20 || code > 0x7e) return false;
	}
	return true;
}

/** True when the text contains an ESC byte (start of an ANSI sequence). */
export function hasEscape(str: string): boolean {
	return str.includes("\x1b");
}

/**
 * Calculate the visible width of a string in terminal columns.
 * Wide characters count two columns, ANSI escape sequences none.
 */
export function visibleWidth(str: string): number {
	if (!str) return 0;
	if (isPrintableAscii(str)) return str.length;
	return stringWidth(str);
}

/**
 * Cut one line (no "\n") into rows of at most `width` columns.
 *
 * Rows break between grapheme clusters, never inside one, and never look ahead for a
 * better break: every row but the last is filled up to `width`. A cluster wider than
 * the whole row gets a row of its own. Characters are kept as they are, so without
 * escapes `rows.join("")` is the input. SGR styling open at a break is closed with a
 * reset and replayed at the start of the next row.
 */
export function splitToWidth(line: string, width: number): string[] {
	if (width <= 0) return [line];
	const rows: string[] = [];
	let row = "";
	let rowWidth = 0;
	let activeSgr: string[] = [];

	const pushText = (text: string) => {
		for (const { segment } of segmenter.segment(text)) {
			const segmentWidth = visibleWidth(segment);
			if (rowWidth > 0 && rowWidth + segmentWidth > width) {
				rows.push(activeSgr.length > 0 ? row + SGR_RESET : row);
				row = activeSgr.join("");
				rowWidth = 0;
			}
			row += segment;
			rowWidth += segmentWidth;
		}
	};

	let index = 0;
	while (index < line.length) {
		const escape = line.indexOf("\x1b", index);
		if (escape === -1) {
			pushText(line.slice(index));
			break;
		}
		if (escape > index) {
			pushText(line.slice(index, escape));
		}
		ANSI_ESCAPE.lastIndex = escape;
		const sequence = ANSI_ESCAPE.exec(line)?.[0];
		if (!sequence) {
			// Lone ESC: zero columns, kept in place
			row += "\x1b";
			index = escape + 1;
			continue;
		}
		row += sequence;
		if (sequence.startsWith("\x1b[") && sequence.endsWith("m")) {
			if (sequence === SGR_RESET || sequence === "\x1b[m") {
				activeSgr = [];
			} else {
				activeSgr.push(sequence);
			}
		}
		index = escape + sequence.length;
	}
	rows.push(row);
	return rows;
}

/**
 * Cut a single line down to at most `width` visible columns, keeping its ANSI styling.
 * Lines that already fit are returned unchanged.
 */
export function truncateToWidth(line: string, width: number): string {
	if (width <= 0) return "";
	if (visibleWidth(line) <= width) return line;
	return splitToWidth(line, width)[0] ?? "";
}
