import { isPrintableAscii, splitToWidth, visibleWidth } from "./utils";

/**
 * Hard-wrap one line (no "\n") to `width` columns.
 *
 * Lines that fit are returned as-is. The checks run cheapest first: UTF-8 byte
 * length bounds the column count from above (wide characters take at least three
 * bytes for their two columns), printable ASCII is one column per character, and
 * only what is left goes through the width-aware measure.
 */
export function wrapLine(line: string, width: number): string {
	if (width <= 0) return line;
	if (Buffer.byteLength(line, "utf8") <= width) return line;
	if (isPrintableAscii(line)) {
		if (line.length <= width) return line;
	} else if (visibleWidth(line) <= width) {
		return line;
	}
	return splitToWidth(line, width).join("\n");
}

/**
 * Wrap text to the terminal width.
 *
 * Each "\n"-separated line is wrapped independently into `width`-column segments, with
 * ANSI styles carried across the inserted breaks. A non-positive width returns the text
 * unchanged. The output of a line never depends on any other line, so
 * `wrapText(a + b) === wrapText(a) + wrapText(b)` whenever `a` ends with "\n".
 */
export function wrapText(text: string, width: number): string {
	if (width <= 0 || text.length === 0) return text;
	const lines = text.split("\n");
	let result = "";
	for (let i = 0; i < lines.length; i++) {
		if (i > 0) result += "\n";
		result += wrapLine(lines[i] ?? "", width);
	}
	return result;
}
