import { ContentBuffer } from "@streamview/tui";
import { describe, expect, it } from "vitest";

describe("ContentBuffer", () => {
	it("appends text verbatim and grows monotonically", () => {
		const buffer = new ContentBuffer();
		const lengths: number[] = [];
		for (const chunk of ["Hel", "lo", ", ", "world\n", "\x1b[1m!\x1b[22m"]) {
			expect(buffer.append(chunk)).toBe(true);
			lengths.push(buffer.length);
		}

		expect(buffer.snapshot()).toBe("Hello, world\n\x1b[1m!\x1b[22m");
		expect(lengths).toEqual([3, 5, 7, 13, 23]);
	});

	it("treats an empty append as a no-op", () => {
		const buffer = new ContentBuffer();
		buffer.append("abc");

		expect(buffer.append("")).toBe(false);
		expect(buffer.snapshot()).toBe("abc");
	});

	it("keeps earlier snapshots as prefixes of later ones", () => {
		const buffer = new ContentBuffer();
		buffer.append("first");
		const before = buffer.snapshot();
		buffer.append(" second");

		expect(buffer.snapshot().startsWith(before)).toBe(true);
	});

	it("appends a line with its newline", () => {
		const buffer = new ContentBuffer();
		buffer.appendLine("one");
		buffer.appendLine("");

		expect(buffer.snapshot()).toBe("one\n\n");
	});

	it("resets to empty on clear", () => {
		const buffer = new ContentBuffer();
		buffer.append("something");
		buffer.clear();

		expect(buffer.snapshot()).toBe("");
		expect(buffer.length).toBe(0);
	});
});
