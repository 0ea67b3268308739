import { ScrollView, StreamViewport, type ViewportConfig, wrapText } from "@streamview/tui";
import { describe, expect, it } from "vitest";
import { colorTheme, plainTheme } from "./test-themes";

/** ScrollView that remembers every content push. */
class RecordingSurface extends ScrollView {
	contents: string[] = [];

	override setContent(text: string): void {
		this.contents.push(text);
		super.setContent(text);
	}
}

function setup(config: Partial<ViewportConfig> = {}) {
	let now = 1000;
	const surface = new RecordingSurface();
	const viewport = new StreamViewport(plainTheme, {
		surface,
		clock: () => now,
		config: { updateIntervalMs: 16, minWrapWidth: 20, horizontalPadding: 4, ...config },
	});
	return {
		viewport,
		surface,
		advance: (ms: number) => {
			now += ms;
		},
	};
}

describe("StreamViewport", () => {
	describe("before the first size", () => {
		it("buffers text without touching the surface", () => {
			const { viewport, surface } = setup();
			viewport.append("hello");
			viewport.forceUpdate();

			expect(viewport.isReady()).toBe(false);
			expect(viewport.content()).toBe("hello");
			expect(viewport.view()).toBe("");
			expect(viewport.dirty).toBe(false);
			expect(viewport.flushIfDirty()).toBe(false);
			expect(surface.contents).toEqual([]);
		});

		it("renders the themed placeholder", () => {
			const { viewport } = setup();
			expect(viewport.render(40)).toEqual(["Loading..."]);

			const styled = new StreamViewport(colorTheme);
			expect(styled.render(40)).toEqual(["\x1b[2mLoading...\x1b[22m"]);
		});

		it("shows everything buffered once sized", () => {
			const { viewport } = setup();
			viewport.append("early text");
			viewport.setSize(34, 5);

			expect(viewport.isReady()).toBe(true);
			expect(viewport.view()).toBe("early text");
		});
	});

	describe("wrapping", () => {
		it("wraps to the surface width minus the padding", () => {
			const { viewport, advance } = setup();
			viewport.setSize(34, 10);
			advance(16);
			viewport.append("a".repeat(45));

			expect(viewport.wrapWidth).toBe(30);
			expect(viewport.view()).toBe(`${"a".repeat(30)}\n${"a".repeat(15)}`);
			expect(viewport.stats).toEqual({
				updates: 2,
				surfaceWrites: 2,
				deferred: 0,
				fullWraps: 1,
				incrementalWraps: 1,
			});
		});

		it("passes content through untouched at narrow widths", () => {
			const { viewport, advance } = setup();
			viewport.setSize(14, 5);
			advance(16);
			viewport.append("abcdefghijklmno");

			expect(viewport.view()).toBe(viewport.content());

			viewport.setSize(24, 5);
			expect(viewport.view()).toBe("abcdefghijklmno");
		});

		it("keeps the view equal to a full wrap as chunks stream in", () => {
			const { viewport, advance } = setup();
			viewport.setSize(30, 10);
			const chunks = ["The quick brown fox ", "jumps over the lazy dog ", "and keeps running\n", "into ", "the night"];
			for (const chunk of chunks) {
				advance(20);
				viewport.append(chunk);
				expect(viewport.view()).toBe(wrapText(viewport.content(), 26));
			}
			expect(viewport.stats.fullWraps).toBe(1);
			expect(viewport.stats.incrementalWraps).toBe(chunks.length);
		});

		it("rewraps everything at the new width on resize", () => {
			const { viewport } = setup();
			viewport.setSize(34, 10);
			viewport.append("b".repeat(60));
			viewport.forceUpdate();
			expect(viewport.view()).toBe(wrapText(viewport.content(), 30));

			viewport.setSize(44, 10);
			expect(viewport.view()).toBe(`${"b".repeat(40)}\n${"b".repeat(20)}`);
			expect(viewport.stats.fullWraps).toBe(2);

			viewport.setSize(44, 12);
			expect(viewport.stats.fullWraps).toBe(2);
		});

		it("applies a custom padding", () => {
			const { viewport } = setup({ horizontalPadding: 0 });
			viewport.setSize(25, 5);
			expect(viewport.wrapWidth).toBe(25);
			expect(viewport.config.horizontalPadding).toBe(0);
		});

		it("rewraps from scratch on invalidate", () => {
			const { viewport } = setup();
			viewport.setSize(34, 5);
			viewport.append("c".repeat(50));
			viewport.forceUpdate();
			const before = viewport.view();

			viewport.invalidate();
			expect(viewport.view()).toBe(before);
			expect(viewport.stats.fullWraps).toBe(2);
		});
	});

	describe("update throttling", () => {
		it("defers appends within one interval and shows all of them on flush", () => {
			const { viewport, surface, advance } = setup();
			viewport.setSize(34, 10);
			advance(5);
			for (let i = 0; i < 5; i++) {
				viewport.append("x");
			}

			expect(surface.contents).toEqual([""]);
			expect(viewport.view()).toBe("");
			expect(viewport.dirty).toBe(true);
			expect(viewport.stats.deferred).toBe(5);

			expect(viewport.flushIfDirty()).toBe(true);
			expect(viewport.view()).toBe("xxxxx");
			expect(surface.contents).toEqual(["", "xxxxx"]);
			expect(viewport.dirty).toBe(false);
		});

		it("shows every pending chunk with the first append after the interval", () => {
			const { viewport, surface, advance } = setup();
			viewport.setSize(34, 10);
			advance(5);
			viewport.append("one ");
			advance(5);
			viewport.append("two ");
			expect(viewport.view()).toBe("");

			advance(6);
			viewport.append("three");
			expect(viewport.view()).toBe("one two three");
			expect(surface.contents).toHaveLength(2);
		});

		it("treats repeated flushes as idempotent", () => {
			const { viewport, surface, advance } = setup();
			viewport.setSize(34, 10);
			advance(1);
			viewport.append("pending");

			expect(viewport.flushIfDirty()).toBe(true);
			const view = viewport.view();
			expect(viewport.flushIfDirty()).toBe(false);
			expect(viewport.view()).toBe(view);
			expect(surface.contents).toEqual(["", "pending"]);
		});

		it("skips the surface write when the wrapped text is unchanged", () => {
			const { viewport, surface } = setup();
			viewport.setSize(34, 10);
			viewport.forceUpdate();
			viewport.forceUpdate();

			expect(viewport.stats.updates).toBe(3);
			expect(surface.contents).toEqual([""]);
		});
	});

	describe("clear", () => {
		it("empties the transcript and the view and unfreezes", () => {
			const { viewport } = setup();
			viewport.setSize(34, 3);
			viewport.append("some streamed text");
			viewport.forceUpdate();
			viewport.setFrozen(true);

			viewport.clear();

			expect(viewport.content()).toBe("");
			expect(viewport.view()).toBe("");
			expect(viewport.isFrozen()).toBe(false);
			expect(viewport.render(34)).toEqual(["", "", ""]);
		});
	});

	describe("freeze and follow", () => {
		it("holds the scroll position while frozen and jumps to the bottom on unfreeze", () => {
			const { viewport } = setup();
			viewport.setSize(34, 3);
			viewport.appendLine("line 1");
			viewport.appendLine("line 2");
			viewport.forceUpdate();
			expect(viewport.isAtBottom()).toBe(true);

			viewport.setFrozen(true);
			viewport.appendLine("line 3");
			viewport.appendLine("line 4");
			viewport.forceUpdate();

			expect(viewport.view()).toBe("line 1\nline 2\nline 3\nline 4\n");
			expect(viewport.isAtBottom()).toBe(false);
			expect(viewport.scrollPercent()).toBe(0);
			expect(viewport.render(34)).toEqual(["line 1", "line 2", "line 3"]);

			viewport.setFrozen(false);
			expect(viewport.isAtBottom()).toBe(true);
			expect(viewport.scrollPercent()).toBe(1);
			expect(viewport.render(34)).toEqual(["line 3", "line 4", ""]);
		});

		it("freezes when the user scrolls up and resumes at the bottom", () => {
			const { viewport } = setup();
			viewport.setSize(34, 3);
			for (let i = 1; i <= 6; i++) {
				viewport.appendLine(`row ${i}`);
			}
			viewport.forceUpdate();
			expect(viewport.render(34)).toEqual(["row 5", "row 6", ""]);

			viewport.handleInput("\x1b[A");
			expect(viewport.isFrozen()).toBe(true);
			expect(viewport.render(34)).toEqual(["row 4", "row 5", "row 6"]);

			viewport.appendLine("row 7");
			viewport.forceUpdate();
			expect(viewport.render(34)).toEqual(["row 4", "row 5", "row 6"]);

			viewport.handleInput("\x1b[F");
			expect(viewport.isFrozen()).toBe(false);
			expect(viewport.render(34)).toEqual(["row 6", "row 7", ""]);
		});

		it("ignores keys that do not scroll", () => {
			const { viewport } = setup();
			viewport.setSize(34, 3);
			for (let i = 1; i <= 6; i++) {
				viewport.appendLine(`row ${i}`);
			}
			viewport.forceUpdate();
			viewport.setFrozen(true);

			viewport.handleInput("q");
			expect(viewport.isFrozen()).toBe(true);
		});

		it("scrolls to the bottom on request without changing the freeze flag", () => {
			const { viewport } = setup();
			viewport.setSize(34, 2);
			viewport.setFrozen(true);
			viewport.append("1\n2\n3\n4");
			viewport.forceUpdate();
			expect(viewport.isAtBottom()).toBe(false);

			viewport.scrollToBottom();
			expect(viewport.isAtBottom()).toBe(true);
			expect(viewport.isFrozen()).toBe(true);
			expect(viewport.render(34)).toEqual(["3", "4"]);
		});
	});

	describe("render", () => {
		it("pads to the surface height and clamps to the width", () => {
			const { viewport } = setup();
			viewport.setSize(34, 4);
			viewport.append("hi");
			viewport.forceUpdate();

			expect(viewport.render(34)).toEqual(["hi", "", "", ""]);
			expect(viewport.render(1)).toEqual(["h", "", "", ""]);
		});
	});
});
