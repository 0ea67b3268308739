import { pumpStream, type StreamSink } from "@streamview/tui";
import { afterEach, describe, expect, it, vi } from "vitest";

class RecordingSink implements StreamSink {
	appended: string[] = [];
	flushes = 0;

	append(text: string): void {
		this.appended.push(text);
	}

	forceUpdate(): void {
		this.flushes++;
	}
}

async function* fromChunks(chunks: string[]): AsyncGenerator<string> {
	for (const chunk of chunks) {
		await Promise.resolve();
		yield chunk;
	}
}

async function* stallAfter(chunk: string): AsyncGenerator<string> {
	yield chunk;
	await new Promise<never>(() => {});
}

describe("pumpStream", () => {
	afterEach(() => {
		vi.useRealTimers();
	});

	it("appends every chunk in order and flushes once at the end", async () => {
		const sink = new RecordingSink();
		const result = await pumpStream(fromChunks(["Hel", "lo", ", world"]), sink);

		expect(sink.appended).toEqual(["Hel", "lo", ", world"]);
		expect(sink.flushes).toBe(1);
		expect(result).toEqual({ chunks: 3, characters: 12, aborted: false });
	});

	it("flushes and rethrows when the source fails", async () => {
		async function* failing(): AsyncGenerator<string> {
			yield "partial";
			throw new Error("connection reset");
		}
		const sink = new RecordingSink();

		await expect(pumpStream(failing(), sink)).rejects.toThrow("connection reset");
		expect(sink.appended).toEqual(["partial"]);
		expect(sink.flushes).toBe(1);
	});

	it("stops quietly when aborted", async () => {
		const controller = new AbortController();
		const sink = new RecordingSink();
		const pending = pumpStream(stallAfter("first"), sink, { signal: controller.signal });

		await new Promise(resolve => setTimeout(resolve, 0));
		controller.abort();

		await expect(pending).resolves.toEqual({ chunks: 1, characters: 5, aborted: true });
		expect(sink.appended).toEqual(["first"]);
		expect(sink.flushes).toBe(1);
	});

	it("rejects when the source stalls longer than the chunk timeout", async () => {
		vi.useFakeTimers();
		const sink = new RecordingSink();
		const pending = pumpStream(stallAfter("first"), sink, { chunkTimeoutMs: 100 });
		const assertion = expect(pending).rejects.toThrow("Stream stalled: no chunk within 100ms");

		await vi.advanceTimersByTimeAsync(100);
		await assertion;
		expect(sink.appended).toEqual(["first"]);
		expect(sink.flushes).toBe(1);
	});
});
