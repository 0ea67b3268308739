import { abortable, logger, withTimeout } from "@streamview/utils";

/** The part of a viewport a producer needs. */
export interface StreamSink {
	append(text: string): void;
	forceUpdate(): void;
}

export interface PumpOptions {
	signal?: AbortSignal;
	/** Reject when the source produces no chunk for this long */
	chunkTimeoutMs?: number;
}

export interface PumpResult {
	chunks: number;
	characters: number;
	aborted: boolean;
}

function closeQuietly(iterator: AsyncIterator<string>): void {
	const closing = iterator.return?.();
	if (closing) {
		closing.catch((err: unknown) => logger.debug("stream source close failed", { error: String(err) }));
	}
}

/**
 * Feed a producer into a viewport, chunk by chunk, in order.
 *
 * The sink is always force-updated when the pump ends (source exhausted, failed, timed
 * out or aborted), so the display shows every chunk that was appended. Source errors
 * and timeouts are rethrown after that final flush; an abort resolves with `aborted`.
 */
export async function pumpStream(
	source: AsyncIterable<string>,
	sink: StreamSink,
	options: PumpOptions = {},
): Promise<PumpResult> {
	const { signal, chunkTimeoutMs } = options;
	const iterator = source[Symbol.asyncIterator]();
	let chunks = 0;
	let characters = 0;

	try {
		while (true) {
			const next = iterator.next();
			const result = chunkTimeoutMs
				? await withTimeout(next, chunkTimeoutMs, `Stream stalled: no chunk within ${chunkTimeoutMs}ms`, signal)
				: await abortable(next, signal);
			if (result.done) break;
			chunks++;
			characters += result.value.length;
			sink.append(result.value);
		}
		return { chunks, characters, aborted: false };
	} catch (err) {
		closeQuietly(iterator);
		if (signal?.aborted) {
			return { chunks, characters, aborted: true };
		}
		logger.error("stream pump failed", { error: String(err), chunks, characters });
		throw err;
	} finally {
		sink.forceUpdate();
	}
}
