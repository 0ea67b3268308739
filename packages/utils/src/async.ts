/**
 * Wrap a promise with a timeout and optional abort signal.
 * Rejects with the given message if the timeout fires first.
 * Cleans up all listeners on settlement.
 */
export function withTimeout<T>(promise: Promise<T>, ms: number, message: string, signal?: AbortSignal): Promise<T> {
	if (signal?.aborted) {
		const reason = signal.reason instanceof Error ? signal.reason : new Error("Aborted");
		return Promise.reject(reason);
	}

	return new Promise<T>((resolve, reject) => {
		let settled = false;
		const timeoutId = setTimeout(() => {
			if (settled) return;
			settled = true;
			if (signal) signal.removeEventListener("abort", onAbort);
			reject(new Error(message));
		}, ms);

		const onAbort = () => {
			if (settled) return;
			settled = true;
			clearTimeout(timeoutId);
			reject(signal?.reason instanceof Error ? signal.reason : new Error("Aborted"));
		};

		if (signal) {
			signal.addEventListener("abort", onAbort, { once: true });
		}

		promise.then(
			value => {
				if (settled) return;
				settled = true;
				clearTimeout(timeoutId);
				if (signal) signal.removeEventListener("abort", onAbort);
				resolve(value);
			},
			err => {
				if (settled) return;
				settled = true;
				clearTimeout(timeoutId);
				if (signal) signal.removeEventListener("abort", onAbort);
				reject(err);
			},
		);
	});
}

/**
 * Race a promise against an abort signal.
 * Rejects with the signal's reason (or "Aborted") once the signal fires.
 */
export function abortable<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
	if (!signal) return promise;
	if (signal.aborted) {
		return Promise.reject(signal.reason instanceof Error ? signal.reason : new Error("Aborted"));
	}

	return new Promise<T>((resolve, reject) => {
		const onAbort = () => {
			reject(signal.reason instanceof Error ? signal.reason : new Error("Aborted"));
		};
		signal.addEventListener("abort", onAbort, { once: true });
		promise.then(
			value => {
				signal.removeEventListener("abort", onAbort);
				resolve(value);
			},
			err => {
				signal.removeEventListener("abort", onAbort);
				reject(err);
			},
		);
	});
}
