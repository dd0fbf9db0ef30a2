/** Resolves after `ms`, or as soon as `signal` aborts. Never rejects. */
export const sleep = async (ms: number, signal?: AbortSignal) => new Promise<void>((resolve) => {
	if (signal?.aborted) {
		resolve();
		return;
	}

	const onAbort = () => {
		clearTimeout(timer);
		resolve();
	};

	const timer = setTimeout(() => {
		signal?.removeEventListener('abort', onAbort);
		resolve();
	}, ms);

	signal?.addEventListener('abort', onAbort, {once: true});
});
