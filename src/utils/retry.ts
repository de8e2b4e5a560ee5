import { delay, withTimeout } from "./async";
import { logError } from "./logger";

interface RetryOptions {
	/** Retries after the first attempt. */
	maxRetries?: number;
	/** Wait before each retry; the last entry repeats. */
	backoffs?: number[];
	operationName?: string;
	/**
	 * Per-attempt limit in ms. A late attempt is aborted through its signal
	 * and fails with a `TIMEOUT` AppError.
	 */
	timeout?: number;
	shouldRetry?: (error: unknown) => boolean;
}

const runAttempt = <T>(
	operation: (signal?: AbortSignal) => Promise<T>,
	timeoutMs: number | undefined,
	label: string,
): Promise<T> => {
	if (!timeoutMs) return operation();
	const controller = new AbortController();
	return withTimeout(operation(controller.signal), timeoutMs, label, () =>
		controller.abort(),
	);
};

export async function withRetry<T>(
	operation: (signal?: AbortSignal) => Promise<T>,
	options: RetryOptions = {},
): Promise<T> {
	const {
		maxRetries = 2,
		backoffs = [100, 200],
		operationName = "Operation",
		timeout,
		shouldRetry = () => true,
	} = options;
	const totalAttempts = maxRetries + 1;

	for (let attempt = 1; ; attempt++) {
		try {
			return await runAttempt(operation, timeout, operationName);
		} catch (error) {
			if (!shouldRetry(error)) throw error;
			if (attempt >= totalAttempts) {
				logError(`${operationName} failed after ${totalAttempts} attempts`, error);
				throw error;
			}
			logError(`${operationName} attempt ${attempt}/${totalAttempts} failed`, error);
			await delay(backoffs[attempt - 1] ?? backoffs[backoffs.length - 1] ?? 0);
		}
	}
}
