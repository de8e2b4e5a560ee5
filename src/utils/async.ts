import { AppError } from "./errors";

export const delay = (ms: number): Promise<void> =>
	new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Races `operation` against a timer. Whichever settles first wins and the
 * other side is cancelled: the timer is cleared, or `onTimeout` runs so the
 * caller can abort the still-pending work.
 */
export async function withTimeout<T>(
	operation: Promise<T>,
	timeoutMs: number,
	label: string,
	onTimeout?: () => void,
): Promise<T> {
	let timer: ReturnType<typeof setTimeout> | undefined;

	const timeout = new Promise<never>((_, reject) => {
		timer = setTimeout(() => {
			// Rejected before onTimeout so the race reports the timeout, not the abort
			reject(
				new AppError("TIMEOUT", `${label} timed out after ${timeoutMs}ms`, {
					timeoutMs,
				}),
			);
			onTimeout?.();
		}, timeoutMs);
	});

	try {
		return await Promise.race([operation, timeout]);
	} finally {
		if (timer) clearTimeout(timer);
	}
}

export const cancelledError = (label: string) =>
	new AppError("CANCELLED", `${label} was cancelled`);
