export type ErrorCode =
	| "BUSY"
	| "NO_MICROPHONE"
	| "PERMISSION_DENIED"
	| "DEVICE_BUSY"
	| "DEVICE_NOT_FOUND"
	| "AUDIO_BACKEND_MISSING"
	| "AUDIO_NOT_FLOWING"
	| "BACKEND_NOT_CONNECTED"
	| "BACKEND_NOT_READY"
	| "BACKEND_ERROR"
	| "PROCESS_SPAWN_FAILED"
	| "CRASH_LIMIT_REACHED"
	| "TIMEOUT"
	| "CANCELLED"
	| "VALIDATION_FAILED"
	| "CORRUPTED"
	| "UNKNOWN_ERROR";

export class AppError extends Error {
	public readonly code: ErrorCode;
	public readonly context?: Record<string, unknown>;

	constructor(
		code: ErrorCode,
		message: string,
		context?: Record<string, unknown>,
	) {
		super(message);
		this.code = code;
		this.context = context;
		this.name = "AppError";
		Object.setPrototypeOf(this, AppError.prototype);
	}
}

export const hasErrorCode = (
	error: unknown,
	code: ErrorCode,
): error is AppError => error instanceof AppError && error.code === code;

export const toAppError = (
	error: unknown,
	fallback: ErrorCode = "UNKNOWN_ERROR",
): AppError => {
	if (error instanceof AppError) return error;
	const message = error instanceof Error ? error.message : String(error);
	return new AppError(fallback, message);
};
