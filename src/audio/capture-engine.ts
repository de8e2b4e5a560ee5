import { EventEmitter } from "node:events";
import { cancelledError, delay } from "../utils/async";
import { AppError, type ErrorCode, hasErrorCode, toAppError } from "../utils/errors";
import { logError, logger } from "../utils/logger";
import { type AudioChunk, AudioChunker } from "./chunker";
import { DEFAULT_DEVICE_UID } from "./device-service";
import type { AudioFormat, AudioInputBackend, InputHandlers } from "./input-backend";
import { resampleLinear } from "./resampler";

export type ChunkCallback = (chunk: AudioChunk) => void;

export interface DeviceAvailability {
	isDeviceAvailable(uid: string): boolean;
}

export interface HotSwapOptions {
	maxRestarts: number;
	debounceMs: number;
	rateToleranceHz: number;
	restartDelayMs: number;
}

export interface CaptureEngineOptions {
	targetSampleRate: number;
	chunkDurationMs: number;
	maxStartAttempts: number;
	flowWaitMs: number;
	settleMs: number;
	hotSwap: HotSwapOptions;
}

export interface CaptureResult {
	deviceUid: string;
	fellBack: boolean;
	flowing: boolean;
	format: AudioFormat;
}

export type CaptureEngineEvents = {
	flowing: [format: AudioFormat];
	fallback: [requestedUid: string];
	restarted: [reason: string];
	captureError: [error: AppError];
};

// Retrying cannot fix these
const NON_RETRYABLE: ReadonlySet<ErrorCode> = new Set([
	"PERMISSION_DENIED",
	"AUDIO_BACKEND_MISSING",
	"CANCELLED",
]);

// A requested device failing with these is replaced by the default device
const FALLBACK_CODES: ReadonlySet<ErrorCode> = new Set([
	"NO_MICROPHONE",
	"DEVICE_NOT_FOUND",
	"AUDIO_NOT_FLOWING",
]);

interface FlowWaiter {
	resolve(): void;
	reject(error: AppError): void;
}

/**
 * Opens an input device, converts its audio to mono float32 at the target
 * rate and delivers fixed-size chunks to the installed callback.
 *
 * A start only counts once the first samples arrive; opening the device is
 * not enough. Device and format changes during capture restart the
 * pipeline, bounded by a restart cap and a debounce window.
 */
export class AudioCaptureEngine extends EventEmitter<CaptureEngineEvents> {
	private readonly chunker: AudioChunker;
	private chunkCallback: ChunkCallback | null = null;

	private capturing = false;
	private opening = false;
	private flowing = false;
	private inputRate = 0;
	private currentDeviceUid = DEFAULT_DEVICE_UID;

	// Bumped on every device open; stale backend callbacks are ignored
	private token = 0;
	// Bumped on start and stop; in-flight starts and restarts abort
	private epoch = 0;

	private flowWaiter: FlowWaiter | null = null;
	private startupError: AppError | null = null;

	private restartCount = 0;
	private lastRestartAt: number | null = null;
	private restartTimer: ReturnType<typeof setTimeout> | null = null;

	constructor(
		private readonly backend: AudioInputBackend,
		private readonly devices: DeviceAvailability,
		private readonly options: CaptureEngineOptions,
		private readonly now: () => number = Date.now,
	) {
		super();
		this.chunker = new AudioChunker(
			options.targetSampleRate,
			options.chunkDurationMs,
			now,
		);
	}

	/** Installed before {@link start}; receives every chunk, including the final flush. */
	public setChunkCallback(callback: ChunkCallback | null): void {
		this.chunkCallback = callback;
	}

	public isCapturing(): boolean {
		return this.capturing;
	}

	public isFlowing(): boolean {
		return this.capturing && this.flowing;
	}

	public getDeviceUid(): string {
		return this.currentDeviceUid;
	}

	public getRestartCount(): number {
		return this.restartCount;
	}

	/**
	 * Starts capture on `deviceUid`, falling back to the system default when
	 * the device is unknown or never delivers audio.
	 * @throws {AppError} PERMISSION_DENIED, AUDIO_BACKEND_MISSING, CANCELLED, or the last start failure
	 */
	public async start(deviceUid: string): Promise<CaptureResult> {
		if (this.capturing || this.opening) {
			await this.stop();
		}

		this.epoch++;
		this.restartCount = 0;
		this.lastRestartAt = null;
		this.chunker.reset();

		let uid = deviceUid;
		let fellBack = false;
		if (uid !== DEFAULT_DEVICE_UID && !this.devices.isDeviceAvailable(uid)) {
			logger.warn({ requested: uid }, "Audio device not found, using default");
			this.emit("fallback", uid);
			uid = DEFAULT_DEVICE_UID;
			fellBack = true;
		}

		const result = await this.openWithRetries(uid, false);
		this.capturing = true;
		this.currentDeviceUid = result.deviceUid;

		const outcome = { ...result, fellBack: fellBack || result.fellBack };
		logger.info(
			{
				device: outcome.deviceUid || "default",
				fellBack: outcome.fellBack,
				flowing: outcome.flowing,
				rate: outcome.format.sampleRate,
			},
			"Audio capture started",
		);
		return outcome;
	}

	/**
	 * Stops capture and flushes the buffered remainder as one final chunk.
	 * Safe to call when nothing is running.
	 */
	public async stop(): Promise<void> {
		this.epoch++;
		this.token++;

		if (this.restartTimer) {
			clearTimeout(this.restartTimer);
			this.restartTimer = null;
		}
		if (this.flowWaiter) {
			this.flowWaiter.reject(cancelledError("Audio capture start"));
			this.flowWaiter = null;
		}

		const wasActive = this.capturing || this.opening;
		this.capturing = false;
		this.opening = false;
		this.flowing = false;

		await this.backend.close();

		const tail = this.chunker.flush();
		if (tail) this.deliver(tail);

		if (wasActive) logger.info("Audio capture stopped");
	}

	/**
	 * Hot-swap entry point for device-list and format-change notifications.
	 * @param rateChanged the input rate moved beyond the tolerance
	 * @returns whether a restart was scheduled
	 */
	public handleConfigurationChange(reason: string, rateChanged = false): boolean {
		if (!this.capturing) {
			logger.debug({ reason }, "Config change ignored - not capturing");
			return false;
		}

		const { maxRestarts, debounceMs, restartDelayMs } = this.options.hotSwap;

		if (this.lastRestartAt !== null) {
			const sinceLast = this.now() - this.lastRestartAt;
			if (sinceLast < debounceMs) {
				logger.debug({ reason, sinceLast }, "Config change ignored - debounce");
				return false;
			}
		}

		if (this.restartCount >= maxRestarts) {
			logger.debug(
				{ reason, restarts: this.restartCount },
				"Config change ignored - max restarts reached",
			);
			return false;
		}

		if (this.flowing && !rateChanged) {
			logger.debug(
				{ reason, rate: this.inputRate },
				"Config change ignored - audio flowing at expected rate",
			);
			return false;
		}

		this.restartCount++;
		this.lastRestartAt = this.now();
		logger.warn(
			{ reason, restart: this.restartCount },
			"Restarting audio capture after configuration change",
		);

		const epoch = this.epoch;
		if (this.restartTimer) clearTimeout(this.restartTimer);
		this.restartTimer = setTimeout(() => {
			this.restartTimer = null;
			this.restart(epoch, reason).catch((error) => {
				logError("Audio capture restart failed", error);
			});
		}, restartDelayMs);

		return true;
	}

	private async restart(epoch: number, reason: string): Promise<void> {
		if (epoch !== this.epoch || !this.capturing) return;

		this.token++;
		this.flowing = false;
		await this.backend.close();
		if (epoch !== this.epoch) return;

		try {
			const result = await this.openWithRetries(this.currentDeviceUid, true);
			this.currentDeviceUid = result.deviceUid;
			logger.info({ reason, flowing: result.flowing }, "Audio capture restarted");
			this.emit("restarted", reason);
		} catch (error) {
			if (hasErrorCode(error, "CANCELLED") || epoch !== this.epoch) return;
			this.capturing = false;
			const appError = toAppError(error);
			logError("Failed to restart audio capture", appError);
			this.emit("captureError", appError);
		}
	}

	private async openWithRetries(
		uid: string,
		isRestart: boolean,
	): Promise<CaptureResult> {
		const epoch = this.epoch;
		const maxAttempts = isRestart
			? Math.max(1, this.options.maxStartAttempts - 1)
			: this.options.maxStartAttempts;

		this.opening = true;
		try {
			let lastError: AppError | null = null;

			for (let attempt = 1; attempt <= maxAttempts; attempt++) {
				try {
					const flowed = await this.openOnce(uid);
					this.assertEpoch(epoch);
					if (flowed) {
						logger.debug({ attempt, isRestart }, "Audio flowing");
						return this.result(uid, false, true);
					}
					lastError = new AppError(
						"AUDIO_NOT_FLOWING",
						`No audio within ${this.options.flowWaitMs}ms`,
					);
					logger.warn({ attempt }, "Device opened but no audio flow");
				} catch (error) {
					const appError = toAppError(error);
					if (NON_RETRYABLE.has(appError.code) || epoch !== this.epoch) {
						await this.backend.close();
						throw epoch !== this.epoch
							? cancelledError("Audio capture start")
							: appError;
					}
					lastError = appError;
					logger.warn(
						{ attempt, code: appError.code, err: appError },
						"Audio capture attempt failed",
					);
				}

				await this.backend.close();
				await delay(this.options.settleMs);
				this.assertEpoch(epoch);
			}

			// One last open, accepted even without audio flow
			const finalUid =
				uid !== DEFAULT_DEVICE_UID && lastError && FALLBACK_CODES.has(lastError.code)
					? DEFAULT_DEVICE_UID
					: uid;
			if (finalUid !== uid) {
				logger.warn({ requested: uid }, "Falling back to default microphone");
				this.emit("fallback", uid);
			} else {
				logger.warn("All audio capture attempts had issues, trying final attempt");
			}

			try {
				const flowed = await this.openOnce(finalUid);
				this.assertEpoch(epoch);
				return this.result(finalUid, finalUid !== uid, flowed);
			} catch (error) {
				await this.backend.close();
				if (epoch !== this.epoch) throw cancelledError("Audio capture start");
				const appError = toAppError(error);
				throw finalUid === uid && lastError && !NON_RETRYABLE.has(appError.code)
					? lastError
					: appError;
			}
		} finally {
			if (epoch === this.epoch) this.opening = false;
		}
	}

	private async openOnce(uid: string): Promise<boolean> {
		const token = ++this.token;
		this.flowing = false;
		this.startupError = null;

		const format = await this.backend.open(uid, this.handlersFor(token));
		if (token !== this.token) {
			throw cancelledError("Audio capture start");
		}
		this.inputRate = format.sampleRate;
		return this.waitForFlow();
	}

	private waitForFlow(): Promise<boolean> {
		if (this.flowing) return Promise.resolve(true);
		if (this.startupError) return Promise.reject(this.startupError);

		return new Promise<boolean>((resolve, reject) => {
			const timer = setTimeout(() => {
				this.flowWaiter = null;
				resolve(false);
			}, this.options.flowWaitMs);

			this.flowWaiter = {
				resolve: () => {
					clearTimeout(timer);
					resolve(true);
				},
				reject: (error) => {
					clearTimeout(timer);
					reject(error);
				},
			};
		});
	}

	private handlersFor(token: number): InputHandlers {
		return {
			onData: (samples) => {
				if (token !== this.token) return;
				if (!this.flowing) {
					this.flowing = true;
					this.emit("flowing", { sampleRate: this.inputRate, channels: 1 });
					this.flowWaiter?.resolve();
					this.flowWaiter = null;
				}
				this.process(samples);
			},
			onError: (error) => {
				if (token !== this.token) return;
				if (this.flowWaiter) {
					this.flowWaiter.reject(error);
					this.flowWaiter = null;
					return;
				}
				if (this.opening || !this.capturing) {
					this.startupError = error;
					return;
				}
				this.handleRuntimeError(error);
			},
			onFormatChange: (format) => {
				if (token !== this.token) return;
				const previous = this.inputRate;
				this.inputRate = format.sampleRate;
				const rateChanged =
					Math.abs(format.sampleRate - previous) >
					this.options.hotSwap.rateToleranceHz;
				this.handleConfigurationChange("format change", rateChanged);
			},
		};
	}

	private handleRuntimeError(error: AppError): void {
		this.flowing = false;
		if (this.handleConfigurationChange(`capture error: ${error.code}`)) {
			return;
		}
		this.capturing = false;
		logError("Audio capture failed", error);
		this.emit("captureError", error);
	}

	private process(samples: Float32Array): void {
		// Data can arrive before open() has reported the format
		const inputRate =
			this.inputRate > 0
				? this.inputRate
				: (this.backend.format?.sampleRate ?? this.options.targetSampleRate);
		const converted = resampleLinear(samples, inputRate, this.options.targetSampleRate);
		for (const chunk of this.chunker.push(converted)) {
			this.deliver(chunk);
		}
	}

	private deliver(chunk: AudioChunk): void {
		if (!this.chunkCallback) return;
		try {
			this.chunkCallback(chunk);
		} catch (error) {
			logError("Chunk callback failed", error, { sequence: chunk.sequence });
		}
	}

	private result(uid: string, fellBack: boolean, flowing: boolean): CaptureResult {
		return {
			deviceUid: uid,
			fellBack,
			flowing,
			format: {
				sampleRate: this.inputRate,
				channels: this.backend.format?.channels ?? 1,
			},
		};
	}

	private assertEpoch(epoch: number): void {
		if (epoch !== this.epoch) {
			throw cancelledError("Audio capture start");
		}
	}
}
