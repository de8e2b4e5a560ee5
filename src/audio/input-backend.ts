import { execa } from "execa";
import { type Recording, record } from "node-record-lpcm16";
import { AppError, type ErrorCode } from "../utils/errors";
import { logError, logger } from "../utils/logger";
import { pcm16ToMonoFloat32 } from "./resampler";

export interface AudioFormat {
	sampleRate: number;
	channels: number;
}

export interface InputHandlers {
	/** Mono float32 samples at the backend's current format rate. */
	onData(samples: Float32Array): void;
	onError(error: AppError): void;
	onFormatChange(format: AudioFormat): void;
}

/**
 * A source of live microphone audio. `open` resolves once the device has
 * been opened; the first `onData` call is the signal that audio is flowing.
 */
export interface AudioInputBackend {
	readonly format: AudioFormat | null;
	open(deviceUid: string, handlers: InputHandlers): Promise<AudioFormat>;
	close(): Promise<void>;
}

const RATE_WARNING = /rate is not accurate \(requested = (\d+)Hz, got = (\d+)Hz\)/;

/**
 * Maps recorder stderr output to an error code, falling back to
 * `UNKNOWN_ERROR` with the raw details attached.
 */
export const classifyCaptureError = (
	stderr: string,
	fallbackMessage: string,
): AppError => {
	let code: ErrorCode = "UNKNOWN_ERROR";
	let message = fallbackMessage;

	if (
		stderr.includes("No such file or directory") ||
		stderr.includes("No such device")
	) {
		code = "NO_MICROPHONE";
		message =
			"No microphone detected. Please check if your microphone is connected and configured correctly.";
	} else if (stderr.includes("Device or resource busy")) {
		code = "DEVICE_BUSY";
		message = "Microphone is busy. Another application might be using it.";
	} else if (
		stderr.includes("Permission denied") ||
		stderr.includes("audio open error")
	) {
		code = "PERMISSION_DENIED";
		message =
			"Microphone permission denied. Please check your system settings and ensure your user is in the 'audio' group.";
	} else if (stderr.trim()) {
		message = `${fallbackMessage}. Details: ${stderr.trim()}`;
	}

	return new AppError(code, message, { stderr });
};

export const ensureArecord = async (): Promise<void> => {
	try {
		await execa("arecord", ["--version"]);
	} catch (_error) {
		throw new AppError(
			"AUDIO_BACKEND_MISSING",
			"Audio recording backend 'arecord' is not installed or not in PATH.",
		);
	}
};

/**
 * Captures raw s16le PCM through `arecord` (via node-record-lpcm16).
 */
export class ArecordInputBackend implements AudioInputBackend {
	private recording: Recording | null = null;
	private carry: Buffer = Buffer.alloc(0);
	private closing = false;
	public format: AudioFormat | null = null;

	constructor(private readonly requested: AudioFormat) {}

	public async open(
		deviceUid: string,
		handlers: InputHandlers,
	): Promise<AudioFormat> {
		if (this.recording) {
			await this.close();
		}

		await ensureArecord();

		this.closing = false;
		this.carry = Buffer.alloc(0);
		const format: AudioFormat = { ...this.requested };
		this.format = format;

		const recording = record({
			sampleRate: format.sampleRate,
			channels: format.channels,
			audioType: "raw",
			recorder: "arecord",
			device: deviceUid || null,
		});
		this.recording = recording;

		let stderrOutput = "";
		recording.process.stderr?.on("data", (chunk: Buffer) => {
			const text = chunk.toString();
			stderrOutput += text;

			const rate = RATE_WARNING.exec(text);
			if (rate?.[2]) {
				const actual = Number.parseInt(rate[2], 10);
				if (actual !== format.sampleRate) {
					format.sampleRate = actual;
					logger.warn(
						{ requested: this.requested.sampleRate, actual },
						"Capture device is running at a different rate",
					);
					handlers.onFormatChange({ ...format });
				}
			}
		});

		const stream = recording.stream();

		stream.on("data", (chunk: Buffer | string) => {
			const bytes = Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk, "binary");
			const data = this.carry.length > 0 ? Buffer.concat([this.carry, bytes]) : bytes;
			const frameBytes = 2 * format.channels;
			const usable = data.length - (data.length % frameBytes);
			this.carry = Buffer.from(data.subarray(usable));
			if (usable === 0) return;
			handlers.onData(pcm16ToMonoFloat32(data.subarray(0, usable), format.channels));
		});

		stream.once("error", (err: unknown) => {
			if (this.closing) return;
			const message = err instanceof Error ? err.message : String(err);
			const error = classifyCaptureError(stderrOutput, message);
			logError("Audio stream error", error, { device: deviceUid || "default" });
			handlers.onError(error);
		});

		logger.debug({ device: deviceUid || "default", ...format }, "Capture opened");
		return { ...format };
	}

	public async close(): Promise<void> {
		const recording = this.recording;
		if (!recording) return;

		this.closing = true;
		this.recording = null;
		this.carry = Buffer.alloc(0);

		try {
			const proc = recording.process;
			if (proc.exitCode === null && proc.signalCode === null) {
				await new Promise<void>((resolve) => {
					proc.once("close", () => resolve());
					recording.stop();
				});
			} else {
				recording.stop();
			}
		} catch (e) {
			logError("Error stopping recording", e);
		}
	}
}
