import { execa } from "execa";
import { AppError } from "../utils/errors";
import { logError } from "../utils/logger";
import { withRetry } from "../utils/retry";

export interface AudioDevice {
	/** ALSA PCM name passed to `arecord -D`. `""` selects the system default. */
	uid: string;
	displayName: string;
}

export const DEFAULT_DEVICE_UID = "";

const isMissingBinary = (error: unknown): boolean =>
	error instanceof Error && "code" in error && error.code === "ENOENT";

export class AudioDeviceService {
	/**
	 * Lists available audio input devices using `arecord -L`.
	 */
	public async listDevices(): Promise<AudioDevice[]> {
		return withRetry(
			async (signal) => {
				try {
					const { stdout } = await execa("arecord", ["-L"], {
						cancelSignal: signal,
					});
					return parseArecordOutput(stdout);
				} catch (error) {
					if (isMissingBinary(error)) {
						throw new AppError(
							"AUDIO_BACKEND_MISSING",
							"Audio recording backend 'arecord' is not installed or not in PATH.",
						);
					}
					logError("Failed to list audio devices", error);
					throw error;
				}
			},
			{
				operationName: "List audio devices",
				timeout: 5000,
				shouldRetry: (error) =>
					!(error instanceof AppError && error.code === "AUDIO_BACKEND_MISSING"),
			},
		);
	}
}

/**
 * Parses the output of `arecord -L`: an unindented PCM name followed by
 * indented description lines. The first description line becomes the
 * display name.
 */
export const parseArecordOutput = (output: string): AudioDevice[] => {
	const devices: AudioDevice[] = [];

	let currentUid: string | null = null;
	let descriptionLines: string[] = [];

	const flushDevice = () => {
		if (!currentUid || currentUid === "null") return;
		devices.push({
			uid: currentUid,
			displayName: descriptionLines[0] ?? currentUid,
		});
	};

	for (const line of output.split("\n")) {
		if (!line.trim()) continue;

		if (!/^\s/.test(line)) {
			flushDevice();
			currentUid = line.trim();
			descriptionLines = [];
		} else {
			descriptionLines.push(line.trim());
		}
	}

	flushDevice();

	return devices;
};
