import { AppError, type ErrorCode } from "./errors";

export interface ErrorTemplate {
	message: string;
	action: string;
}

const formatDuration = (ms: number): string =>
	ms < 1000 ? `${ms}ms` : `${Math.round(ms / 1000)}s`;

export const ErrorTemplates = {
	// Audio Errors
	AUDIO: {
		AUDIO_BACKEND_MISSING: {
			message: "Audio recording backend 'arecord' is not installed.",
			action:
				"Please install 'alsa-utils' using your package manager (e.g., 'sudo apt install alsa-utils' or 'sudo pacman -S alsa-utils').",
		},
		NO_MICROPHONE: {
			message: "No microphone detected or could not be opened.",
			action:
				"1. Check if your microphone is physically connected.\n2. Run 'voxlane list-mics' to see the available input devices.\n3. Select another device or fall back to the system default.",
		},
		PERMISSION_DENIED: {
			message: "Microphone permission denied.",
			action:
				"1. Ensure your user is in the 'audio' group: 'sudo usermod -aG audio $USER'.\n2. Log out and back in for group changes to take effect.\n3. Check if your desktop environment is blocking microphone access in Privacy settings.",
		},
		DEVICE_BUSY: {
			message: "Microphone is busy or already in use.",
			action:
				"1. Close other applications that might be using the microphone.\n2. Run 'fuser /dev/snd/*' to see which processes are using audio devices.",
		},
		AUDIO_NOT_FLOWING: {
			message: "The microphone opened but delivered no audio.",
			action:
				"Reconnect the device or select another input. Bluetooth headsets may need a moment to switch into headset mode.",
		},
	},

	// Backend Errors
	BACKEND: {
		NOT_CONNECTED: {
			message: "The transcription backend is not connected.",
			action:
				"voxlane is reconnecting. If this keeps happening, check the backend logs with 'voxlane errors'.",
		},
		NOT_READY: (timeoutMs: number) => ({
			message: `The transcription backend did not become ready within ${formatDuration(timeoutMs)}.`,
			action:
				"The model may still be loading. Wait a moment and try again.",
		}),
		CRASH_LIMIT_REACHED: {
			message: "The transcription backend crashed too many times and will not auto-restart.",
			action:
				"Check the logs in ~/.config/voxlane/logs/ to identify the root cause, then restart the daemon.",
		},
		ERROR: (detail: string) => ({
			message: `The transcription backend reported an error: ${detail}`,
			action: "Try again. If the error persists, restart the daemon.",
		}),
	},

	// Configuration Errors
	CONFIG: {
		VALIDATION_FAILED: {
			message: "Configuration validation failed.",
			action:
				"Review the error details and fix the invalid fields in ~/.config/voxlane/config.json.",
		},
		CORRUPTED: {
			message: "Configuration file is corrupted (invalid JSON).",
			action: "To reset, delete the file: rm ~/.config/voxlane/config.json",
		},
	},
};

export const formatUserError = (template: ErrorTemplate): string => {
	return `${template.message}\n\nAction: ${template.action}`;
};

const AUDIO_TEMPLATES: Partial<Record<ErrorCode, ErrorTemplate>> = {
	AUDIO_BACKEND_MISSING: ErrorTemplates.AUDIO.AUDIO_BACKEND_MISSING,
	NO_MICROPHONE: ErrorTemplates.AUDIO.NO_MICROPHONE,
	DEVICE_NOT_FOUND: ErrorTemplates.AUDIO.NO_MICROPHONE,
	PERMISSION_DENIED: ErrorTemplates.AUDIO.PERMISSION_DENIED,
	DEVICE_BUSY: ErrorTemplates.AUDIO.DEVICE_BUSY,
	AUDIO_NOT_FLOWING: ErrorTemplates.AUDIO.AUDIO_NOT_FLOWING,
};

/**
 * Short, single-line reason for a failed session, suitable for the
 * `error(reason)` session state.
 */
export const describeSessionError = (error: unknown): string => {
	if (!(error instanceof AppError)) {
		return error instanceof Error ? error.message : String(error);
	}

	const template = AUDIO_TEMPLATES[error.code];
	if (template) return template.message;

	switch (error.code) {
		case "TIMEOUT":
		case "BACKEND_NOT_READY": {
			const timeoutMs = error.context?.timeoutMs;
			return typeof timeoutMs === "number"
				? ErrorTemplates.BACKEND.NOT_READY(timeoutMs).message
				: error.message;
		}
		case "BACKEND_NOT_CONNECTED":
			return ErrorTemplates.BACKEND.NOT_CONNECTED.message;
		case "BACKEND_ERROR":
			return ErrorTemplates.BACKEND.ERROR(error.message).message;
		default:
			return error.message;
	}
};
