import type {
	AudioFormat,
	AudioInputBackend,
	InputHandlers,
} from "../../src/audio/input-backend";
import type { AppError } from "../../src/utils/errors";

/** What one call to `open` does: deliver audio, stay silent, or fail. */
export type OpenStep = "flow" | "silent" | AppError;

/**
 * Scripted input backend. Each open consumes one step from `script`,
 * falling back to `defaultStep`; a flowing open delivers an empty buffer
 * right after it resolves, which is enough to count as audio flow.
 */
export class FakeInputBackend implements AudioInputBackend {
	public format: AudioFormat | null = null;
	public handlers: InputHandlers | null = null;
	public readonly opened: string[] = [];
	public closeCount = 0;
	public script: OpenStep[] = [];
	public defaultStep: OpenStep = "flow";

	constructor(public sampleRate = 16_000) {}

	public async open(deviceUid: string, handlers: InputHandlers): Promise<AudioFormat> {
		this.opened.push(deviceUid);
		const step = this.script.shift() ?? this.defaultStep;
		if (typeof step !== "string") throw step;

		this.handlers = handlers;
		this.format = { sampleRate: this.sampleRate, channels: 1 };
		if (step === "flow") {
			queueMicrotask(() => handlers.onData(new Float32Array(0)));
		}
		return { ...this.format };
	}

	public async close(): Promise<void> {
		this.closeCount++;
		this.handlers = null;
	}

	public emit(samples: Float32Array): void {
		this.handlers?.onData(samples);
	}
}
