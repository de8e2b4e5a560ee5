import { z } from "zod";
import type { AudioChunk } from "../audio/chunker";

// Outbound (daemon -> backend)

export interface StartMessage {
	type: "start";
	settings: { model: string; enable_diarization: boolean };
}

export interface AudioMessage {
	type: "audio";
	/** Base64 of little-endian float32 PCM. */
	data: string;
	timestamp: number;
}

export interface LoadModelMessage {
	type: "load_model";
	model: string;
}

export const KeepWarmDurationSchema = z.enum(["1h", "4h", "8h", "16h", "permanent"]);
export type KeepWarmDuration = z.infer<typeof KeepWarmDurationSchema>;

export interface SetKeepWarmMessage {
	type: "set_keep_warm";
	models: string[];
	duration: KeepWarmDuration;
}

export type OutboundMessage =
	| StartMessage
	| AudioMessage
	| LoadModelMessage
	| SetKeepWarmMessage
	| {
			type:
				| "stop"
				| "transcribe_interval"
				| "ping"
				| "download_model"
				| "clear_cache"
				| "get_models";
	  };

// Inbound (backend -> daemon)

const ModelInfoSchema = z
	.object({
		id: z.string(),
		name: z.string().optional(),
		description: z.string().optional(),
		size: z.string().optional(),
		available: z.boolean().optional(),
		downloaded: z.boolean().optional(),
		loaded: z.boolean().optional(),
	})
	.passthrough();

export const InboundMessageSchema = z.discriminatedUnion("type", [
	z.object({
		type: z.literal("ready"),
		model_loaded: z.boolean().default(false),
		whisper_available: z.boolean().default(false),
		loaded_models: z.array(z.string()).default([]),
		active_model: z.string().optional(),
	}),
	z.object({ type: z.literal("partial"), text: z.string() }),
	z.object({ type: z.literal("final"), text: z.string() }),
	z.object({ type: z.literal("interval_transcription"), text: z.string() }),
	z.object({ type: z.literal("error"), message: z.string() }),
	z.object({ type: z.literal("model_progress"), percent: z.number() }),
	z.object({ type: z.literal("model_downloaded") }),
	z.object({ type: z.literal("model_loaded"), model: z.string() }),
	z.object({ type: z.literal("model_error"), message: z.string() }),
	z.object({
		type: z.literal("models_list"),
		models: z.array(ModelInfoSchema),
		active_model: z.string().optional(),
	}),
	z.object({ type: z.literal("pong") }),
	z.object({
		type: z.literal("keep_warm_updated"),
		models: z.array(z.string()),
		duration: z.string(),
	}),
	z.object({ type: z.literal("model_unloaded"), model: z.string() }),
	z.object({ type: z.literal("recording_ready"), model: z.string().optional() }),
]);

export type InboundMessage = z.infer<typeof InboundMessageSchema>;
export type InboundType = InboundMessage["type"];
export type InboundOf<T extends InboundType> = Extract<InboundMessage, { type: T }>;
export type ModelInfo = z.infer<typeof ModelInfoSchema>;

export type ParseResult =
	| { ok: true; message: InboundMessage }
	| { ok: false; error: string };

export const parseInbound = (raw: string): ParseResult => {
	let json: unknown;
	try {
		json = JSON.parse(raw);
	} catch (_error) {
		return { ok: false, error: "invalid JSON" };
	}

	const result = InboundMessageSchema.safeParse(json);
	if (!result.success) {
		const issues = result.error.issues
			.map((e) => `${e.path.join(".") || "message"}: ${e.message}`)
			.join("; ");
		return { ok: false, error: issues };
	}
	return { ok: true, message: result.data };
};

export const isInboundOf = <T extends InboundType>(
	message: InboundMessage,
	type: T,
): message is InboundOf<T> => message.type === type;

/** Little-endian float32 PCM, base64 encoded. */
export const encodeSamples = (samples: Float32Array): string => {
	const bytes = Buffer.alloc(samples.length * 4);
	for (let i = 0; i < samples.length; i++) {
		bytes.writeFloatLE(samples[i] ?? 0, i * 4);
	}
	return bytes.toString("base64");
};

export const decodeSamples = (data: string): Float32Array => {
	const bytes = Buffer.from(data, "base64");
	const out = new Float32Array(Math.floor(bytes.length / 4));
	for (let i = 0; i < out.length; i++) {
		out[i] = bytes.readFloatLE(i * 4);
	}
	return out;
};

export const audioMessage = (chunk: AudioChunk): AudioMessage => ({
	type: "audio",
	data: encodeSamples(chunk.samples),
	timestamp: chunk.timestamp,
});

export const startMessage = (
	model: string,
	enableDiarization: boolean,
): StartMessage => ({
	type: "start",
	settings: { model, enable_diarization: enableDiarization },
});
