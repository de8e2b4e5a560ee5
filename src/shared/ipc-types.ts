import { z } from "zod";
import type { AudioDevice } from "../audio/device-service";
import { type SessionMode, SessionModeSchema } from "../config/schema";
import type { ConnectionSnapshot, ModelSnapshot } from "../daemon/connection";
import { KeepWarmDurationSchema } from "../daemon/protocol";
import type { SessionSnapshot, TranscriptKind } from "../daemon/session";
import type { ProcessSnapshot } from "../daemon/supervisor";

export const IPC_PROTOCOL_VERSION = 1;

export interface Selection {
	deviceUid: string;
	model: string;
	mode: SessionMode;
	diarization: boolean;
}

export interface DaemonState {
	session: SessionSnapshot;
	connection: ConnectionSnapshot;
	backend: ProcessSnapshot;
	model: ModelSnapshot;
	devices: AudioDevice[];
	selection: Selection;
	timestamp: number;
}

export type IPCMessage =
	| { type: "hello"; version: number; state: DaemonState | null }
	| ({ type: "state" } & DaemonState)
	| { type: "transcript"; kind: TranscriptKind; text: string }
	| { type: "error"; message: string };

const command = <C extends string>(name: C) => ({
	type: z.literal("command"),
	command: z.literal(name),
});

export const IPCCommandSchema = z.discriminatedUnion("command", [
	z.object(command("toggle")),
	z.object(command("start")),
	z.object(command("stop")),
	z.object(command("cancel")),
	z.object({ ...command("select_device"), value: z.string() }),
	z.object({ ...command("select_model"), value: z.string().min(1) }),
	z.object({ ...command("set_mode"), value: SessionModeSchema }),
	z.object({ ...command("set_diarization"), value: z.boolean() }),
	z.object(command("download_model")),
	z.object({ ...command("load_model"), value: z.string().min(1) }),
	z.object(command("clear_cache")),
	z.object(command("get_models")),
	z.object({
		...command("set_keep_warm"),
		value: z.object({
			models: z.array(z.string()),
			duration: KeepWarmDurationSchema,
		}),
	}),
]);

export type IPCCommand = z.infer<typeof IPCCommandSchema>;

/** Summary written to `daemon.state` for the CLI. */
export const DaemonStatusFileSchema = z.object({
	pid: z.number().int(),
	uptime: z.number(),
	session: z.string(),
	connection: z.string(),
	backend: z.string(),
	deviceUid: z.string(),
	model: z.string(),
	mode: SessionModeSchema,
	lastTranscript: z.string().optional(),
	lastError: z.string().optional(),
	timestamp: z.number(),
});

export type DaemonStatusFile = z.infer<typeof DaemonStatusFileSchema>;
