import { z } from "zod";

const noArgs: string[] = [];
const noEnv: Record<string, string> = {};

const defaultBackend = {
	name: "asr-server",
	python: "python3",
	script: "~/.local/share/voxlane/server/server.py",
	extraArgs: noArgs,
	env: noEnv,
	port: 9877,
	startupDelayMs: 3000,
	maxRestartAttempts: 5,
	restartDelayMs: 1000,
};

const defaultConnection = {
	host: "127.0.0.1",
	path: "/ws",
	heartbeatIntervalMs: 30_000,
	staleThresholdMs: 120_000,
	probeTimeoutMs: 2000,
	reconnectDelayMs: 2000,
	maxReconnectAttempts: 5,
	wakeSettleMs: 2000,
	wakeProbeMs: 3000,
};

const defaultAudio = {
	captureSampleRate: 48_000,
	channels: 1,
	targetSampleRate: 16_000,
	chunkDurationMs: 400,
	maxStartAttempts: 3,
	flowWaitMs: 500,
	settleMs: 300,
	hotSwap: {
		maxRestarts: 2,
		debounceMs: 500,
		rateToleranceHz: 100,
		restartDelayMs: 300,
	},
};

const defaultDevices = {
	pollIntervalMs: 2000,
	watchPath: "/dev/snd",
	selected: "",
};

const defaultSession = {
	model: "parakeet",
	mode: "dictation" as const,
	diarization: false,
	readyTimeoutMs: 30_000,
	processingTimeoutMs: 15_000,
	intervalMs: 30_000,
};

const defaultBehavior = {
	notifications: true,
	wakeCheckIntervalMs: 5000,
	wakeThresholdMs: 10_000,
};

const defaultPaths = {
	logs: "~/.config/voxlane/logs/",
	runtimeHome: "",
};

export const BackendSchema = z.object({
	name: z.string().min(1).default(defaultBackend.name),
	python: z.string().min(1).default(defaultBackend.python),
	script: z.string().min(1).default(defaultBackend.script),
	extraArgs: z.array(z.string()).default(defaultBackend.extraArgs),
	env: z.record(z.string()).default(defaultBackend.env),
	port: z.number().int().min(1).max(65_535).default(defaultBackend.port),
	startupDelayMs: z.number().int().min(0).default(defaultBackend.startupDelayMs),
	maxRestartAttempts: z
		.number()
		.int()
		.min(0)
		.default(defaultBackend.maxRestartAttempts),
	restartDelayMs: z.number().int().min(0).default(defaultBackend.restartDelayMs),
});

export const ConnectionSchema = z.object({
	host: z.string().default(defaultConnection.host),
	path: z
		.string()
		.startsWith("/", { message: "Path must start with '/'" })
		.default(defaultConnection.path),
	heartbeatIntervalMs: z
		.number()
		.int()
		.positive()
		.default(defaultConnection.heartbeatIntervalMs),
	staleThresholdMs: z
		.number()
		.int()
		.positive()
		.default(defaultConnection.staleThresholdMs),
	probeTimeoutMs: z
		.number()
		.int()
		.positive()
		.default(defaultConnection.probeTimeoutMs),
	reconnectDelayMs: z
		.number()
		.int()
		.min(0)
		.default(defaultConnection.reconnectDelayMs),
	maxReconnectAttempts: z
		.number()
		.int()
		.min(0)
		.default(defaultConnection.maxReconnectAttempts),
	wakeSettleMs: z.number().int().min(0).default(defaultConnection.wakeSettleMs),
	wakeProbeMs: z
		.number()
		.int()
		.positive()
		.default(defaultConnection.wakeProbeMs),
});

export const AudioSchema = z.object({
	captureSampleRate: z
		.number()
		.int()
		.min(8000)
		.max(192_000)
		.default(defaultAudio.captureSampleRate),
	channels: z.number().int().min(1).max(8).default(defaultAudio.channels),
	targetSampleRate: z
		.number()
		.int()
		.min(8000)
		.max(48_000)
		.default(defaultAudio.targetSampleRate),
	chunkDurationMs: z
		.number()
		.int()
		.min(20)
		.max(5000)
		.default(defaultAudio.chunkDurationMs),
	maxStartAttempts: z
		.number()
		.int()
		.min(1)
		.default(defaultAudio.maxStartAttempts),
	flowWaitMs: z.number().int().positive().default(defaultAudio.flowWaitMs),
	settleMs: z.number().int().min(0).default(defaultAudio.settleMs),
	hotSwap: z
		.object({
			maxRestarts: z
				.number()
				.int()
				.min(0)
				.default(defaultAudio.hotSwap.maxRestarts),
			debounceMs: z
				.number()
				.int()
				.min(0)
				.default(defaultAudio.hotSwap.debounceMs),
			rateToleranceHz: z
				.number()
				.min(0)
				.default(defaultAudio.hotSwap.rateToleranceHz),
			restartDelayMs: z
				.number()
				.int()
				.min(0)
				.default(defaultAudio.hotSwap.restartDelayMs),
		})
		.default(defaultAudio.hotSwap),
});

export const DevicesSchema = z.object({
	pollIntervalMs: z
		.number()
		.int()
		.min(100)
		.default(defaultDevices.pollIntervalMs),
	watchPath: z.string().default(defaultDevices.watchPath),
	selected: z.string().default(defaultDevices.selected),
});

export const SessionModeSchema = z.enum(["dictation", "continuous"]);

export const SessionSchema = z.object({
	model: z.string().min(1).default(defaultSession.model),
	mode: SessionModeSchema.default(defaultSession.mode),
	diarization: z.boolean().default(defaultSession.diarization),
	readyTimeoutMs: z
		.number()
		.int()
		.positive()
		.default(defaultSession.readyTimeoutMs),
	processingTimeoutMs: z
		.number()
		.int()
		.positive()
		.default(defaultSession.processingTimeoutMs),
	intervalMs: z
		.number()
		.int()
		.min(1000)
		.default(defaultSession.intervalMs),
});

export const BehaviorSchema = z.object({
	notifications: z.boolean().default(defaultBehavior.notifications),
	wakeCheckIntervalMs: z
		.number()
		.int()
		.positive()
		.default(defaultBehavior.wakeCheckIntervalMs),
	wakeThresholdMs: z
		.number()
		.int()
		.positive()
		.default(defaultBehavior.wakeThresholdMs),
});

export const PathsSchema = z.object({
	logs: z.string().default(defaultPaths.logs),
	runtimeHome: z.string().default(defaultPaths.runtimeHome),
});

export const ConfigSchema = z.object({
	backend: BackendSchema.default(defaultBackend),
	connection: ConnectionSchema.default(defaultConnection),
	audio: AudioSchema.default(defaultAudio),
	devices: DevicesSchema.default(defaultDevices),
	session: SessionSchema.default(defaultSession),
	behavior: BehaviorSchema.default(defaultBehavior),
	paths: PathsSchema.default(defaultPaths),
});

export type Config = z.infer<typeof ConfigSchema>;
export type SessionMode = z.infer<typeof SessionModeSchema>;

/**
 * The raw config file structure before defaults are applied.
 */
export type ConfigFile = z.input<typeof ConfigSchema>;
