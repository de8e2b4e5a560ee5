import { rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { AudioCaptureEngine } from "../audio/capture-engine";
import type { DeviceLister, DeviceWatchFactory } from "../audio/device-monitor";
import { DeviceMonitor } from "../audio/device-monitor";
import {
	type AudioDevice,
	AudioDeviceService,
	DEFAULT_DEVICE_UID,
} from "../audio/device-service";
import { ArecordInputBackend, type AudioInputBackend } from "../audio/input-backend";
import { DEFAULT_CONFIG_DIR, loadConfig, reloadConfig } from "../config/loader";
import type { Config, SessionMode } from "../config/schema";
import { notify, notifyError } from "../output/notification";
import type {
	DaemonState,
	DaemonStatusFile,
	IPCCommand,
	Selection,
} from "../shared/ipc-types";
import { ErrorTemplates } from "../utils/error-templates";
import { atomicWriteFile, ensureDir } from "../utils/file-ops";
import { logError, logger } from "../utils/logger";
import { ConnectionManager } from "./connection";
import { DEFAULT_SOCKET_PATH, IPCServer } from "./ipc";
import type { KeepWarmDuration } from "./protocol";
import { type SessionResult, type SessionState, SessionController } from "./session";
import type { SocketFactory } from "./socket";
import { ProcessSupervisor, type SupervisorDeps } from "./supervisor";
import { WakeDetector } from "./wake";

export const DEFAULT_PID_FILE = join(DEFAULT_CONFIG_DIR, "daemon.pid");
export const DEFAULT_STATE_FILE = join(DEFAULT_CONFIG_DIR, "daemon.state");

const STATE_WRITE_DEBOUNCE_MS = 50;

/** Seams for tests; everything defaults to the real implementation. */
export interface DaemonServiceDeps {
	stateDir?: string;
	socketPath?: string;
	socketFactory?: SocketFactory;
	inputBackend?: AudioInputBackend;
	deviceLister?: DeviceLister;
	watchFactory?: DeviceWatchFactory;
	supervisor?: SupervisorDeps;
}

/**
 * Owns and wires every daemon component: the inference process and its
 * channel, audio capture and device tracking, the recording session, wake
 * detection and the IPC server that UI collaborators talk to.
 */
export class DaemonService {
	public readonly supervisor: ProcessSupervisor;
	public readonly connection: ConnectionManager;
	public readonly monitor: DeviceMonitor;
	public readonly engine: AudioCaptureEngine;
	public readonly session: SessionController;
	public readonly ipc: IPCServer;
	public readonly wake: WakeDetector;

	private selection: Selection;
	private readonly pidFile: string;
	private readonly stateFile: string;
	private readonly stateDir: string;
	private readonly startTime = Date.now();
	private lastSessionState: SessionState = "idle";
	private lastTranscript: string | undefined;
	private stateWriteTimer: ReturnType<typeof setTimeout> | null = null;
	private started = false;

	private readonly onToggleSignal = () => {
		logger.info("Received SIGUSR1 signal, toggling recording");
		this.toggle().catch((error) => logError("Toggle failed", error));
	};

	private readonly onCancelSignal = () => {
		logger.info("Received SIGUSR2 signal, cancelling recording");
		this.cancel().catch((error) => logError("Cancel failed", error));
	};

	// Settings read per use, such as notifications, follow the reloaded file
	private readonly onReloadSignal = () => {
		const result = reloadConfig();
		if (result.success) {
			logger.info("Configuration reloaded");
		} else {
			logger.warn({ error: result.error }, "Configuration reload failed, keeping previous");
		}
	};

	constructor(
		private readonly config: Config = loadConfig(),
		deps: DaemonServiceDeps = {},
	) {
		const { backend, connection, audio, devices, session, behavior, paths } = config;

		this.stateDir = deps.stateDir ?? DEFAULT_CONFIG_DIR;
		this.pidFile = deps.stateDir ? join(deps.stateDir, "daemon.pid") : DEFAULT_PID_FILE;
		this.stateFile = deps.stateDir
			? join(deps.stateDir, "daemon.state")
			: DEFAULT_STATE_FILE;

		this.selection = {
			deviceUid: devices.selected,
			model: session.model,
			mode: session.mode,
			diarization: session.diarization,
		};

		this.supervisor = new ProcessSupervisor(
			{
				name: backend.name,
				python: backend.python,
				script: backend.script,
				port: backend.port,
				extraArgs: backend.extraArgs,
				env: backend.env,
				runtimeHome: paths.runtimeHome,
				startupDelayMs: backend.startupDelayMs,
				maxRestartAttempts: backend.maxRestartAttempts,
				restartDelayMs: backend.restartDelayMs,
			},
			deps.supervisor,
		);

		this.connection = new ConnectionManager(
			{
				url: `ws://${connection.host}:${backend.port}${connection.path}`,
				heartbeatIntervalMs: connection.heartbeatIntervalMs,
				staleThresholdMs: connection.staleThresholdMs,
				probeTimeoutMs: connection.probeTimeoutMs,
				reconnectDelayMs: connection.reconnectDelayMs,
				maxReconnectAttempts: connection.maxReconnectAttempts,
				wakeSettleMs: connection.wakeSettleMs,
				wakeProbeMs: connection.wakeProbeMs,
			},
			deps.socketFactory,
		);

		this.supervisor.attachChannel(this.connection);
		this.connection.attachProcess(this.supervisor);

		this.monitor = new DeviceMonitor(deps.deviceLister ?? new AudioDeviceService(), {
			pollIntervalMs: devices.pollIntervalMs,
			watchPath: devices.watchPath,
			...(deps.watchFactory && { watchFactory: deps.watchFactory }),
		});

		this.engine = new AudioCaptureEngine(
			deps.inputBackend ??
				new ArecordInputBackend({
					sampleRate: audio.captureSampleRate,
					channels: audio.channels,
				}),
			this.monitor,
			{
				targetSampleRate: audio.targetSampleRate,
				chunkDurationMs: audio.chunkDurationMs,
				maxStartAttempts: audio.maxStartAttempts,
				flowWaitMs: audio.flowWaitMs,
				settleMs: audio.settleMs,
				hotSwap: audio.hotSwap,
			},
		);

		this.session = new SessionController(this.connection, this.engine, {
			readyTimeoutMs: session.readyTimeoutMs,
			processingTimeoutMs: session.processingTimeoutMs,
			intervalMs: session.intervalMs,
		});

		this.ipc = new IPCServer(deps.socketPath ?? DEFAULT_SOCKET_PATH);
		this.wake = new WakeDetector({
			checkIntervalMs: behavior.wakeCheckIntervalMs,
			thresholdMs: behavior.wakeThresholdMs,
		});

		this.setupListeners();
	}

	public getSelection(): Selection {
		return { ...this.selection };
	}

	public getState(): DaemonState {
		return {
			session: this.session.getState(),
			connection: this.connection.getState(),
			backend: this.supervisor.getState(),
			model: this.connection.getModels(),
			devices: this.monitor.getDevices(),
			selection: this.getSelection(),
			timestamp: Date.now(),
		};
	}

	public async start(): Promise<void> {
		try {
			await ensureDir(this.stateDir);
			await writeFile(this.pidFile, process.pid.toString());
			await this.ipc.start();
			this.started = true;

			process.on("SIGUSR1", this.onToggleSignal);
			process.on("SIGUSR2", this.onCancelSignal);
			process.on("SIGHUP", this.onReloadSignal);

			await this.monitor.start();
			this.wake.start();
			this.publishState();

			// Resolves once the process had its startup delay and a first connect
			await this.supervisor.start();
			logger.info(
				{ port: this.config.backend.port, connected: this.connection.isConnected() },
				"Daemon started",
			);
		} catch (error) {
			logError("Failed to start daemon", error);
			throw error;
		}
	}

	/** Tears everything down; safe to call at any point, more than once. */
	public async stop(): Promise<void> {
		// Cleared first so teardown events no longer schedule state writes
		const wasStarted = this.started;
		this.started = false;
		process.off("SIGUSR1", this.onToggleSignal);
		process.off("SIGUSR2", this.onCancelSignal);
		process.off("SIGHUP", this.onReloadSignal);
		this.wake.stop();
		this.monitor.stop();
		if (this.stateWriteTimer) {
			clearTimeout(this.stateWriteTimer);
			this.stateWriteTimer = null;
		}

		await this.teardown("cancel session", () => this.session.cancelSession());
		await this.teardown("stop capture", () => this.engine.stop());
		this.connection.disconnect();
		await this.teardown("stop backend", () => this.supervisor.stop());
		await this.teardown("stop IPC server", () => this.ipc.stop());

		if (wasStarted) {
			await this.teardown("remove daemon files", async () => {
				await rm(this.pidFile, { force: true });
				await rm(this.stateFile, { force: true });
			});
		}
		logger.info("Daemon stopped");
	}

	/** Starts a session when none is active, stops the recording one otherwise. */
	public async toggle(): Promise<SessionResult> {
		const { state, pending } = this.session.getState();
		if (state === "recording" && !pending) {
			return this.stopRecording();
		}
		return this.startRecording();
	}

	public async startRecording(): Promise<SessionResult> {
		const result = await this.session.startSession({ ...this.selection });
		if (!result.ok) {
			logger.warn({ reason: result.reason }, "Recording did not start");
		}
		return result;
	}

	public async stopRecording(): Promise<SessionResult> {
		return this.session.stopSession();
	}

	public async cancel(): Promise<SessionResult> {
		return this.session.cancelSession();
	}

	/** Takes effect on the next session. */
	public selectDevice(uid: string): void {
		if (uid !== DEFAULT_DEVICE_UID && !this.monitor.isDeviceAvailable(uid)) {
			logger.warn({ uid }, "Selected device is not connected, using default");
			this.updateSelection({ deviceUid: DEFAULT_DEVICE_UID });
			return;
		}
		this.updateSelection({ deviceUid: uid });
	}

	public selectModel(model: string): void {
		this.updateSelection({ model });
	}

	public setMode(mode: SessionMode): void {
		this.updateSelection({ mode });
	}

	public setDiarization(enabled: boolean): void {
		this.updateSelection({ diarization: enabled });
	}

	public downloadModel(): void {
		this.connection.downloadModel();
	}

	public loadModel(model: string): void {
		this.connection.loadModel(model);
	}

	public clearCache(): void {
		this.connection.clearCache();
	}

	public getModels(): void {
		this.connection.getAvailableModels();
	}

	public setKeepWarm(models: string[], duration: KeepWarmDuration): void {
		this.connection.setKeepWarm(models, duration);
	}

	public async handleCommand(command: IPCCommand): Promise<void> {
		switch (command.command) {
			case "toggle":
				await this.toggle();
				return;
			case "start":
				await this.startRecording();
				return;
			case "stop":
				await this.stopRecording();
				return;
			case "cancel":
				await this.cancel();
				return;
			case "select_device":
				this.selectDevice(command.value);
				return;
			case "select_model":
				this.selectModel(command.value);
				return;
			case "set_mode":
				this.setMode(command.value);
				return;
			case "set_diarization":
				this.setDiarization(command.value);
				return;
			case "download_model":
				this.downloadModel();
				return;
			case "load_model":
				this.loadModel(command.value);
				return;
			case "clear_cache":
				this.clearCache();
				return;
			case "get_models":
				this.getModels();
				return;
			case "set_keep_warm":
				this.setKeepWarm(command.value.models, command.value.duration);
				return;
		}
	}

	private setupListeners(): void {
		this.connection.on("state", (snapshot) => {
			if (snapshot.phase === "connected") {
				this.supervisor.markHealthy();
			}
			this.publishState();
		});
		this.connection.on("models", () => this.publishState());

		this.supervisor.on("state", () => this.publishState());
		this.supervisor.on("crashed", (error) => {
			notifyError("Backend Stopped", ErrorTemplates.BACKEND.CRASH_LIMIT_REACHED);
			this.ipc.broadcast({ type: "error", message: error.message });
		});

		this.monitor.on("change", (devices) => this.handleDeviceChange(devices));

		this.engine.on("fallback", (uid) => {
			notify("Microphone", `Device "${uid}" is unavailable, using the default input`, "warning");
		});

		this.session.on("state", (snapshot) => {
			if (snapshot.state === "error" && this.lastSessionState !== "error") {
				notify("Recording Failed", snapshot.error ?? "Unknown error", "error");
			}
			this.lastSessionState = snapshot.state;
			this.publishState();
		});
		this.session.on("transcript", (event) => {
			if (event.kind === "final") this.lastTranscript = event.text;
			this.ipc.broadcast({ type: "transcript", kind: event.kind, text: event.text });
		});

		this.wake.on("resume", () => {
			this.connection.handleWake().catch((error) => {
				logError("Wake recovery failed", error);
			});
		});

		this.ipc.on("command", (command) => {
			this.handleCommand(command).catch((error) => {
				logError("IPC command failed", error, { command: command.command });
			});
		});
	}

	private handleDeviceChange(devices: AudioDevice[]): void {
		const { deviceUid } = this.selection;
		if (deviceUid !== DEFAULT_DEVICE_UID && !devices.some((d) => d.uid === deviceUid)) {
			logger.warn({ uid: deviceUid }, "Selected device disconnected, reverting to default");
			this.selection = { ...this.selection, deviceUid: DEFAULT_DEVICE_UID };
		}
		this.engine.handleConfigurationChange("device list changed");
		this.publishState();
	}

	private updateSelection(change: Partial<Selection>): void {
		this.selection = { ...this.selection, ...change };
		logger.info({ selection: this.selection }, "Selection updated");
		this.publishState();
	}

	private publishState(): void {
		this.ipc.broadcastState(this.getState());
		this.scheduleStateWrite();
	}

	private scheduleStateWrite(): void {
		if (!this.started || this.stateWriteTimer) {
			return;
		}
		this.stateWriteTimer = setTimeout(() => {
			this.stateWriteTimer = null;
			this.writeStateFile().catch((error) => {
				logError("Failed to update daemon state file", error, {
					stateFile: this.stateFile,
				});
			});
		}, STATE_WRITE_DEBOUNCE_MS);
	}

	private async writeStateFile(): Promise<void> {
		const session = this.session.getState();
		const state: DaemonStatusFile = {
			pid: process.pid,
			uptime: Math.floor((Date.now() - this.startTime) / 1000),
			session: session.pending ?? session.state,
			connection: this.connection.getState().phase,
			backend: this.supervisor.getState().state,
			deviceUid: this.selection.deviceUid,
			model: this.selection.model,
			mode: this.selection.mode,
			...(this.lastTranscript !== undefined && { lastTranscript: this.lastTranscript }),
			...(session.error !== undefined && { lastError: session.error }),
			timestamp: Date.now(),
		};
		await atomicWriteFile(this.stateFile, JSON.stringify(state, null, 2));
		logger.debug({ session: state.session }, "Daemon state updated");
	}

	private async teardown(label: string, step: () => Promise<unknown>): Promise<void> {
		try {
			await step();
		} catch (error) {
			logError(`Failed to ${label}`, error);
		}
	}
}
