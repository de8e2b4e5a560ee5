import { EventEmitter } from "node:events";
import type { AudioChunk } from "../audio/chunker";
import { cancelledError, delay, withTimeout } from "../utils/async";
import { logError, logger } from "../utils/logger";
import {
	audioMessage,
	type InboundMessage,
	type InboundOf,
	type InboundType,
	isInboundOf,
	type KeepWarmDuration,
	type ModelInfo,
	type OutboundMessage,
	parseInbound,
	startMessage,
} from "./protocol";
import {
	type ChannelSocket,
	createWsSocket,
	type RawMessage,
	rawToText,
	SOCKET_OPEN,
	type SocketFactory,
} from "./socket";

export type ConnectionPhase = "disconnected" | "connecting" | "connected" | "error";

export interface ConnectionSnapshot {
	phase: ConnectionPhase;
	error?: string;
	lastPongAt: number | null;
	reconnectAttempts: number;
	queued: number;
}

export type ModelStatus =
	| "unknown"
	| "not_downloaded"
	| "downloading"
	| "downloaded"
	| "ready"
	| "error";

export interface ModelSnapshot {
	status: ModelStatus;
	error?: string;
	/** 0..1 */
	downloadProgress: number;
	whisperAvailable: boolean;
	loadedModels: string[];
	availableModels: ModelInfo[];
	activeModel?: string;
}

/** The process behind the channel, as seen by wake recovery. */
export interface SupervisedProcess {
	isRunning(): boolean;
	start(): Promise<void>;
	restart(): Promise<void>;
}

export interface ConnectionOptions {
	url: string;
	heartbeatIntervalMs: number;
	staleThresholdMs: number;
	probeTimeoutMs: number;
	reconnectDelayMs: number;
	maxReconnectAttempts: number;
	wakeSettleMs: number;
	wakeProbeMs: number;
}

export interface WaitOptions<T extends InboundType> {
	signal?: AbortSignal;
	predicate?: (message: InboundOf<T>) => boolean;
}

export type ConnectionEvents = {
	state: [snapshot: ConnectionSnapshot];
	message: [message: InboundMessage];
	models: [snapshot: ModelSnapshot];
};

/**
 * Owns the message channel to the inference process.
 *
 * Messages sent while not connected are queued and flushed, in order, as
 * soon as the channel opens and before anything sent afterwards. A dropped
 * channel is retried after a fixed delay, a bounded number of times; after
 * that the phase is `error` until {@link reconnect} is called.
 */
export class ConnectionManager extends EventEmitter<ConnectionEvents> {
	private socket: ChannelSocket | null = null;
	private phase: ConnectionPhase = "disconnected";
	private lastError: string | undefined;
	private lastPongAt: number | null = null;
	private reconnectAttempts = 0;
	private queue: string[] = [];
	private heartbeatTimer: ReturnType<typeof setInterval> | null = null;
	private reconnectTimer: ReturnType<typeof setTimeout> | null = null;
	private pending: Promise<boolean> | null = null;
	private settleOpen: ((opened: boolean) => void) | null = null;
	private process: SupervisedProcess | null = null;
	// The backend answers each start with one recording_ready or error, in order
	private startsSent = 0;
	private startsAnswered = 0;
	private startsQueued = 0;
	private lastStartReply: InboundMessage | null = null;

	private models: ModelSnapshot = {
		status: "unknown",
		downloadProgress: 0,
		whisperAvailable: false,
		loadedModels: [],
		availableModels: [],
	};

	constructor(
		private readonly options: ConnectionOptions,
		private readonly socketFactory: SocketFactory = createWsSocket,
		private readonly now: () => number = Date.now,
	) {
		super();
	}

	public attachProcess(process: SupervisedProcess): void {
		this.process = process;
	}

	public getState(): ConnectionSnapshot {
		return {
			phase: this.phase,
			...(this.lastError !== undefined && { error: this.lastError }),
			lastPongAt: this.lastPongAt,
			reconnectAttempts: this.reconnectAttempts,
			queued: this.queue.length,
		};
	}

	public getModels(): ModelSnapshot {
		return {
			...this.models,
			loadedModels: [...this.models.loadedModels],
			availableModels: [...this.models.availableModels],
		};
	}

	public isConnected(): boolean {
		return this.phase === "connected";
	}

	/**
	 * Opens the channel. Resolves `true` once it is open; a failure is
	 * handed to the reconnect policy and resolves `false`.
	 */
	public connect(): Promise<boolean> {
		if (this.phase === "connected") return Promise.resolve(true);
		if (this.pending) return this.pending;

		const pending: Promise<boolean> = this.open().finally(() => {
			if (this.pending === pending) this.pending = null;
		});
		this.pending = pending;
		return pending;
	}

	/** Explicit reconnect: tears down the channel and resets the attempt budget. */
	public reconnect(): Promise<boolean> {
		logger.info("Reconnecting to backend");
		this.clearReconnectTimer();
		this.teardown();
		this.pending = null;
		this.reconnectAttempts = 0;
		this.lastError = undefined;
		return this.connect();
	}

	/** Connected already, or a reconnect with a fresh attempt budget. */
	public ensureConnected(): Promise<boolean> {
		if (this.phase === "connected") return Promise.resolve(true);
		if (this.pending) return this.pending;
		return this.reconnect();
	}

	/** Closes the channel without scheduling a reconnect. Always safe. */
	public disconnect(): void {
		this.clearReconnectTimer();
		this.teardown();
		if (this.phase !== "disconnected") {
			this.setPhase("disconnected");
			logger.info("Disconnected from backend");
		}
	}

	public send(message: OutboundMessage): void {
		const payload = JSON.stringify(message);
		if (this.phase !== "connected" || !this.socket) {
			this.queue.push(payload);
			logger.debug(
				{ type: message.type, queued: this.queue.length },
				"Queued message while disconnected",
			);
			return;
		}
		this.transmit(payload);
	}

	/** Sends a start request and returns its number among all start requests. */
	public requestStart(model: string, enableDiarization: boolean): number {
		if (this.phase !== "connected" || !this.socket) this.startsQueued++;
		this.send(startMessage(model, enableDiarization));
		return ++this.startsSent;
	}

	/** Number of the start request the most recent start reply answered. */
	public startReplyNumber(): number {
		return this.startsAnswered;
	}

	/** Whether `message` was consumed as the reply to a start request. */
	public isStartReply(message: InboundMessage): boolean {
		return message === this.lastStartReply;
	}

	public requestStop(): void {
		this.send({ type: "stop" });
	}

	public sendAudio(chunk: AudioChunk): void {
		this.send(audioMessage(chunk));
	}

	public requestIntervalTranscription(): void {
		this.send({ type: "transcribe_interval" });
	}

	public downloadModel(): void {
		this.updateModels({ status: "downloading", downloadProgress: 0 });
		this.send({ type: "download_model" });
	}

	public clearCache(): void {
		this.send({ type: "clear_cache" });
		this.updateModels({ status: "not_downloaded" });
	}

	public getAvailableModels(): void {
		this.send({ type: "get_models" });
	}

	public loadModel(model: string): void {
		this.send({ type: "load_model", model });
	}

	public setKeepWarm(models: string[], duration: KeepWarmDuration): void {
		this.send({ type: "set_keep_warm", models, duration });
	}

	/**
	 * Resolves with the next inbound message of `type` that matches
	 * `predicate`. Aborting `signal` rejects with CANCELLED; it does not
	 * recall anything already sent.
	 */
	public waitFor<T extends InboundType>(
		type: T,
		options: WaitOptions<T> = {},
	): Promise<InboundOf<T>> {
		const { signal, predicate } = options;

		return new Promise<InboundOf<T>>((resolve, reject) => {
			if (signal?.aborted) {
				reject(cancelledError(`Waiting for ${type}`));
				return;
			}

			const onMessage = (message: InboundMessage) => {
				if (!isInboundOf(message, type)) return;
				if (predicate && !predicate(message)) return;
				cleanup();
				resolve(message);
			};
			const onAbort = () => {
				cleanup();
				reject(cancelledError(`Waiting for ${type}`));
			};
			const cleanup = () => {
				this.off("message", onMessage);
				signal?.removeEventListener("abort", onAbort);
			};

			this.on("message", onMessage);
			signal?.addEventListener("abort", onAbort, { once: true });
		});
	}

	public isConnectionStale(): boolean {
		if (this.lastPongAt === null) return true;
		return this.now() - this.lastPongAt > this.options.staleThresholdMs;
	}

	/** Sends a ping and waits up to `timeoutMs` for the pong. */
	public async probe(timeoutMs: number = this.options.probeTimeoutMs): Promise<boolean> {
		if (!this.isConnected()) return false;

		const controller = new AbortController();
		const pong = this.waitFor("pong", { signal: controller.signal });
		this.sendPing();

		try {
			await withTimeout(pong, timeoutMs, "Connection probe", () =>
				controller.abort(),
			);
			return true;
		} catch (error) {
			logger.warn({ err: error, timeoutMs }, "No pong received");
			return false;
		}
	}

	/**
	 * Health check before critical operations: a connected channel is
	 * trusted unless no pong has arrived within the staleness threshold, in
	 * which case a probe decides.
	 */
	public async verifyConnection(): Promise<boolean> {
		if (!this.isConnected()) {
			logger.info({ phase: this.phase }, "verifyConnection: not connected");
			return false;
		}

		if (!this.isConnectionStale()) return true;

		const since = this.lastPongAt === null ? null : this.now() - this.lastPongAt;
		logger.warn({ sinceLastPongMs: since }, "Connection appears stale, verifying");

		const alive = await this.probe(this.options.probeTimeoutMs);
		if (!alive) {
			logger.error("Connection confirmed stale");
			return false;
		}
		logger.info("Connection recovered - pong received");
		return true;
	}

	/**
	 * Recovery after system sleep. A connected but unresponsive channel, or
	 * a dead process, gets a full process restart; a dropped channel gets
	 * the process started or the channel reopened.
	 */
	public async handleWake(): Promise<void> {
		logger.info("System woke from sleep - checking backend connection");
		await delay(this.options.wakeSettleMs);

		try {
			if (this.isConnected()) {
				const gotPong = await this.probe(this.options.wakeProbeMs);
				const running = this.process?.isRunning() ?? true;

				if (!gotPong || !running) {
					logger.warn(
						{ gotPong, processRunning: running },
						"Backend not responsive after wake - restarting",
					);
					if (this.process) {
						await this.process.restart();
					} else {
						await this.reconnect();
					}
				} else {
					this.getAvailableModels();
				}
				return;
			}

			logger.info("Backend not connected after wake - starting");
			if (this.process && !this.process.isRunning()) {
				await this.process.start();
			} else {
				await this.reconnect();
			}
		} catch (error) {
			logError("Wake recovery failed", error);
		}
	}

	private async open(): Promise<boolean> {
		this.teardown();
		this.setPhase("connecting");

		const { url } = this.options;
		let socket: ChannelSocket;
		try {
			socket = this.socketFactory(url);
		} catch (error) {
			this.handleConnectionError(error);
			return false;
		}
		this.socket = socket;

		return new Promise<boolean>((resolve) => {
			this.settleOpen = resolve;

			socket.on("open", () => {
				this.settleOpen = null;
				this.handleOpen(socket);
				resolve(true);
			});

			socket.on("message", (data: RawMessage) => {
				this.handleRaw(data);
			});

			socket.on("error", (error: Error) => {
				logger.warn({ err: error, url }, "WebSocket error");
			});

			socket.on("close", (code: number, reason: Buffer) => {
				if (socket !== this.socket) return;
				const detail = reason.toString() || `code ${code}`;
				this.handleConnectionError(new Error(`WebSocket closed: ${detail}`));
			});
		});
	}

	private handleOpen(socket: ChannelSocket): void {
		this.reconnectAttempts = 0;
		this.lastError = undefined;
		this.lastPongAt = this.now();
		this.startHeartbeat();
		// Starts sent on an earlier channel will never be answered
		this.startsAnswered = this.startsSent - this.startsQueued;
		this.startsQueued = 0;

		const queued = this.queue;
		this.queue = [];
		for (const payload of queued) {
			this.transmit(payload, socket);
		}

		this.setPhase("connected");
		logger.info(
			{ url: this.options.url, flushed: queued.length },
			"WebSocket connected",
		);
	}

	private handleConnectionError(error: unknown): void {
		this.stopHeartbeat();
		this.teardown();

		const message = error instanceof Error ? error.message : String(error);
		const { maxReconnectAttempts, reconnectDelayMs } = this.options;

		if (this.reconnectAttempts < maxReconnectAttempts) {
			logger.warn(
				{
					err: error,
					attempt: this.reconnectAttempts + 1,
					max: maxReconnectAttempts,
				},
				"Connection failed, retrying",
			);
			this.setPhase("connecting");
			this.clearReconnectTimer();
			this.reconnectTimer = setTimeout(() => {
				this.reconnectTimer = null;
				this.reconnectAttempts++;
				this.connect().catch((e) => logError("Reconnect failed", e));
			}, reconnectDelayMs);
			return;
		}

		this.lastError = "Connection failed";
		logError("Max reconnection attempts reached", error, { lastError: message });
		this.setPhase("error");
	}

	private handleRaw(data: RawMessage): void {
		const text = rawToText(data);
		const result = parseInbound(text);
		if (!result.ok) {
			logger.warn(
				{ error: result.error, message: text.slice(0, 200) },
				"Dropping unparseable message",
			);
			return;
		}
		this.handleMessage(result.message);
	}

	private handleMessage(message: InboundMessage): void {
		if (
			(message.type === "recording_ready" || message.type === "error") &&
			this.startsAnswered < this.startsSent
		) {
			this.startsAnswered++;
			this.lastStartReply = message;
		}

		switch (message.type) {
			case "pong":
				this.lastPongAt = this.now();
				break;
			case "ready":
				this.updateModels({
					whisperAvailable: message.whisper_available,
					loadedModels: message.loaded_models,
					status: message.model_loaded ? "ready" : "not_downloaded",
					...(message.active_model !== undefined && {
						activeModel: message.active_model,
					}),
				});
				logger.info(
					{
						modelLoaded: message.model_loaded,
						whisperAvailable: message.whisper_available,
					},
					"Backend ready",
				);
				this.getAvailableModels();
				break;
			case "model_progress":
				this.updateModels({
					status: "downloading",
					downloadProgress: message.percent / 100,
				});
				break;
			case "model_downloaded":
				this.updateModels({ status: "downloaded", downloadProgress: 1 });
				break;
			case "model_loaded": {
				const loaded = this.models.loadedModels.includes(message.model)
					? this.models.loadedModels
					: [...this.models.loadedModels, message.model];
				this.updateModels({ status: "ready", loadedModels: loaded });
				logger.info({ model: message.model }, "Model loaded");
				this.getAvailableModels();
				break;
			}
			case "model_unloaded":
				this.updateModels({
					loadedModels: this.models.loadedModels.filter((m) => m !== message.model),
				});
				logger.info({ model: message.model }, "Model unloaded due to idle timeout");
				this.getAvailableModels();
				break;
			case "model_error":
				this.updateModels({ status: "error", error: message.message });
				break;
			case "models_list":
				this.updateModels({
					availableModels: message.models,
					...(message.active_model !== undefined && {
						activeModel: message.active_model,
					}),
				});
				logger.debug({ count: message.models.length }, "Received available models");
				break;
			case "keep_warm_updated":
				logger.info(
					{ models: message.models, duration: message.duration },
					"Keep-warm settings updated",
				);
				break;
			default:
				break;
		}

		this.emit("message", message);
	}

	private updateModels(patch: Partial<ModelSnapshot>): void {
		const { error: _previous, ...rest } = this.models;
		this.models =
			patch.status === undefined || patch.status === "error"
				? { ...this.models, ...patch }
				: { ...rest, ...patch };
		this.emit("models", this.getModels());
	}

	private transmit(payload: string, socket: ChannelSocket | null = this.socket): void {
		if (!socket || socket.readyState !== SOCKET_OPEN) {
			this.queue.push(payload);
			return;
		}
		try {
			socket.send(payload, (err) => {
				if (err) logError("WebSocket send error", err);
			});
		} catch (error) {
			logError("WebSocket send error", error);
		}
	}

	private sendPing(): void {
		if (!this.isConnected()) return;
		this.send({ type: "ping" });
	}

	private startHeartbeat(): void {
		this.stopHeartbeat();
		this.heartbeatTimer = setInterval(() => {
			this.sendPing();
		}, this.options.heartbeatIntervalMs);
	}

	private stopHeartbeat(): void {
		if (this.heartbeatTimer) {
			clearInterval(this.heartbeatTimer);
			this.heartbeatTimer = null;
		}
	}

	private clearReconnectTimer(): void {
		if (this.reconnectTimer) {
			clearTimeout(this.reconnectTimer);
			this.reconnectTimer = null;
		}
	}

	private teardown(): void {
		this.stopHeartbeat();
		// An open still in progress resolves as failed
		const settle = this.settleOpen;
		this.settleOpen = null;
		settle?.(false);

		const socket = this.socket;
		if (!socket) return;
		this.socket = null;
		socket.removeAllListeners();
		// Late errors from a discarded socket must not crash the process
		socket.on("error", () => undefined);
		try {
			socket.terminate();
		} catch (error) {
			logger.debug({ err: error }, "Failed to terminate socket");
		}
	}

	private setPhase(phase: ConnectionPhase): void {
		this.phase = phase;
		this.emit("state", this.getState());
	}
}
