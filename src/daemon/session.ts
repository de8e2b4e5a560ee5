import { randomUUID } from "node:crypto";
import { EventEmitter } from "node:events";
import type { AudioCaptureEngine } from "../audio/capture-engine";
import type { AudioChunk } from "../audio/chunker";
import type { SessionMode } from "../config/schema";
import { withTimeout } from "../utils/async";
import { describeSessionError } from "../utils/error-templates";
import { AppError } from "../utils/errors";
import { logError, logger } from "../utils/logger";
import type { ConnectionManager } from "./connection";
import type { InboundMessage } from "./protocol";
import { ReadyGate } from "./ready-gate";

export type SessionState = "idle" | "recording" | "processing" | "done" | "error";

export type SessionResult =
	| { ok: true; state: SessionState }
	| { ok: false; reason: string };

export interface StartRequest {
	mode: SessionMode;
	model: string;
	deviceUid: string;
	diarization: boolean;
}

export interface SessionSnapshot {
	id: string | null;
	generation: number;
	state: SessionState;
	/** An operation in flight; the state does not change until it completes. */
	pending: "starting" | "stopping" | null;
	error?: string;
	mode: SessionMode;
	model: string;
	diarization: boolean;
	deviceUid: string;
	transcript: string;
}

export type TranscriptKind = "partial" | "interval" | "final";

export interface TranscriptEvent {
	kind: TranscriptKind;
	text: string;
	generation: number;
}

export interface ChunkStats {
	forwarded: number;
	dropped: number;
}

export interface SessionOptions {
	readyTimeoutMs: number;
	processingTimeoutMs: number;
	intervalMs: number;
}

export type SessionEvents = {
	state: [snapshot: SessionSnapshot];
	transcript: [event: TranscriptEvent];
};

export const BUSY_REASON = "busy";
export const NOT_RECORDING_REASON = "not recording";
export const PROCESSING_TIMEOUT_REASON = "processing timeout";
export const NOT_CONNECTED_REASON = "backend not connected";

/**
 * Runs one recording session at a time.
 *
 * idle → recording → processing → done | error, with done and error as
 * start points for the next session and cancel returning recording to
 * idle. Operations resolve to a {@link SessionResult} and never throw.
 */
export class SessionController extends EventEmitter<SessionEvents> {
	private readonly gate = new ReadyGate();
	private state: SessionState = "idle";
	private pending: SessionSnapshot["pending"] = null;
	private generation = 0;
	private id: string | null = null;
	private errorReason: string | undefined;
	private request: StartRequest = {
		mode: "dictation",
		model: "",
		deviceUid: "",
		diarization: false,
	};
	private intervalTexts: string[] = [];
	private transcript = "";
	private stats: ChunkStats = { forwarded: 0, dropped: 0 };
	private processingTimer: ReturnType<typeof setTimeout> | null = null;
	private intervalTimer: ReturnType<typeof setInterval> | null = null;

	constructor(
		private readonly connection: ConnectionManager,
		private readonly engine: AudioCaptureEngine,
		private readonly options: SessionOptions,
	) {
		super();
		this.connection.on("message", (message) => this.handleMessage(message));
		this.engine.on("captureError", (error) => this.handleCaptureError(error));
	}

	public getState(): SessionSnapshot {
		return {
			id: this.id,
			generation: this.generation,
			state: this.state,
			pending: this.pending,
			...(this.state === "error" &&
				this.errorReason !== undefined && { error: this.errorReason }),
			...this.request,
			transcript: this.transcript,
		};
	}

	public getChunkStats(): ChunkStats {
		return { ...this.stats };
	}

	/** Whether chunks are currently forwarded to the backend. */
	public isGateOpen(): boolean {
		return this.gate.isOpen();
	}

	public async startSession(request: StartRequest): Promise<SessionResult> {
		if (this.pending || this.state === "recording" || this.state === "processing") {
			logger.debug({ state: this.state, pending: this.pending }, "Start rejected");
			return { ok: false, reason: BUSY_REASON };
		}

		this.setPending("starting");
		try {
			return await this.runStart(request);
		} catch (error) {
			logError("Unexpected session start failure", error);
			return this.fail(this.generation, describeSessionError(error));
		} finally {
			this.setPending(null);
		}
	}

	public async stopSession(): Promise<SessionResult> {
		if (this.pending || this.state !== "recording") {
			logger.debug({ state: this.state, pending: this.pending }, "Stop ignored");
			return { ok: false, reason: NOT_RECORDING_REASON };
		}

		const generation = this.generation;
		this.setPending("stopping");
		try {
			this.gate.close();
			this.clearIntervalTimer();
			await this.engine.stop();

			if (generation !== this.generation || this.state !== "recording") {
				return { ok: false, reason: this.errorReason ?? NOT_RECORDING_REASON };
			}

			this.connection.requestStop();
			this.setState("processing");
			this.processingTimer = setTimeout(() => {
				this.processingTimer = null;
				this.handleProcessingTimeout(generation);
			}, this.options.processingTimeoutMs);

			logger.info({ session: this.id }, "Recording stopped, awaiting transcript");
			return { ok: true, state: "processing" };
		} catch (error) {
			logError("Unexpected session stop failure", error);
			return this.fail(generation, describeSessionError(error));
		} finally {
			this.setPending(null);
		}
	}

	public async cancelSession(): Promise<SessionResult> {
		if (this.pending || this.state !== "recording") {
			return { ok: false, reason: NOT_RECORDING_REASON };
		}

		this.setPending("stopping");
		try {
			this.gate.close();
			this.clearTimers();
			// The result of this stop is ignored: any late final lands outside processing
			this.connection.requestStop();
			this.intervalTexts = [];
			this.transcript = "";
			this.setState("idle");
			await this.engine.stop();
			logger.info({ session: this.id }, "Session cancelled");
			return { ok: true, state: "idle" };
		} catch (error) {
			logError("Unexpected session cancel failure", error);
			return { ok: true, state: this.state };
		} finally {
			this.setPending(null);
		}
	}

	private async runStart(request: StartRequest): Promise<SessionResult> {
		const generation = ++this.generation;
		this.id = randomUUID();
		this.request = { ...request };
		this.errorReason = undefined;
		this.intervalTexts = [];
		this.transcript = "";
		this.stats = { forwarded: 0, dropped: 0 };
		this.gate.reset(generation);
		this.engine.setChunkCallback((chunk) => this.forwardChunk(generation, chunk));

		logger.info(
			{ session: this.id, generation, ...request },
			"Starting session",
		);

		if (!(await this.connection.verifyConnection())) {
			this.connection.reconnect().catch((error) => {
				logError("Reconnect after failed health check failed", error);
			});
			return this.fail(generation, NOT_CONNECTED_REASON);
		}

		const controller = new AbortController();
		const { signal } = controller;

		// Replies arrive on a later tick, so listeners added now still see them
		const startNumber = this.connection.requestStart(request.model, request.diarization);
		const ownReply = () => this.connection.startReplyNumber() === startNumber;
		const ready = this.connection.waitFor("recording_ready", {
			signal,
			predicate: ownReply,
		});
		const backendError = this.connection
			.waitFor("error", { signal, predicate: ownReply })
			.then((message) => {
				throw new AppError("BACKEND_ERROR", message.message);
			});

		const backendReady = Promise.race([ready, backendError]);
		const capture = this.engine.start(request.deviceUid);

		try {
			const [, captureResult] = await withTimeout(
				Promise.all([backendReady, capture]),
				this.options.readyTimeoutMs,
				"Backend ready",
				() => controller.abort(),
			);
			if (captureResult.fellBack) {
				logger.warn(
					{ requested: request.deviceUid, using: captureResult.deviceUid || "default" },
					"Recording from fallback device",
				);
			}
		} catch (error) {
			controller.abort();
			this.connection.requestStop();
			await this.engine.stop();
			this.gate.close();
			logError("Session start failed", error, { session: this.id });
			return this.fail(generation, describeSessionError(error));
		}
		controller.abort();

		this.gate.openFor(generation);
		this.setState("recording");

		if (request.mode === "continuous") {
			this.startIntervalTimer(generation);
		}

		logger.info({ session: this.id }, "Recording");
		return { ok: true, state: "recording" };
	}

	private forwardChunk(generation: number, chunk: AudioChunk): void {
		if (!this.gate.allows(generation)) {
			this.stats.dropped++;
			return;
		}
		this.stats.forwarded++;
		this.connection.sendAudio(chunk);
	}

	private handleMessage(message: InboundMessage): void {
		const active = this.state === "recording" || this.state === "processing";

		switch (message.type) {
			case "partial":
				if (active && message.text) {
					this.emitTranscript("partial", message.text);
				}
				break;
			case "interval_transcription":
				if (active && message.text) {
					this.intervalTexts.push(message.text);
					this.transcript = this.intervalTexts.join(" ");
					this.emitTranscript("interval", message.text);
					this.emit("state", this.getState());
				}
				break;
			case "final":
				this.handleFinal(message.text);
				break;
			case "error":
				if (active && !this.pending && !this.connection.isStartReply(message)) {
					this.handleBackendError(message.message);
				}
				break;
			default:
				break;
		}
	}

	private handleFinal(text: string): void {
		if (this.state !== "processing") {
			logger.debug({ state: this.state }, "Ignoring final transcript outside processing");
			return;
		}

		this.clearTimers();
		this.transcript = [...this.intervalTexts, text]
			.map((part) => part.trim())
			.filter((part) => part.length > 0)
			.join(" ");
		this.setState("done");
		this.emitTranscript("final", this.transcript);
		logger.info(
			{ session: this.id, length: this.transcript.length },
			"Transcription complete",
		);
	}

	private handleBackendError(detail: string): void {
		const generation = this.generation;
		const wasRecording = this.state === "recording";
		const reason = describeSessionError(new AppError("BACKEND_ERROR", detail));
		this.fail(generation, reason);

		if (wasRecording) {
			this.connection.requestStop();
			this.engine.stop().catch((error) => {
				logError("Failed to stop capture after backend error", error);
			});
		}
	}

	private handleCaptureError(error: AppError): void {
		if (this.state !== "recording" || this.pending) return;
		this.fail(this.generation, describeSessionError(error));
		this.connection.requestStop();
	}

	private handleProcessingTimeout(generation: number): void {
		if (generation !== this.generation || this.state !== "processing") return;

		logger.error(
			{ session: this.id, timeoutMs: this.options.processingTimeoutMs },
			"No final transcript received",
		);
		this.fail(generation, PROCESSING_TIMEOUT_REASON);
		this.connection.reconnect().catch((error) => {
			logError("Reconnect after processing timeout failed", error);
		});
	}

	private startIntervalTimer(generation: number): void {
		this.clearIntervalTimer();
		this.intervalTimer = setInterval(() => {
			if (generation !== this.generation || this.state !== "recording") return;
			this.connection.requestIntervalTranscription();
		}, this.options.intervalMs);
	}

	private fail(generation: number, reason: string): SessionResult {
		if (generation === this.generation) {
			this.clearTimers();
			this.gate.close();
			this.errorReason = reason;
			this.setState("error");
			logger.error({ session: this.id, reason }, "Session failed");
		}
		return { ok: false, reason };
	}

	private emitTranscript(kind: TranscriptKind, text: string): void {
		this.emit("transcript", { kind, text, generation: this.generation });
	}

	private clearIntervalTimer(): void {
		if (this.intervalTimer) {
			clearInterval(this.intervalTimer);
			this.intervalTimer = null;
		}
	}

	private clearTimers(): void {
		this.clearIntervalTimer();
		if (this.processingTimer) {
			clearTimeout(this.processingTimer);
			this.processingTimer = null;
		}
	}

	private setPending(pending: SessionSnapshot["pending"]): void {
		this.pending = pending;
		this.emit("state", this.getState());
	}

	private setState(state: SessionState): void {
		this.state = state;
		this.emit("state", this.getState());
	}
}
