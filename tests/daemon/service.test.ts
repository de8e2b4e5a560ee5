import { existsSync, mkdtempSync, readFileSync, rmSync } from "node:fs";
import { createConnection } from "node:net";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { AudioDevice } from "../../src/audio/device-service";
import { readStatusFile } from "../../src/cli/daemon-control";
import { type ConfigFile, ConfigSchema } from "../../src/config/schema";
import { DaemonService } from "../../src/daemon/service";
import { notify, notifyError } from "../../src/output/notification";
import { ErrorTemplates } from "../../src/utils/error-templates";
import { FakeChild } from "../helpers/fake-child";
import { FakeInputBackend } from "../helpers/fake-input-backend";
import { createSocketFactory } from "../helpers/fake-socket";

vi.mock("../../src/utils/logger", () => ({
	logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
	logError: vi.fn(),
}));

vi.mock("../../src/output/notification", () => ({
	notify: vi.fn(),
	notifyError: vi.fn(),
}));

const USB: AudioDevice = { uid: "hw:USB", displayName: "USB Microphone" };

const createConfig = (overrides: ConfigFile = {}) =>
	ConfigSchema.parse({
		backend: { script: "/opt/backend/server.py", startupDelayMs: 0, restartDelayMs: 10 },
		connection: { probeTimeoutMs: 20, wakeSettleMs: 0, wakeProbeMs: 20 },
		audio: {
			captureSampleRate: 16_000,
			flowWaitMs: 20,
			settleMs: 0,
			hotSwap: { restartDelayMs: 0 },
		},
		devices: { pollIntervalMs: 60_000, selected: "hw:USB" },
		session: { readyTimeoutMs: 500, processingTimeoutMs: 1000 },
		...overrides,
	});

describe("DaemonService", () => {
	let dir: string;
	let devices: AudioDevice[];
	let children: FakeChild[];
	let sockets: ReturnType<typeof createSocketFactory>;
	let service: DaemonService;

	const create = (overrides: ConfigFile = {}) =>
		new DaemonService(createConfig(overrides), {
			stateDir: dir,
			socketPath: join(dir, "daemon.sock"),
			socketFactory: sockets.factory,
			inputBackend: new FakeInputBackend(),
			deviceLister: { listDevices: async () => [...devices] },
			watchFactory: () => ({ close: () => undefined }),
			supervisor: {
				spawnProcess: () => {
					const child = new FakeChild(5000 + children.length);
					children.push(child);
					return child;
				},
				freePort: async () => [],
				exists: () => true,
			},
		});

	/** Starts the daemon and lets the backend channel open. */
	const startDaemon = async () => {
		const starting = service.start();
		await vi.waitFor(() => expect(sockets.sockets).toHaveLength(1));
		sockets.last().respond = (message) => {
			if (message.type === "ping") return { type: "pong" };
			if (message.type === "start") return { type: "recording_ready" };
			return undefined;
		};
		sockets.last().open();
		await starting;
	};

	beforeEach(() => {
		vi.clearAllMocks();
		dir = mkdtempSync(join(tmpdir(), "voxlane-daemon-"));
		devices = [USB];
		children = [];
		sockets = createSocketFactory();
		service = create();
	});

	afterEach(async () => {
		await service.stop();
		rmSync(dir, { recursive: true, force: true });
	});

	it("starts every component and cleans up on stop", async () => {
		await startDaemon();

		expect(readFileSync(join(dir, "daemon.pid"), "utf-8")).toBe(String(process.pid));
		expect(existsSync(join(dir, "daemon.sock"))).toBe(true);
		expect(children).toHaveLength(1);
		expect(sockets.last().url).toBe("ws://127.0.0.1:9877/ws");
		const state = service.getState();
		expect(state.backend.state).toBe("running");
		expect(state.connection.phase).toBe("connected");
		expect(state.devices).toEqual([USB]);

		await service.stop();

		expect(children[0]?.signals).toEqual(["SIGTERM"]);
		expect(existsSync(join(dir, "daemon.pid"))).toBe(false);
		expect(existsSync(join(dir, "daemon.state"))).toBe(false);
		expect(existsSync(join(dir, "daemon.sock"))).toBe(false);
	});

	it("can be stopped without being started", async () => {
		await expect(service.stop()).resolves.toBeUndefined();
		await expect(service.stop()).resolves.toBeUndefined();
	});

	it("toggles a recording with the current selection", async () => {
		await startDaemon();
		service.setDiarization(true);

		expect(await service.toggle()).toEqual({ ok: true, state: "recording" });
		expect(JSON.parse(sockets.last().sent[0] ?? "")).toEqual({
			type: "start",
			settings: { model: "parakeet", enable_diarization: true },
		});

		expect(await service.toggle()).toEqual({ ok: true, state: "processing" });
		sockets.last().receive({ type: "final", text: "hello world" });

		expect(service.getState().session).toMatchObject({
			state: "done",
			transcript: "hello world",
			deviceUid: "hw:USB",
		});
	});

	it("records the last transcript in the state file", async () => {
		await startDaemon();
		await service.startRecording();
		await service.stopRecording();
		sockets.last().receive({ type: "final", text: "status check" });

		await vi.waitFor(async () => {
			expect(await readStatusFile(join(dir, "daemon.state"))).toMatchObject({
				pid: process.pid,
				session: "done",
				connection: "connected",
				backend: "running",
				deviceUid: "hw:USB",
				model: "parakeet",
				mode: "dictation",
				lastTranscript: "status check",
			});
		});
	});

	it("falls back to the default device for unknown selections", async () => {
		await startDaemon();

		service.selectDevice("hw:Missing");
		expect(service.getSelection().deviceUid).toBe("");

		service.selectDevice("hw:USB");
		expect(service.getSelection().deviceUid).toBe("hw:USB");
	});

	it("resets the selection when the selected device disappears", async () => {
		await startDaemon();
		expect(service.getSelection().deviceUid).toBe("hw:USB");

		devices = [];
		await service.monitor.refresh();

		expect(service.getSelection().deviceUid).toBe("");
		expect(service.getState().devices).toEqual([]);
	});

	it("applies selection commands", async () => {
		await service.handleCommand({ type: "command", command: "select_model", value: "whisper" });
		await service.handleCommand({ type: "command", command: "set_mode", value: "continuous" });
		await service.handleCommand({ type: "command", command: "set_diarization", value: true });
		await service.handleCommand({ type: "command", command: "select_device", value: "" });

		expect(service.getSelection()).toEqual({
			deviceUid: "",
			model: "whisper",
			mode: "continuous",
			diarization: true,
		});
	});

	it("passes model commands to the backend", async () => {
		await startDaemon();

		await service.handleCommand({ type: "command", command: "get_models" });
		await service.handleCommand({ type: "command", command: "load_model", value: "whisper" });
		await service.handleCommand({
			type: "command",
			command: "set_keep_warm",
			value: { models: ["whisper"], duration: "4h" },
		});
		await service.handleCommand({ type: "command", command: "download_model" });
		await service.handleCommand({ type: "command", command: "clear_cache" });

		expect(sockets.last().sent.map((payload) => JSON.parse(payload))).toEqual([
			{ type: "get_models" },
			{ type: "load_model", model: "whisper" },
			{ type: "set_keep_warm", models: ["whisper"], duration: "4h" },
			{ type: "download_model" },
			{ type: "clear_cache" },
		]);
		expect(service.getState().model.status).toBe("not_downloaded");
	});

	it("takes commands from IPC clients and publishes the new state", async () => {
		await startDaemon();
		const lines: string[] = [];
		const client = createConnection({ path: join(dir, "daemon.sock") });
		let buffer = "";
		client.on("data", (data) => {
			buffer += data.toString();
			const parts = buffer.split("\n");
			buffer = parts.pop() ?? "";
			lines.push(...parts);
		});
		await vi.waitFor(() => expect(lines.length).toBeGreaterThan(0));

		client.write(`${JSON.stringify({ type: "command", command: "select_model", value: "whisper" })}\n`);

		await vi.waitFor(() => expect(service.getSelection().model).toBe("whisper"));
		await vi.waitFor(() => {
			const last = JSON.parse(lines[lines.length - 1] ?? "{}");
			expect(last.type).toBe("state");
			expect(last.selection.model).toBe("whisper");
		});
		client.destroy();
	});

	it("notifies when a recording fails", async () => {
		await startDaemon();
		sockets.last().respond = (message) =>
			message.type === "start" ? { type: "error", message: "model missing" } : undefined;

		const result = await service.startRecording();

		const reason = "The transcription backend reported an error: model missing";
		expect(result).toEqual({ ok: false, reason });
		expect(notify).toHaveBeenCalledWith("Recording Failed", reason, "error");
	});

	it("notifies and broadcasts when the backend keeps crashing", async () => {
		service = create({
			backend: {
				script: "/opt/backend/server.py",
				startupDelayMs: 0,
				maxRestartAttempts: 0,
			},
		});
		await startDaemon();

		children[0]?.exit(1);

		expect(notifyError).toHaveBeenCalledWith(
			"Backend Stopped",
			ErrorTemplates.BACKEND.CRASH_LIMIT_REACHED,
		);
		expect(service.getState().backend.state).toBe("crashed");
	});

	it("recovers the backend after a resume", async () => {
		await startDaemon();
		const handleWake = vi.spyOn(service.connection, "handleWake");

		service.wake.emit("resume", 60_000);

		expect(handleWake).toHaveBeenCalledTimes(1);
		await vi.waitFor(() => expect(sockets.last().sentTypes()).toContain("get_models"));
	});
});
