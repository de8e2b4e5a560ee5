import { describe, expect, it, vi } from "vitest";
import {
	AudioCaptureEngine,
	type CaptureEngineOptions,
} from "../../src/audio/capture-engine";
import type { AudioChunk } from "../../src/audio/chunker";
import { AppError } from "../../src/utils/errors";
import { logError } from "../../src/utils/logger";
import { FakeInputBackend } from "../helpers/fake-input-backend";

vi.mock("../../src/utils/logger", () => ({
	logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
	logError: vi.fn(),
}));

const OPTIONS: CaptureEngineOptions = {
	targetSampleRate: 16_000,
	chunkDurationMs: 100,
	maxStartAttempts: 3,
	flowWaitMs: 20,
	settleMs: 0,
	hotSwap: { maxRestarts: 2, debounceMs: 500, rateToleranceHz: 100, restartDelayMs: 0 },
};

const KNOWN = new Set(["", "hw:USB"]);

const setup = (
	options: Partial<CaptureEngineOptions> = {},
	sampleRate = 16_000,
) => {
	const backend = new FakeInputBackend(sampleRate);
	let clock = 1000;
	const engine = new AudioCaptureEngine(
		backend,
		{ isDeviceAvailable: (uid) => KNOWN.has(uid) },
		{ ...OPTIONS, ...options },
		() => clock,
	);
	const chunks: AudioChunk[] = [];
	engine.setChunkCallback((chunk) => chunks.push(chunk));
	return {
		backend,
		engine,
		chunks,
		advanceClock: (ms: number) => {
			clock += ms;
		},
	};
};

describe("AudioCaptureEngine start", () => {
	it("starts once audio flows", async () => {
		const { engine, backend } = setup();

		const result = await engine.start("hw:USB");

		expect(result).toEqual({
			deviceUid: "hw:USB",
			fellBack: false,
			flowing: true,
			format: { sampleRate: 16_000, channels: 1 },
		});
		expect(backend.opened).toEqual(["hw:USB"]);
		expect(engine.isCapturing()).toBe(true);
		expect(engine.isFlowing()).toBe(true);
		await engine.stop();
	});

	it("uses the default device when the requested one is unknown", async () => {
		const { engine, backend } = setup();
		const onFallback = vi.fn();
		engine.on("fallback", onFallback);

		const result = await engine.start("hw:Gone");

		expect(onFallback).toHaveBeenCalledWith("hw:Gone");
		expect(backend.opened).toEqual([""]);
		expect(result.fellBack).toBe(true);
		expect(engine.getDeviceUid()).toBe("");
		await engine.stop();
	});

	it("falls back to the default device when the requested one stays silent", async () => {
		const { engine, backend } = setup();
		backend.script = ["silent", "silent", "silent"];
		const onFallback = vi.fn();
		engine.on("fallback", onFallback);

		const result = await engine.start("hw:USB");

		expect(backend.opened).toEqual(["hw:USB", "hw:USB", "hw:USB", ""]);
		expect(onFallback).toHaveBeenCalledWith("hw:USB");
		expect(result).toMatchObject({ deviceUid: "", fellBack: true, flowing: true });
		await engine.stop();
	});

	it("retries a busy device", async () => {
		const { engine, backend } = setup();
		backend.script = [new AppError("DEVICE_BUSY", "busy"), "flow"];

		const result = await engine.start("hw:USB");

		expect(backend.opened).toEqual(["hw:USB", "hw:USB"]);
		expect(result.flowing).toBe(true);
		await engine.stop();
	});

	it("does not retry a permission failure", async () => {
		const { engine, backend } = setup();
		backend.script = [new AppError("PERMISSION_DENIED", "denied")];

		await expect(engine.start("hw:USB")).rejects.toMatchObject({
			code: "PERMISSION_DENIED",
		});
		expect(backend.opened).toEqual(["hw:USB"]);
		expect(engine.isCapturing()).toBe(false);
	});

	it("accepts a silent default device on the final attempt", async () => {
		const { engine, backend } = setup();
		backend.defaultStep = "silent";

		const result = await engine.start("");

		expect(backend.opened).toEqual(["", "", "", ""]);
		expect(result).toMatchObject({ deviceUid: "", fellBack: false, flowing: false });
		expect(engine.isCapturing()).toBe(true);
		await engine.stop();
	});

	it("is cancelled by a stop while opening", async () => {
		const { engine, backend } = setup();
		backend.defaultStep = "silent";

		const outcome = expect(engine.start("hw:USB")).rejects.toMatchObject({
			code: "CANCELLED",
		});
		await engine.stop();

		await outcome;
		expect(engine.isCapturing()).toBe(false);
	});
});

describe("AudioCaptureEngine chunking", () => {
	it("delivers fixed-size chunks and flushes the tail on stop", async () => {
		const { engine, backend, chunks } = setup();
		await engine.start("");

		backend.emit(new Float32Array(1600).fill(0.25));
		backend.emit(new Float32Array(800));
		expect(chunks.map((c) => c.samples.length)).toEqual([1600]);

		await engine.stop();

		expect(chunks.map((c) => c.samples.length)).toEqual([1600, 800]);
		expect(chunks.map((c) => c.sequence)).toEqual([0, 1]);
		expect(chunks[0]?.samples[0]).toBe(0.25);
		expect(chunks[0]?.sampleRate).toBe(16_000);
	});

	it("resamples device audio to the target rate", async () => {
		const { engine, backend, chunks } = setup({}, 48_000);
		await engine.start("");

		backend.emit(new Float32Array(4800));

		expect(chunks).toHaveLength(1);
		expect(chunks[0]?.samples).toHaveLength(1600);
		await engine.stop();
	});

	it("survives a throwing chunk callback", async () => {
		const { engine, backend } = setup();
		engine.setChunkCallback(() => {
			throw new Error("consumer failed");
		});
		await engine.start("");

		expect(() => backend.emit(new Float32Array(1600))).not.toThrow();
		expect(logError).toHaveBeenCalledWith(
			"Chunk callback failed",
			expect.any(Error),
			{ sequence: 0 },
		);
		await engine.stop();
	});
});

describe("AudioCaptureEngine hot swap", () => {
	it("ignores configuration changes when not capturing", () => {
		const { engine } = setup();
		expect(engine.handleConfigurationChange("device list changed")).toBe(false);
	});

	it("leaves a flowing capture alone when the rate has not moved", async () => {
		const { engine } = setup();
		await engine.start("");

		expect(engine.handleConfigurationChange("device list changed")).toBe(false);
		expect(engine.getRestartCount()).toBe(0);
		await engine.stop();
	});

	it("restarts when the device rate changes", async () => {
		const { engine, backend } = setup({}, 48_000);
		await engine.start("");
		const restarted = new Promise((resolve) => engine.once("restarted", resolve));

		backend.handlers?.onFormatChange({ sampleRate: 44_100, channels: 1 });

		expect(await restarted).toBe("format change");
		expect(engine.getRestartCount()).toBe(1);
		expect(backend.opened).toEqual(["", ""]);
		await engine.stop();
	});

	it("ignores rate jitter within tolerance", async () => {
		const { engine, backend } = setup({}, 48_000);
		await engine.start("");

		backend.handlers?.onFormatChange({ sampleRate: 48_050, channels: 1 });

		expect(engine.getRestartCount()).toBe(0);
		await engine.stop();
	});

	it("debounces and caps restarts", async () => {
		const { engine, advanceClock } = setup();
		await engine.start("");

		expect(engine.handleConfigurationChange("first", true)).toBe(true);
		expect(engine.handleConfigurationChange("too soon", true)).toBe(false);

		advanceClock(600);
		expect(engine.handleConfigurationChange("second", true)).toBe(true);

		advanceClock(600);
		expect(engine.handleConfigurationChange("third", true)).toBe(false);
		expect(engine.getRestartCount()).toBe(2);
		await engine.stop();
	});

	it("restarts after a runtime capture error", async () => {
		const { engine, backend } = setup();
		await engine.start("hw:USB");
		const restarted = new Promise((resolve) => engine.once("restarted", resolve));

		backend.handlers?.onError(new AppError("DEVICE_BUSY", "lost device"));

		expect(await restarted).toBe("capture error: DEVICE_BUSY");
		expect(engine.isCapturing()).toBe(true);
		await engine.stop();
	});

	it("reports a runtime error once restarts are exhausted", async () => {
		const { engine, backend } = setup({
			hotSwap: { ...OPTIONS.hotSwap, maxRestarts: 0 },
		});
		await engine.start("");
		const onError = vi.fn();
		engine.on("captureError", onError);

		backend.handlers?.onError(new AppError("NO_MICROPHONE", "unplugged"));

		expect(onError).toHaveBeenCalledWith(expect.objectContaining({ code: "NO_MICROPHONE" }));
		expect(engine.isCapturing()).toBe(false);
		await engine.stop();
	});
});
