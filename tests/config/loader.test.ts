import { chmodSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { homedir, tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { loadConfig, resolvePath, tryLoadConfig } from "../../src/config/loader";

describe("Config Loader", () => {
	let dir: string;
	let configFile: string;

	const writeConfig = (content: unknown) => {
		writeFileSync(configFile, typeof content === "string" ? content : JSON.stringify(content));
		chmodSync(configFile, 0o600);
	};

	beforeEach(() => {
		dir = mkdtempSync(join(tmpdir(), "voxlane-config-"));
		configFile = join(dir, "config.json");
		delete process.env.VOXLANE_BACKEND_PYTHON;
		delete process.env.VOXLANE_BACKEND_SCRIPT;
	});

	afterEach(() => {
		rmSync(dir, { recursive: true, force: true });
		delete process.env.VOXLANE_BACKEND_PYTHON;
		delete process.env.VOXLANE_BACKEND_SCRIPT;
		vi.restoreAllMocks();
	});

	it("should apply defaults when the file is missing", () => {
		const config = loadConfig(join(dir, "missing.json"));

		expect(config.backend.port).toBe(9877);
		expect(config.backend.maxRestartAttempts).toBe(5);
		expect(config.connection.reconnectDelayMs).toBe(2000);
		expect(config.connection.maxReconnectAttempts).toBe(5);
		expect(config.session).toMatchObject({
			model: "parakeet",
			mode: "dictation",
			diarization: false,
			readyTimeoutMs: 30_000,
		});
		expect(config.devices.selected).toBe("");
		expect(config.backend.script).toBe(
			join(homedir(), ".local/share/voxlane/server/server.py"),
		);
	});

	it("should load valid config from file", () => {
		writeConfig({
			backend: { port: 9999 },
			session: { mode: "continuous", model: "whisper" },
			audio: { hotSwap: { maxRestarts: 4 } },
		});

		const config = loadConfig(configFile);

		expect(config.backend.port).toBe(9999);
		expect(config.session.mode).toBe("continuous");
		expect(config.session.model).toBe("whisper");
		expect(config.audio.hotSwap).toEqual({
			maxRestarts: 4,
			debounceMs: 500,
			rateToleranceHz: 100,
			restartDelayMs: 300,
		});
	});

	it("should fall back to env vars for the backend executable", () => {
		writeConfig({ backend: { script: "/srv/asr/server.py" } });
		process.env.VOXLANE_BACKEND_PYTHON = "/usr/bin/python3.11";
		process.env.VOXLANE_BACKEND_SCRIPT = "/ignored/server.py";

		const config = loadConfig(configFile);

		expect(config.backend.python).toBe("/usr/bin/python3.11");
		expect(config.backend.script).toBe("/srv/asr/server.py");
	});

	it("should expand ~ in paths", () => {
		writeConfig({ paths: { logs: "~/voxlane-logs", runtimeHome: "~/venv" } });

		const config = loadConfig(configFile);

		expect(config.paths.logs).toBe(join(homedir(), "voxlane-logs"));
		expect(config.paths.runtimeHome).toBe(join(homedir(), "venv"));
	});

	it("should throw CORRUPTED on invalid JSON", () => {
		writeConfig("{ not json");

		expect(() => loadConfig(configFile)).toThrow(
			expect.objectContaining({ code: "CORRUPTED" }),
		);
	});

	it("should report every invalid field", () => {
		writeConfig({ backend: { port: 70_000 }, connection: { path: "ws" } });

		expect(() => loadConfig(configFile)).toThrow("Config validation failed");
		const result = tryLoadConfig(configFile);
		expect(result.success).toBe(false);
		expect(result.error).toContain("backend.port");
		expect(result.error).toContain("connection.path: Path must start with '/'");
	});

	it("should warn about loose permissions", () => {
		const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
		writeConfig({});
		chmodSync(configFile, 0o644);

		loadConfig(configFile);

		expect(warn).toHaveBeenCalledWith(expect.stringContaining("permissions are 644"));
	});
});

describe("resolvePath", () => {
	it("expands the home directory", () => {
		expect(resolvePath("~/.config/voxlane")).toBe(join(homedir(), ".config/voxlane"));
	});

	it("makes relative paths absolute", () => {
		expect(resolvePath("/var/log/../tmp")).toBe("/var/tmp");
	});
});
