import { mkdirSync, mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
	buildEnvironment,
	type ProcessChannel,
	ProcessSupervisor,
	type SpawnProcess,
	type SupervisorOptions,
} from "../../src/daemon/supervisor";
import type { AppError } from "../../src/utils/errors";
import { logger } from "../../src/utils/logger";
import { FakeChild } from "../helpers/fake-child";

vi.mock("../../src/utils/logger", () => ({
	logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
	logError: vi.fn(),
}));

const OPTIONS: SupervisorOptions = {
	name: "backend",
	python: "python3",
	script: "/opt/backend/server.py",
	port: 9877,
	extraArgs: ["--log-level", "info"],
	env: { BACKEND_MODE: "test" },
	runtimeHome: "",
	startupDelayMs: 0,
	maxRestartAttempts: 2,
	restartDelayMs: 10,
	stopTimeoutMs: 20,
};

const setup = (options: Partial<SupervisorOptions> = {}) => {
	const children: FakeChild[] = [];
	let nextPid = 4000;
	const spawnProcess = vi.fn<SpawnProcess>(() => {
		const child = new FakeChild(nextPid++);
		children.push(child);
		return child;
	});
	const freePort = vi.fn(async () => []);
	const exists = vi.fn((path: string) => path === OPTIONS.script);
	const channel: ProcessChannel = {
		reconnect: vi.fn(async () => true),
		disconnect: vi.fn(),
	};
	const supervisor = new ProcessSupervisor(
		{ ...OPTIONS, ...options },
		{ spawnProcess, freePort, exists, baseEnv: { PATH: "/usr/bin", PYTHONHOME: "/x" } },
	);
	supervisor.attachChannel(channel);
	const child = (index: number): FakeChild => {
		const found = children[index];
		if (!found) throw new Error(`child ${index} was never spawned`);
		return found;
	};
	return { supervisor, spawnProcess, freePort, channel, children, child };
};

describe("ProcessSupervisor", () => {
	let context: ReturnType<typeof setup>;

	beforeEach(() => {
		vi.clearAllMocks();
		context = setup();
	});

	afterEach(async () => {
		await context.supervisor.stop();
	});

	it("frees the port, spawns the script and opens the channel", async () => {
		const { supervisor, spawnProcess, freePort, channel } = context;

		await supervisor.start();

		expect(freePort).toHaveBeenCalledWith(9877);
		expect(spawnProcess).toHaveBeenCalledTimes(1);
		expect(spawnProcess).toHaveBeenCalledWith(
			"python3",
			["/opt/backend/server.py", "--port", "9877", "--log-level", "info"],
			expect.objectContaining({ cwd: "/opt/backend" }),
		);
		expect(spawnProcess.mock.lastCall?.[2].env).toMatchObject({
			PATH: "/usr/bin",
			PYTHONUNBUFFERED: "1",
			BACKEND_MODE: "test",
		});
		expect(channel.reconnect).toHaveBeenCalledTimes(1);
		expect(supervisor.getState()).toEqual({
			pid: 4000,
			running: true,
			restartAttempts: 0,
			state: "running",
		});
	});

	it("ignores start while already running", async () => {
		await context.supervisor.start();
		await context.supervisor.start();

		expect(context.spawnProcess).toHaveBeenCalledTimes(1);
	});

	it("crashes immediately when the script is missing", async () => {
		context = setup({ script: "/missing/server.py" });
		const crashes: AppError[] = [];
		context.supervisor.on("crashed", (error) => crashes.push(error));

		await context.supervisor.start();

		expect(context.spawnProcess).not.toHaveBeenCalled();
		expect(crashes.map((e) => e.code)).toEqual(["PROCESS_SPAWN_FAILED"]);
		expect(context.supervisor.getState()).toMatchObject({
			state: "crashed",
			running: false,
			error: "Backend script not found at /missing/server.py",
		});
	});

	it("restarts with an escalating delay and gives up after the limit", async () => {
		const { supervisor, spawnProcess, channel, child } = context;
		const crashes: AppError[] = [];
		supervisor.on("crashed", (error) => crashes.push(error));
		await supervisor.start();

		child(0).exit(1);
		expect(supervisor.getState()).toMatchObject({ state: "starting", restartAttempts: 1 });
		await vi.waitFor(() => expect(supervisor.getState().state).toBe("running"));

		child(1).exit(1);
		await vi.waitFor(() => expect(spawnProcess).toHaveBeenCalledTimes(3));
		await vi.waitFor(() => expect(supervisor.getState().state).toBe("running"));

		child(2).exit(1);

		expect(supervisor.getState()).toMatchObject({
			state: "crashed",
			running: false,
			restartAttempts: 2,
			error: "Backend crashed 3 times. Not restarting.",
		});
		expect(crashes.map((e) => e.code)).toEqual(["CRASH_LIMIT_REACHED"]);
		expect(channel.disconnect).toHaveBeenCalledTimes(3);
		expect(logger.warn).toHaveBeenCalledWith(
			{ attempt: 1, max: 2, delayMs: 10 },
			"Backend terminated, attempting restart",
		);
		expect(logger.warn).toHaveBeenCalledWith(
			{ attempt: 2, max: 2, delayMs: 20 },
			"Backend terminated, attempting restart",
		);
	});

	it("starts again from crashed with a fresh budget", async () => {
		context = setup({ maxRestartAttempts: 0 });
		const { supervisor, child } = context;
		await supervisor.start();
		child(0).exit(1);
		expect(supervisor.getState().state).toBe("crashed");

		await supervisor.start();

		expect(supervisor.getState()).toEqual({
			pid: 4001,
			running: true,
			restartAttempts: 0,
			state: "running",
		});
	});

	it("resets the restart counter once marked healthy", async () => {
		const { supervisor, child } = context;
		await supervisor.start();
		child(0).exit(1);
		await vi.waitFor(() => expect(supervisor.getState().state).toBe("running"));
		expect(supervisor.getState().restartAttempts).toBe(1);

		supervisor.markHealthy();

		expect(supervisor.getState().restartAttempts).toBe(0);
	});

	it("stops with SIGTERM and does not restart", async () => {
		const { supervisor, spawnProcess, channel, child } = context;
		await supervisor.start();

		await supervisor.stop();

		expect(child(0).signals).toEqual(["SIGTERM"]);
		expect(channel.disconnect).toHaveBeenCalledTimes(1);
		expect(supervisor.getState()).toEqual({
			pid: null,
			running: false,
			restartAttempts: 0,
			state: "stopped",
		});
		await new Promise((resolve) => setTimeout(resolve, 30));
		expect(spawnProcess).toHaveBeenCalledTimes(1);
	});

	it("kills a process that ignores SIGTERM", async () => {
		const { supervisor, child } = context;
		await supervisor.start();
		child(0).ignoreTerm = true;

		await supervisor.stop();

		expect(child(0).signals).toEqual(["SIGTERM", "SIGKILL"]);
	});

	it("cancels a pending restart on stop", async () => {
		context = setup({ restartDelayMs: 50 });
		const { supervisor, spawnProcess, child } = context;
		await supervisor.start();
		child(0).exit(1);

		await supervisor.stop();
		await new Promise((resolve) => setTimeout(resolve, 80));

		expect(spawnProcess).toHaveBeenCalledTimes(1);
		expect(supervisor.getState().state).toBe("stopped");
	});

	it("restarts a running process with a new child", async () => {
		const { supervisor, child } = context;
		await supervisor.start();

		await supervisor.restart();

		expect(child(0).signals).toEqual(["SIGTERM"]);
		expect(supervisor.getState()).toMatchObject({ pid: 4001, state: "running" });
	});

	it("logs process output with the process name", async () => {
		const { supervisor, child } = context;
		await supervisor.start();

		child(0).stdout.write("model loaded\n");
		child(0).stderr.write("  deprecated flag  \n\n");

		await vi.waitFor(() => {
			expect(logger.info).toHaveBeenCalledWith("[backend] model loaded");
			expect(logger.warn).toHaveBeenCalledWith("[backend] deprecated flag");
		});
	});

	it("treats a spawn error without a pid as an exit", async () => {
		context = setup({ maxRestartAttempts: 0 });
		const { supervisor, spawnProcess } = context;
		const orphan = new FakeChild(undefined);
		spawnProcess.mockImplementationOnce(() => orphan);
		await supervisor.start();

		orphan.emit("error", new Error("spawn python3 ENOENT"));

		expect(supervisor.getState().state).toBe("crashed");
	});
});

describe("buildEnvironment", () => {
	let home: string;

	beforeEach(() => {
		home = mkdtempSync(join(tmpdir(), "voxlane-venv-"));
		mkdirSync(join(home, "lib", "python3.11", "site-packages"), { recursive: true });
	});

	afterEach(() => {
		rmSync(home, { recursive: true, force: true });
	});

	it("puts the runtime home first", () => {
		const env = buildEnvironment(
			{ runtimeHome: home, env: { EXTRA: "1" } },
			{ PATH: "/usr/bin", PYTHONHOME: "/opt/python", HOME: "/home/me" },
		);

		expect(env).toEqual({
			HOME: "/home/me",
			PATH: `${join(home, "bin")}:/usr/bin`,
			PYTHONUNBUFFERED: "1",
			VIRTUAL_ENV: home,
			PYTHONPATH: join(home, "lib", "python3.11", "site-packages"),
			EXTRA: "1",
		});
	});

	it("leaves the environment alone without a runtime home", () => {
		const env = buildEnvironment(
			{ runtimeHome: join(home, "missing"), env: {} },
			{ PATH: "/usr/bin", PYTHONHOME: "/opt/python" },
		);

		expect(env).toEqual({
			PATH: "/usr/bin",
			PYTHONHOME: "/opt/python",
			PYTHONUNBUFFERED: "1",
		});
	});
});
