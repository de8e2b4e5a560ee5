import { spawn } from "node:child_process";
import { EventEmitter } from "node:events";
import { existsSync, readdirSync } from "node:fs";
import { dirname, join } from "node:path";
import { createInterface } from "node:readline";
import type { Readable } from "node:stream";
import { delay } from "../utils/async";
import { AppError } from "../utils/errors";
import { logError, logger } from "../utils/logger";
import { freePort } from "./port";

export type ProcessState = "stopped" | "starting" | "running" | "crashed";

export interface ProcessSnapshot {
	pid: number | null;
	running: boolean;
	restartAttempts: number;
	state: ProcessState;
	error?: string;
}

/** The slice of a ChildProcess the supervisor relies on. */
export interface SupervisedChild {
	readonly pid?: number | undefined;
	readonly exitCode: number | null;
	readonly stdout: Readable | null;
	readonly stderr: Readable | null;
	kill(signal?: NodeJS.Signals | number): boolean;
	once(
		event: "exit",
		listener: (code: number | null, signal: NodeJS.Signals | null) => void,
	): this;
	once(event: "error", listener: (error: Error) => void): this;
}

export type SpawnProcess = (
	command: string,
	args: string[],
	options: { cwd: string; env: NodeJS.ProcessEnv },
) => SupervisedChild;

/** The channel to reopen once the process is up, and close when it stops. */
export interface ProcessChannel {
	reconnect(): Promise<boolean>;
	disconnect(): void;
}

export interface SupervisorOptions {
	name: string;
	python: string;
	script: string;
	port: number;
	extraArgs: string[];
	env: Record<string, string>;
	/** Virtualenv used instead of the ambient interpreter when it exists. */
	runtimeHome: string;
	startupDelayMs: number;
	maxRestartAttempts: number;
	/** Unit of the escalating restart delay, and the pause inside restart(). */
	restartDelayMs: number;
	stopTimeoutMs?: number;
}

export interface SupervisorDeps {
	spawnProcess?: SpawnProcess;
	freePort?: (port: number) => Promise<unknown>;
	exists?: (path: string) => boolean;
	baseEnv?: NodeJS.ProcessEnv;
}

export type SupervisorEvents = {
	state: [snapshot: ProcessSnapshot];
	crashed: [error: AppError];
};

const TRANSITIONS: Record<ProcessState, readonly ProcessState[]> = {
	stopped: ["starting"],
	starting: ["running", "stopped", "crashed", "starting"],
	running: ["starting", "stopped", "crashed"],
	crashed: ["starting", "stopped"],
};

const defaultSpawn: SpawnProcess = (command, args, options) =>
	spawn(command, args, { ...options, stdio: ["ignore", "pipe", "pipe"] });

const findSitePackages = (
	runtimeHome: string,
	exists: (path: string) => boolean,
): string | null => {
	const libDir = join(runtimeHome, "lib");
	if (!exists(libDir)) return null;
	try {
		const pythonDir = readdirSync(libDir).find((entry) => entry.startsWith("python"));
		return pythonDir ? join(libDir, pythonDir, "site-packages") : null;
	} catch (error) {
		logger.debug({ err: error, libDir }, "Could not read runtime lib directory");
		return null;
	}
};

/**
 * Environment for the inference process: the daemon's own environment,
 * unbuffered output, the runtime home's interpreter and packages ahead of
 * anything on the system, then the configured overrides.
 */
export const buildEnvironment = (
	options: Pick<SupervisorOptions, "runtimeHome" | "env">,
	baseEnv: NodeJS.ProcessEnv = process.env,
	exists: (path: string) => boolean = existsSync,
): NodeJS.ProcessEnv => {
	const env: NodeJS.ProcessEnv = { ...baseEnv, PYTHONUNBUFFERED: "1" };

	if (options.runtimeHome && exists(options.runtimeHome)) {
		env.VIRTUAL_ENV = options.runtimeHome;
		env.PATH = `${join(options.runtimeHome, "bin")}:${baseEnv.PATH ?? ""}`;
		delete env.PYTHONHOME;
		const sitePackages = findSitePackages(options.runtimeHome, exists);
		if (sitePackages) env.PYTHONPATH = sitePackages;
	}

	return { ...env, ...options.env };
};

/**
 * Runs the inference process as a small state machine:
 * stopped → starting → running, with unexpected exits restarted after
 * `attempt × restartDelayMs` until the restart budget is spent, which
 * leaves it `crashed` until an explicit start or restart.
 */
export class ProcessSupervisor extends EventEmitter<SupervisorEvents> {
	private state: ProcessState = "stopped";
	private child: SupervisedChild | null = null;
	private restartAttempts = 0;
	private restartTimer: ReturnType<typeof setTimeout> | null = null;
	private lastError: string | undefined;
	private channel: ProcessChannel | null = null;
	// Bumped by stop(); launches from an older run abandon their follow-up work
	private run = 0;

	private readonly spawnProcess: SpawnProcess;
	private readonly freePort: (port: number) => Promise<unknown>;
	private readonly exists: (path: string) => boolean;
	private readonly baseEnv: NodeJS.ProcessEnv;

	constructor(
		private readonly options: SupervisorOptions,
		deps: SupervisorDeps = {},
	) {
		super();
		this.spawnProcess = deps.spawnProcess ?? defaultSpawn;
		this.freePort = deps.freePort ?? freePort;
		this.exists = deps.exists ?? existsSync;
		this.baseEnv = deps.baseEnv ?? process.env;
	}

	public attachChannel(channel: ProcessChannel): void {
		this.channel = channel;
	}

	public getState(): ProcessSnapshot {
		return {
			pid: this.child?.pid ?? null,
			running: this.isRunning(),
			restartAttempts: this.restartAttempts,
			state: this.state,
			...(this.lastError !== undefined && { error: this.lastError }),
		};
	}

	public isRunning(): boolean {
		return this.state === "running" && this.child !== null;
	}

	/** A successful connection proves the process healthy. */
	public markHealthy(): void {
		if (this.restartAttempts > 0) {
			logger.debug({ attempts: this.restartAttempts }, "Restart counter reset");
		}
		this.restartAttempts = 0;
	}

	/** Starts the process from `stopped` or `crashed`; a no-op otherwise. */
	public async start(): Promise<void> {
		if (this.state !== "stopped" && this.state !== "crashed") {
			logger.debug({ state: this.state }, "Start ignored");
			return;
		}
		this.restartAttempts = 0;
		this.lastError = undefined;
		this.transition("starting");
		await this.launch(this.run);
	}

	/** Terminates the process and closes the channel. Always safe. */
	public async stop(): Promise<void> {
		this.run++;
		this.clearRestartTimer();

		const child = this.child;
		this.child = null;
		if (this.state !== "stopped") this.transition("stopped");

		if (child) {
			await this.terminate(child);
		}
		this.channel?.disconnect();
	}

	public async restart(): Promise<void> {
		logger.info({ name: this.options.name }, "Restarting backend");
		await this.stop();
		await delay(this.options.restartDelayMs);
		await this.start();
	}

	private async launch(run: number): Promise<void> {
		const { name, python, script, port, extraArgs } = this.options;

		try {
			await this.freePort(port);
		} catch (error) {
			logger.warn({ err: error, port }, "Port cleanup failed");
		}
		if (run !== this.run) return;

		if (!this.exists(script)) {
			this.fail(
				new AppError("PROCESS_SPAWN_FAILED", `Backend script not found at ${script}`, {
					script,
				}),
			);
			return;
		}

		const command = this.resolveInterpreter(python);
		const args = [script, "--port", String(port), ...extraArgs];
		const env = buildEnvironment(this.options, this.baseEnv, this.exists);

		let child: SupervisedChild;
		try {
			child = this.spawnProcess(command, args, { cwd: dirname(script), env });
		} catch (error) {
			logError("Failed to start backend", error, { command });
			this.handleExit(null, null, null);
			return;
		}

		this.child = child;
		this.captureOutput(child.stdout, "info");
		this.captureOutput(child.stderr, "warn");

		child.once("exit", (code, signal) => {
			this.handleExit(child, code, signal);
		});
		child.once("error", (error) => {
			logError("Backend process error", error, { command });
			// spawn failures (ENOENT, EACCES) never produce an exit event
			if (child.pid === undefined) this.handleExit(child, null, null);
		});

		if (child.pid === undefined) {
			logger.warn({ name, command }, "Backend process has no pid yet");
		} else {
			logger.info({ name, pid: child.pid, command, args }, "Backend process started");
		}
		this.transition("running");

		await delay(this.options.startupDelayMs);
		if (run !== this.run || this.child !== child) return;

		await this.channel?.reconnect();
	}

	private handleExit(
		child: SupervisedChild | null,
		code: number | null,
		signal: NodeJS.Signals | null,
	): void {
		if (child !== null && child !== this.child) return;
		if (this.state === "stopped") return;

		this.child = null;
		logger.error(
			{ name: this.options.name, code, signal },
			"Backend process terminated unexpectedly",
		);
		this.channel?.disconnect();
		this.scheduleRestart();
	}

	private scheduleRestart(): void {
		const { maxRestartAttempts, restartDelayMs } = this.options;

		if (this.restartAttempts >= maxRestartAttempts) {
			this.fail(
				new AppError(
					"CRASH_LIMIT_REACHED",
					`Backend crashed ${this.restartAttempts + 1} times. Not restarting.`,
					{ attempts: this.restartAttempts },
				),
			);
			return;
		}

		this.restartAttempts++;
		const wait = this.restartAttempts * restartDelayMs;
		logger.warn(
			{ attempt: this.restartAttempts, max: maxRestartAttempts, delayMs: wait },
			"Backend terminated, attempting restart",
		);
		this.transition("starting");

		const run = this.run;
		this.clearRestartTimer();
		this.restartTimer = setTimeout(() => {
			this.restartTimer = null;
			this.launch(run).catch((error) => {
				logError("Backend restart failed", error);
			});
		}, wait);
	}

	private fail(error: AppError): void {
		this.lastError = error.message;
		logError("Backend supervisor giving up", error);
		this.transition("crashed");
		this.emit("crashed", error);
	}

	private resolveInterpreter(python: string): string {
		const { runtimeHome } = this.options;
		if (runtimeHome && !python.includes("/")) {
			const candidate = join(runtimeHome, "bin", python);
			if (this.exists(candidate)) return candidate;
		}
		return python;
	}

	private captureOutput(stream: Readable | null, level: "info" | "warn"): void {
		if (!stream) return;
		const lines = createInterface({ input: stream, crlfDelay: Number.POSITIVE_INFINITY });
		const prefix = `[${this.options.name}]`;
		lines.on("line", (line) => {
			const text = line.trim();
			if (!text) return;
			logger[level](`${prefix} ${text}`);
		});
	}

	private async terminate(child: SupervisedChild): Promise<void> {
		if (child.exitCode !== null || child.pid === undefined) return;

		const exited = new Promise<void>((resolve) => {
			child.once("exit", () => resolve());
		});

		child.kill("SIGTERM");
		let timer: ReturnType<typeof setTimeout> | undefined;
		const timeout = new Promise<"timeout">((resolve) => {
			timer = setTimeout(() => resolve("timeout"), this.options.stopTimeoutMs ?? 1500);
		});

		const outcome = await Promise.race([exited.then(() => "exited" as const), timeout]);
		if (timer) clearTimeout(timer);

		if (outcome === "timeout") {
			logger.warn({ pid: child.pid }, "Backend did not exit after SIGTERM, killing");
			child.kill("SIGKILL");
		}
		logger.info({ pid: child.pid }, "Backend process stopped");
	}

	private clearRestartTimer(): void {
		if (this.restartTimer) {
			clearTimeout(this.restartTimer);
			this.restartTimer = null;
		}
	}

	private transition(next: ProcessState): void {
		if (!TRANSITIONS[this.state].includes(next)) {
			logger.warn({ from: this.state, to: next }, "Ignoring invalid process transition");
			return;
		}
		this.state = next;
		this.emit("state", this.getState());
	}
}
