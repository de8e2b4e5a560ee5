import { Command } from "commander";
import * as colors from "yoctocolors";
import { AudioDeviceService } from "../audio/device-service";
import { DEFAULT_CONFIG_FILE, tryLoadConfig } from "../config/loader";
import { DaemonService, DEFAULT_PID_FILE, DEFAULT_STATE_FILE } from "../daemon/service";
import { formatUserError, ErrorTemplates } from "../utils/error-templates";
import { hasErrorCode } from "../utils/errors";
import { logError } from "../utils/logger";
import { findDaemon, readStatusFile, removeStaleFiles, signalDaemon } from "./daemon-control";
import { errorsCommand } from "./errors";

const program = new Command();

program
	.name("voxlane")
	.description("Local dictation daemon for an on-device speech recognition server")
	.version("0.1.0");

program
	.command("start")
	.description("Run the daemon in the foreground")
	.action(async () => {
		const existing = findDaemon(DEFAULT_PID_FILE);
		if (existing.status === "running") {
			console.error(`Daemon is already running (PID: ${existing.pid})`);
			process.exit(1);
		}
		if (existing.status === "dead") {
			await removeStaleFiles(DEFAULT_PID_FILE, DEFAULT_STATE_FILE);
		}

		const loaded = tryLoadConfig();
		if (!loaded.success || !loaded.config) {
			console.error(colors.red(loaded.error ?? "Invalid configuration"));
			process.exit(1);
		}

		const service = new DaemonService(loaded.config);
		const shutdown = () => {
			service
				.stop()
				.catch((error) => logError("Shutdown failed", error))
				.finally(() => process.exit(0));
		};
		process.once("SIGINT", shutdown);
		process.once("SIGTERM", shutdown);

		try {
			await service.start();
		} catch {
			await service.stop();
			process.exit(1);
		}
	});

program
	.command("stop")
	.description("Stop the daemon")
	.action(async () => {
		const lookup = findDaemon(DEFAULT_PID_FILE);
		if (lookup.status === "stopped") {
			console.error("Daemon is not running (no PID file found)");
			return;
		}
		if (lookup.status === "dead") {
			await removeStaleFiles(DEFAULT_PID_FILE, DEFAULT_STATE_FILE);
			console.log("Removed stale PID file");
			return;
		}

		process.kill(lookup.pid, "SIGTERM");
		console.log(`Stopped daemon (PID: ${lookup.pid})`);
	});

program
	.command("status")
	.description("Show daemon status")
	.action(async () => {
		const lookup = findDaemon(DEFAULT_PID_FILE);
		if (lookup.status === "stopped") {
			console.log(`Status: ${colors.dim("Stopped")}`);
			return;
		}
		if (lookup.status === "dead") {
			console.log(
				`Status: ${colors.red("Dead")} (PID file exists but process is not running)`,
			);
			return;
		}

		console.log(`Status:     ${colors.green("Running")} (PID: ${lookup.pid})`);
		const state = await readStatusFile(DEFAULT_STATE_FILE);
		if (!state) return;

		console.log(`Session:    ${state.session.toUpperCase()}`);
		console.log(`Backend:    ${state.backend} / ${state.connection}`);
		console.log(`Model:      ${state.model} (${state.mode})`);
		console.log(`Microphone: ${state.deviceUid || "default"}`);
		console.log(`Uptime:     ${state.uptime}s`);
		if (state.lastTranscript) {
			console.log(`Last:       ${state.lastTranscript}`);
		}
		if (state.lastError) {
			console.log(`Error:      ${colors.red(state.lastError)}`);
		}
	});

program
	.command("toggle")
	.description("Start or stop recording in the running daemon")
	.action(() => {
		const pid = signalDaemon(DEFAULT_PID_FILE, "SIGUSR1");
		if (pid === null) {
			console.error("Daemon is not running");
			process.exitCode = 1;
		}
	});

program
	.command("reload")
	.description("Re-read the configuration file in the running daemon")
	.action(() => {
		const pid = signalDaemon(DEFAULT_PID_FILE, "SIGHUP");
		if (pid === null) {
			console.error("Daemon is not running");
			process.exitCode = 1;
		}
	});

program
	.command("cancel")
	.description("Discard the current recording")
	.action(() => {
		const pid = signalDaemon(DEFAULT_PID_FILE, "SIGUSR2");
		if (pid === null) {
			console.error("Daemon is not running");
			process.exitCode = 1;
		}
	});

program
	.command("list-mics")
	.description("List available microphone devices")
	.action(async () => {
		const deviceService = new AudioDeviceService();
		try {
			console.log("Scanning for audio devices...");
			const devices = await deviceService.listDevices();

			if (devices.length === 0) {
				console.log("No audio devices found.");
				return;
			}

			console.log("\nAvailable Audio Devices:");
			console.log("------------------------");
			for (const device of devices) {
				console.log(`ID:   ${device.uid}`);
				console.log(`Desc: ${device.displayName}`);
				console.log("------------------------");
			}

			console.log(`\nTo use a device, add its ID to ${DEFAULT_CONFIG_FILE}:`);
			console.log('"devices": { "selected": "YOUR_DEVICE_ID" }');
		} catch (error) {
			if (hasErrorCode(error, "AUDIO_BACKEND_MISSING")) {
				console.error(formatUserError(ErrorTemplates.AUDIO.AUDIO_BACKEND_MISSING));
			} else {
				console.error("Failed to list microphones:", error);
			}
			process.exitCode = 1;
		}
	});

program.addCommand(errorsCommand);

export { program };
