import { readFileSync } from "node:fs";
import { rm } from "node:fs/promises";
import { type DaemonStatusFile, DaemonStatusFileSchema } from "../shared/ipc-types";
import { readJsonFile } from "../utils/file-ops";
import { logger } from "../utils/logger";

export type ProcessProbe = (pid: number) => boolean;

export const isProcessAlive: ProcessProbe = (pid) => {
	try {
		process.kill(pid, 0);
		return true;
	} catch (error) {
		// EPERM: alive, but owned by someone else
		return error instanceof Error && "code" in error && error.code === "EPERM";
	}
};

/** The pid in `pidFile`, or null when missing or not a number. */
export const readPid = (pidFile: string): number | null => {
	let content: string;
	try {
		content = readFileSync(pidFile, "utf-8");
	} catch {
		return null;
	}
	const pid = Number.parseInt(content.trim(), 10);
	return Number.isInteger(pid) && pid > 0 ? pid : null;
};

export type DaemonLookup =
	| { status: "running"; pid: number }
	| { status: "stopped" }
	| { status: "dead"; pid: number };

export const findDaemon = (
	pidFile: string,
	alive: ProcessProbe = isProcessAlive,
): DaemonLookup => {
	const pid = readPid(pidFile);
	if (pid === null) return { status: "stopped" };
	return alive(pid) ? { status: "running", pid } : { status: "dead", pid };
};

/**
 * Sends `signal` to the running daemon.
 * @returns the daemon's pid, or null when none is running
 */
export const signalDaemon = (
	pidFile: string,
	signal: NodeJS.Signals,
	alive: ProcessProbe = isProcessAlive,
	kill: (pid: number, signal: NodeJS.Signals) => void = (pid, sig) =>
		process.kill(pid, sig),
): number | null => {
	const lookup = findDaemon(pidFile, alive);
	if (lookup.status !== "running") return null;
	kill(lookup.pid, signal);
	logger.debug({ pid: lookup.pid, signal }, "Signalled daemon");
	return lookup.pid;
};

export const readStatusFile = async (
	stateFile: string,
): Promise<DaemonStatusFile | null> => {
	const raw = await readJsonFile(stateFile);
	if (raw === null) return null;
	const parsed = DaemonStatusFileSchema.safeParse(raw);
	return parsed.success ? parsed.data : null;
};

export const removeStaleFiles = async (...files: string[]): Promise<void> => {
	for (const file of files) {
		await rm(file, { force: true });
	}
};
