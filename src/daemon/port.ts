import { existsSync } from "node:fs";
import { execa } from "execa";
import { delay } from "../utils/async";
import { logger } from "../utils/logger";

const LSOF_PATHS = ["/usr/sbin/lsof", "/usr/bin/lsof", "/bin/lsof"];

export interface FreePortOptions {
	passes?: number;
	settleMs?: number;
	finalSettleMs?: number;
	/** `null` skips the lookup. Defaults to the first lsof found on disk. */
	lsofPath?: string | null;
	kill?: (pid: number, signal: NodeJS.Signals) => void;
	listPids?: (lsofPath: string, port: number) => Promise<number[]>;
}

export const findLsof = (exists: (path: string) => boolean = existsSync) =>
	LSOF_PATHS.find((path) => exists(path)) ?? null;

export const parsePids = (output: string): number[] =>
	output
		.split("\n")
		.map((line) => Number.parseInt(line.trim(), 10))
		.filter((pid) => Number.isInteger(pid) && pid > 0);

export const listPortPids = async (
	lsofPath: string,
	port: number,
): Promise<number[]> => {
	// lsof exits 1 when nothing listens
	const result = await execa(lsofPath, ["-ti", `:${port}`], { reject: false });
	return parsePids(result.stdout);
};

/**
 * Best-effort removal of stale listeners on `port`: every pid other than
 * ours is SIGKILLed, for up to `passes` rounds.
 * @returns the pids that were signalled
 */
export async function freePort(
	port: number,
	options: FreePortOptions = {},
): Promise<number[]> {
	const passes = options.passes ?? 3;
	const settleMs = options.settleMs ?? 500;
	const finalSettleMs = options.finalSettleMs ?? 300;
	const kill = options.kill ?? ((pid, signal) => process.kill(pid, signal));
	const listPids = options.listPids ?? listPortPids;
	const lsofPath = options.lsofPath === undefined ? findLsof() : options.lsofPath;

	if (!lsofPath) {
		logger.warn("lsof not found, skipping port cleanup");
		return [];
	}

	const killed = new Set<number>();

	for (let pass = 1; pass <= passes; pass++) {
		let pids: number[];
		try {
			pids = (await listPids(lsofPath, port)).filter((pid) => pid !== process.pid);
		} catch (error) {
			logger.warn({ err: error, port }, "Could not check for existing processes");
			break;
		}

		if (pids.length === 0) break;

		for (const pid of pids) {
			try {
				logger.info({ pid, port, pass }, "Killing stale process on port");
				kill(pid, "SIGKILL");
				killed.add(pid);
			} catch (error) {
				logger.debug({ err: error, pid }, "Failed to kill process");
			}
		}

		await delay(settleMs);
	}

	await delay(finalSettleMs);
	return [...killed];
}
