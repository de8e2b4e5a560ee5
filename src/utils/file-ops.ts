import { existsSync } from "node:fs";
import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";

export async function atomicWriteFile(
	filePath: string,
	data: string,
	options?: { mode?: number },
): Promise<void> {
	const tmpPath = `${filePath}.tmp-${Date.now()}-${process.pid}`;
	try {
		await writeFile(tmpPath, data, options);
		await rename(tmpPath, filePath);
	} catch (e) {
		await rm(tmpPath, { force: true });
		throw e;
	}
}

export async function ensureDir(dir: string, mode = 0o700): Promise<void> {
	if (!existsSync(dir)) {
		await mkdir(dir, { recursive: true, mode });
	}
}

/** Parsed JSON, or null when the file is missing or unreadable. */
export async function readJsonFile(filePath: string): Promise<unknown> {
	try {
		const content = await readFile(filePath, "utf-8");
		return JSON.parse(content);
	} catch {
		return null;
	}
}
