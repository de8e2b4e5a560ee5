import { existsSync, readdirSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { Command } from "commander";
import * as colors from "yoctocolors";
import { z } from "zod";
import { DEFAULT_CONFIG_DIR, loadConfig } from "../config/loader";
import { LOG_FILE_PREFIX } from "../utils/logger";

const PINO_ERROR_LEVEL = 50;

const LogEntrySchema = z
	.object({
		level: z.number(),
		time: z.union([z.string(), z.number()]),
		msg: z.string().default(""),
		err: z
			.object({
				type: z.string().optional(),
				message: z.string().optional(),
				stack: z.string().optional(),
			})
			.passthrough()
			.optional(),
	})
	.passthrough();

export type LogEntry = z.infer<typeof LogEntrySchema> & { file: string };

const parseLine = (line: string): z.infer<typeof LogEntrySchema> | null => {
	let raw: unknown;
	try {
		raw = JSON.parse(line);
	} catch {
		return null;
	}
	const parsed = LogEntrySchema.safeParse(raw);
	return parsed.success ? parsed.data : null;
};

/** Most recent error entries first, newest file first. */
export const collectErrors = (logDir: string, count: number): LogEntry[] => {
	const files = readdirSync(logDir)
		.filter((f) => f.startsWith(LOG_FILE_PREFIX) && f.endsWith(".log"))
		.sort((a, b) => b.localeCompare(a));

	const found: LogEntry[] = [];
	for (const file of files) {
		if (found.length >= count) break;

		const lines = readFileSync(join(logDir, file), "utf-8")
			.split("\n")
			.filter((line) => line.trim() !== "");

		for (let i = lines.length - 1; i >= 0 && found.length < count; i--) {
			const line = lines[i];
			if (!line) continue;
			const entry = parseLine(line);
			if (entry && entry.level >= PINO_ERROR_LEVEL) {
				found.push({ ...entry, file });
			}
		}
	}
	return found;
};

const resolveLogDir = (): string => {
	try {
		return loadConfig().paths.logs;
	} catch {
		return join(DEFAULT_CONFIG_DIR, "logs");
	}
};

export const errorsCommand = new Command("errors")
	.description("Display the last errors from the logs")
	.option("-n, --number <count>", "Number of errors to show", "1")
	.action((options: { number: string }) => {
		const logDir = resolveLogDir();

		if (!existsSync(logDir)) {
			console.log(colors.yellow("Log directory does not exist."));
			return;
		}

		const count = Math.max(1, Number.parseInt(options.number, 10) || 1);
		let errors: LogEntry[];
		try {
			errors = collectErrors(logDir, count);
		} catch (error) {
			console.error(colors.red("Failed to read errors:"), error);
			return;
		}

		if (errors.length === 0) {
			console.log(colors.green("No errors found in the logs."));
			return;
		}

		console.log(colors.bold(colors.red(`Last ${errors.length} error(s):`)));
		for (const err of errors) {
			console.log(colors.dim("------------------------------------------------"));
			console.log(`${colors.bold("Timestamp:")} ${new Date(err.time).toLocaleString()}`);
			console.log(`${colors.bold("Message:  ")} ${colors.red(err.msg)}`);
			if (err.err) {
				console.log(`${colors.bold("Type:     ")} ${err.err.type ?? "Error"}`);
				if (err.err.stack) {
					console.log(`${colors.bold("Stack:    ")} ${colors.dim(err.err.stack)}`);
				}
			}
			console.log(`${colors.bold("Source:   ")} ${colors.dim(err.file)}`);
		}
		console.log(colors.dim("------------------------------------------------"));
	});
