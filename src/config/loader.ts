import { existsSync, readFileSync, statSync } from "node:fs";
import { homedir } from "node:os";
import { join, resolve } from "node:path";
import { ErrorTemplates, formatUserError } from "../utils/error-templates";
import { AppError } from "../utils/errors";
import { type Config, ConfigSchema } from "./schema";

export const DEFAULT_CONFIG_DIR = join(homedir(), ".config", "voxlane");
export const DEFAULT_CONFIG_FILE = join(DEFAULT_CONFIG_DIR, "config.json");

/**
 * Resolves the path with ~ expansion.
 */
export const resolvePath = (path: string): string => {
	if (path.startsWith("~")) {
		return join(homedir(), path.slice(1));
	}
	return resolve(path);
};

let cachedConfig: Config | null = null;
let reloadInProgress = false;

export interface ConfigLoadResult {
	success: boolean;
	config?: Config;
	error?: string;
}

/**
 * Attempts to load config without throwing.
 */
export const tryLoadConfig = (
	configPath: string = DEFAULT_CONFIG_FILE,
): ConfigLoadResult => {
	try {
		const config = loadConfig(configPath, true);
		return { success: true, config };
	} catch (error) {
		const message = error instanceof AppError ? error.message : String(error);
		return { success: false, error: message };
	}
};

/**
 * Reloads config from file with validation. Concurrent calls fail while a
 * reload is in progress; on failure the previous config stays cached.
 */
export const reloadConfig = (
	configPath: string = DEFAULT_CONFIG_FILE,
): ConfigLoadResult => {
	if (reloadInProgress) {
		return { success: false, error: "Reload already in progress" };
	}

	reloadInProgress = true;
	try {
		const result = tryLoadConfig(configPath);
		if (result.success && result.config) {
			if (configPath === DEFAULT_CONFIG_FILE) {
				cachedConfig = result.config;
			}
		}
		return result;
	} finally {
		reloadInProgress = false;
	}
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

const envBackendOverrides = (): Record<string, string> => {
	const overrides: Record<string, string> = {};
	if (process.env.VOXLANE_BACKEND_PYTHON) {
		overrides.python = process.env.VOXLANE_BACKEND_PYTHON;
	}
	if (process.env.VOXLANE_BACKEND_SCRIPT) {
		overrides.script = process.env.VOXLANE_BACKEND_SCRIPT;
	}
	return overrides;
};

/**
 * Loads and validates the configuration.
 * The config file takes priority; environment variables fill in the backend
 * executable and script when the file leaves them out.
 * @throws {AppError} if config is corrupted or validation fails
 */
export const loadConfig = (
	configPath: string = DEFAULT_CONFIG_FILE,
	forceReload: boolean = false,
): Config => {
	if (cachedConfig && !forceReload && configPath === DEFAULT_CONFIG_FILE) {
		return cachedConfig;
	}

	let fileConfig: unknown = {};

	if (existsSync(configPath)) {
		const stats = statSync(configPath);
		const mode = stats.mode & 0o777;
		if (mode !== 0o600) {
			console.warn(
				`WARNING: Config file permissions are ${mode.toString(8)}. ` +
					`It is recommended to set them to 600 (chmod 600 ${configPath}).`,
			);
		}

		try {
			const content = readFileSync(configPath, "utf-8");
			fileConfig = JSON.parse(content);
		} catch (_error) {
			throw new AppError(
				"CORRUPTED",
				formatUserError(ErrorTemplates.CONFIG.CORRUPTED),
			);
		}
	}

	const parsedFileConfig = isRecord(fileConfig) ? fileConfig : {};
	const fileBackend = isRecord(parsedFileConfig.backend)
		? parsedFileConfig.backend
		: {};

	// File config > Env config
	const mergedConfig = {
		...parsedFileConfig,
		backend: { ...envBackendOverrides(), ...fileBackend },
	};

	const result = ConfigSchema.safeParse(mergedConfig);

	if (!result.success) {
		const errorMessages = result.error.issues
			.map((e) => `${e.path.join(".")}: ${e.message}`)
			.join("\n");
		throw new AppError(
			"VALIDATION_FAILED",
			`Config validation failed:\n${errorMessages}`,
		);
	}

	const config = result.data;
	config.paths.logs = resolvePath(config.paths.logs);
	config.backend.script = resolvePath(config.backend.script);
	if (config.paths.runtimeHome) {
		config.paths.runtimeHome = resolvePath(config.paths.runtimeHome);
	}

	if (configPath === DEFAULT_CONFIG_FILE) {
		cachedConfig = config;
	}

	return config;
};
