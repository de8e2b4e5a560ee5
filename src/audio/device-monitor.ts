import { EventEmitter } from "node:events";
import { type FSWatcher, watch } from "node:fs";
import { logError, logger } from "../utils/logger";
import { type AudioDevice, DEFAULT_DEVICE_UID } from "./device-service";

export interface DeviceLister {
	listDevices(): Promise<AudioDevice[]>;
}

export interface DeviceWatchHandle {
	close(): void;
}

export type DeviceWatchFactory = (
	path: string,
	onChange: () => void,
) => DeviceWatchHandle;

export interface DeviceMonitorOptions {
	pollIntervalMs: number;
	watchPath: string;
	watchFactory?: DeviceWatchFactory;
}

export type RefreshTrigger = "initial" | "poll" | "watch" | "manual";

export type DeviceMonitorEvents = {
	change: [devices: AudioDevice[]];
};

const fsWatchFactory: DeviceWatchFactory = (path, onChange) => {
	const watcher: FSWatcher = watch(path, { persistent: false }, onChange);
	watcher.on("error", (error) => {
		logError("Device watcher failed", error, { path });
		watcher.close();
	});
	return watcher;
};

const sameDeviceSet = (a: AudioDevice[], b: AudioDevice[]): boolean => {
	const left = new Set(a.map((d) => d.uid));
	const right = new Set(b.map((d) => d.uid));
	if (left.size !== right.size) return false;
	for (const uid of left) {
		if (!right.has(uid)) return false;
	}
	return true;
};

/**
 * Tracks available input devices. A filesystem watch on the ALSA device
 * directory and a periodic poll both feed {@link refresh}, which publishes
 * `change` only when the set of device uids differs from the last one.
 */
export class DeviceMonitor extends EventEmitter<DeviceMonitorEvents> {
	private devices: AudioDevice[] = [];
	private pollTimer: ReturnType<typeof setInterval> | null = null;
	private watcher: DeviceWatchHandle | null = null;
	private refreshing: Promise<boolean> | null = null;
	private refreshQueued = false;
	private readonly watchFactory: DeviceWatchFactory;

	constructor(
		private readonly lister: DeviceLister,
		private readonly options: DeviceMonitorOptions,
	) {
		super();
		this.watchFactory = options.watchFactory ?? fsWatchFactory;
	}

	public async start(): Promise<void> {
		if (this.pollTimer) return;

		await this.refresh("initial");

		this.pollTimer = setInterval(() => {
			this.scheduleRefresh("poll");
		}, this.options.pollIntervalMs);

		try {
			this.watcher = this.watchFactory(this.options.watchPath, () => {
				this.scheduleRefresh("watch");
			});
		} catch (error) {
			// Polling still covers device changes
			logger.warn(
				{ err: error, path: this.options.watchPath },
				"Device change watcher unavailable",
			);
		}

		logger.info(
			{ devices: this.devices.length, pollIntervalMs: this.options.pollIntervalMs },
			"Device monitor started",
		);
	}

	public stop(): void {
		if (this.pollTimer) {
			clearInterval(this.pollTimer);
			this.pollTimer = null;
		}
		if (this.watcher) {
			this.watcher.close();
			this.watcher = null;
		}
	}

	public getDevices(): AudioDevice[] {
		return [...this.devices];
	}

	/** The system default (`""`) is always available. */
	public isDeviceAvailable(uid: string): boolean {
		if (uid === DEFAULT_DEVICE_UID) return true;
		return this.devices.some((d) => d.uid === uid);
	}

	/**
	 * Re-reads the device list. Calls made while a refresh is running are
	 * coalesced into one follow-up refresh.
	 * @returns whether a change was published
	 */
	public async refresh(trigger: RefreshTrigger = "manual"): Promise<boolean> {
		if (this.refreshing) {
			this.refreshQueued = true;
			return this.refreshing;
		}

		this.refreshing = this.runRefresh(trigger);
		try {
			return await this.refreshing;
		} finally {
			this.refreshing = null;
			if (this.refreshQueued) {
				this.refreshQueued = false;
				this.scheduleRefresh(trigger);
			}
		}
	}

	private scheduleRefresh(trigger: RefreshTrigger): void {
		this.refresh(trigger).catch((error) => {
			logError("Device refresh failed", error, { trigger });
		});
	}

	private async runRefresh(trigger: RefreshTrigger): Promise<boolean> {
		let next: AudioDevice[];
		try {
			next = await this.lister.listDevices();
		} catch (error) {
			logError("Failed to enumerate audio devices", error, { trigger });
			return false;
		}

		if (sameDeviceSet(this.devices, next)) {
			return false;
		}

		this.devices = next;
		logger.info(
			{ trigger, devices: next.map((d) => d.uid) },
			"Audio device list changed",
		);
		this.emit("change", this.getDevices());
		return true;
	}
}
