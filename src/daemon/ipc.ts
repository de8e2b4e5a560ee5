import { EventEmitter } from "node:events";
import { existsSync, unlinkSync } from "node:fs";
import {
	createConnection,
	createServer,
	type Server,
	type Socket,
} from "node:net";
import { join } from "node:path";
import { DEFAULT_CONFIG_DIR } from "../config/loader";
import {
	type DaemonState,
	IPC_PROTOCOL_VERSION,
	type IPCCommand,
	IPCCommandSchema,
	type IPCMessage,
} from "../shared/ipc-types";
import { AppError } from "../utils/errors";
import { logger } from "../utils/logger";

export const DEFAULT_SOCKET_PATH = join(DEFAULT_CONFIG_DIR, "daemon.sock");

/** Longest unterminated line a client may hold before it is dropped. */
export const MAX_PENDING_LINE = 64 * 1024;

export type IPCServerEvents = {
	clientConnected: [clientId: number];
	clientDisconnected: [clientId: number];
	command: [command: IPCCommand, clientId: number];
};

export class IPCServer extends EventEmitter<IPCServerEvents> {
	private server: Server | null = null;
	private clients: Map<number, Socket> = new Map();
	private clientIdCounter = 0;
	private currentState: DaemonState | null = null;

	constructor(public readonly socketPath: string = DEFAULT_SOCKET_PATH) {
		super();
	}

	get clientCount(): number {
		return this.clients.size;
	}

	private async checkAndCleanStaleSocket(): Promise<boolean> {
		if (!existsSync(this.socketPath)) {
			return false;
		}

		return new Promise((resolve) => {
			const testClient = createConnection({ path: this.socketPath });
			const timeout = setTimeout(() => {
				testClient.destroy();
				this.cleanupSocketFile();
				resolve(true);
			}, 1000);

			testClient.on("connect", () => {
				clearTimeout(timeout);
				testClient.destroy();
				resolve(false);
			});

			testClient.on("error", (err: NodeJS.ErrnoException) => {
				clearTimeout(timeout);
				testClient.destroy();
				logger.debug({ code: err.code }, "Existing socket is not accepting connections");
				this.cleanupSocketFile();
				resolve(true);
			});
		});
	}

	private cleanupSocketFile(): void {
		try {
			if (existsSync(this.socketPath)) {
				unlinkSync(this.socketPath);
				logger.debug({ path: this.socketPath }, "Cleaned up stale socket file");
			}
		} catch (err) {
			logger.warn({ err, path: this.socketPath }, "Failed to cleanup socket file");
		}
	}

	async start(): Promise<void> {
		const wasStale = await this.checkAndCleanStaleSocket();

		if (existsSync(this.socketPath) && !wasStale) {
			throw new AppError("BUSY", "Another daemon instance is already running", {
				socketPath: this.socketPath,
			});
		}

		return new Promise((resolve, reject) => {
			const server = createServer((socket) => {
				this.handleClientConnection(socket);
			});
			this.server = server;

			server.on("error", (err: NodeJS.ErrnoException) => {
				if (err.code === "EADDRINUSE") {
					reject(new AppError("BUSY", "Socket address already in use"));
				} else {
					logger.error({ err }, "IPC server error");
					reject(err);
				}
			});

			server.listen(this.socketPath, () => {
				logger.info({ path: this.socketPath }, "IPC server started");
				resolve();
			});
		});
	}

	async stop(): Promise<void> {
		for (const [clientId, socket] of this.clients) {
			socket.destroy();
			logger.debug({ clientId }, "Closed client connection");
		}
		this.clients.clear();

		const server = this.server;
		if (!server) return;
		this.server = null;

		return new Promise((resolve) => {
			server.close(() => {
				this.cleanupSocketFile();
				logger.info("IPC server stopped");
				resolve();
			});
		});
	}

	private handleClientConnection(socket: Socket): void {
		const clientId = ++this.clientIdCounter;
		this.clients.set(clientId, socket);

		logger.debug({ clientId }, "IPC client connected");
		this.emit("clientConnected", clientId);

		this.sendToClient(clientId, {
			type: "hello",
			version: IPC_PROTOCOL_VERSION,
			state: this.currentState,
		});
		if (this.currentState) {
			this.sendToClient(clientId, { type: "state", ...this.currentState });
		}

		// Decoded by the socket so characters split across chunks stay whole
		socket.setEncoding("utf8");
		let buffer = "";
		socket.on("data", (data: Buffer | string) => {
			buffer += typeof data === "string" ? data : data.toString("utf8");
			const lines = buffer.split("\n");
			buffer = lines.pop() ?? "";
			for (const line of lines) {
				if (line.trim()) this.handleLine(clientId, line);
			}
			if (buffer.length > MAX_PENDING_LINE) {
				logger.warn({ clientId, pending: buffer.length }, "IPC line too long, dropping client");
				buffer = "";
				socket.destroy();
			}
		});

		socket.on("close", () => {
			this.clients.delete(clientId);
			logger.debug({ clientId }, "IPC client disconnected");
			this.emit("clientDisconnected", clientId);
		});

		socket.on("error", (err) => {
			logger.warn({ clientId, err }, "IPC client error");
			this.clients.delete(clientId);
		});
	}

	private handleLine(clientId: number, line: string): void {
		let payload: unknown;
		try {
			payload = JSON.parse(line);
		} catch {
			logger.debug({ clientId }, "Ignoring malformed IPC line");
			return;
		}

		const result = IPCCommandSchema.safeParse(payload);
		if (!result.success) {
			logger.debug(
				{ clientId, issues: result.error.issues.map((issue) => issue.message) },
				"Ignoring invalid IPC command",
			);
			return;
		}

		logger.debug({ clientId, command: result.data.command }, "Received IPC command");
		this.emit("command", result.data, clientId);
	}

	private sendToClient(clientId: number, message: IPCMessage): boolean {
		const socket = this.clients.get(clientId);
		if (!socket || socket.destroyed) {
			this.clients.delete(clientId);
			return false;
		}

		try {
			socket.write(`${JSON.stringify(message)}\n`);
			return true;
		} catch (err) {
			logger.warn({ clientId, err }, "Failed to send message to client");
			this.clients.delete(clientId);
			return false;
		}
	}

	broadcast(message: IPCMessage): void {
		let successCount = 0;
		for (const clientId of [...this.clients.keys()]) {
			if (this.sendToClient(clientId, message)) {
				successCount++;
			}
		}

		if (this.clients.size > 0) {
			logger.debug(
				{ type: message.type, clients: successCount },
				"Broadcast to clients",
			);
		}
	}

	broadcastState(state: DaemonState): void {
		this.currentState = state;
		this.broadcast({ type: "state", ...state });
	}
}
