import WebSocket from "ws";

export type RawMessage = Buffer | ArrayBuffer | Buffer[];

export const SOCKET_OPEN = WebSocket.OPEN;

/**
 * The part of a `ws` client the connection manager uses. Tests supply an
 * in-process implementation through {@link SocketFactory}.
 */
export interface ChannelSocket {
	readonly readyState: number;
	send(data: string, cb?: (err?: Error) => void): void;
	close(code?: number, reason?: string): void;
	terminate(): void;
	on(event: "open", listener: () => void): this;
	on(
		event: "message",
		listener: (data: RawMessage, isBinary: boolean) => void,
	): this;
	on(event: "close", listener: (code: number, reason: Buffer) => void): this;
	on(event: "error", listener: (error: Error) => void): this;
	removeAllListeners(): this;
}

export type SocketFactory = (url: string) => ChannelSocket;

export const createWsSocket: SocketFactory = (url) =>
	new WebSocket(url, { handshakeTimeout: 5000 });

export const rawToText = (data: RawMessage): string => {
	if (Array.isArray(data)) return Buffer.concat(data).toString("utf-8");
	if (data instanceof ArrayBuffer) return Buffer.from(data).toString("utf-8");
	return data.toString("utf-8");
};
