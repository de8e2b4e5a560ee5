import { EventEmitter } from "node:events";
import type { ChannelSocket } from "../../src/daemon/socket";

type Reply = Record<string, unknown> | string;

/**
 * In-process stand-in for a `ws` client. Tests drive the lifecycle with
 * {@link open}, {@link receive} and {@link drop}.
 */
export class FakeSocket extends EventEmitter implements ChannelSocket {
	public readyState = 0;
	public readonly sent: string[] = [];
	public terminated = false;
	/** Answers an outbound message, e.g. a pong for every ping. */
	public respond: ((message: { type: string }) => Reply | undefined) | null = null;

	constructor(public readonly url = "ws://test") {
		super();
	}

	public send(data: string, cb?: (err?: Error) => void): void {
		this.sent.push(data);
		cb?.();
		const reply = this.respond?.(JSON.parse(data));
		if (reply !== undefined) {
			queueMicrotask(() => this.receive(reply));
		}
	}

	public close(): void {
		this.drop(1000, "closed");
	}

	public terminate(): void {
		this.terminated = true;
		this.readyState = 3;
	}

	public open(): void {
		this.readyState = 1;
		this.emit("open");
	}

	public receive(message: Reply): void {
		const text = typeof message === "string" ? message : JSON.stringify(message);
		this.emit("message", Buffer.from(text), false);
	}

	public drop(code = 1006, reason = ""): void {
		this.readyState = 3;
		this.emit("close", code, Buffer.from(reason));
	}

	public sentTypes(): string[] {
		return this.sent.map((payload) => {
			const parsed: unknown = JSON.parse(payload);
			return typeof parsed === "object" && parsed !== null && "type" in parsed
				? String(parsed.type)
				: "";
		});
	}
}

export const createSocketFactory = () => {
	const sockets: FakeSocket[] = [];
	const factory = (url: string) => {
		const socket = new FakeSocket(url);
		sockets.push(socket);
		return socket;
	};
	const last = (): FakeSocket => {
		const socket = sockets[sockets.length - 1];
		if (!socket) throw new Error("no socket created yet");
		return socket;
	};
	return { sockets, factory, last };
};
