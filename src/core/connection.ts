/**
 * Connection module - line-oriented telnet I/O for one client.
 *
 * A `Connection` owns one transport (a `net.Socket` in production, an
 * in-memory stand-in in tests) and turns its byte stream into lines:
 *
 * - Telnet IAC sequences are filtered out before line assembly.
 * - Bytes are consumed one at a time. CR or LF completes a line, BS/DEL
 *   erase the last character, Ctrl-C cancels the read.
 * - The server owns echo: printable bytes are echoed back unless the caller
 *   asked for a silent read (`readPassword()`).
 * - Bytes that arrive while nobody is reading are queued, so type-ahead is
 *   delivered in order. The queue holds at most `MAX_QUEUED_BYTES`.
 *
 * Outgoing text has its color tags rendered and its line endings normalized
 * to CR+LF. Transport failures never escape `send()`: they mark the
 * connection closed and later calls become no-ops.
 *
 * ```ts
 * const connection = new Connection(socket);
 * await connection.negotiate();
 * await connection.sendLine("What is your name?");
 * const name = await connection.readLine();
 * ```
 *
 * @module core/connection
 */
import { EventEmitter } from "events";
import { randomUUID } from "crypto";
import logger, { describeError } from "../utils/logger.js";
import { colorize } from "./color.js";
import {
	CONTROL,
	ERASE_SEQUENCE,
	IAC,
	LINEBREAK,
	TELNET_OPTION,
	buildIACCommand,
	normalizeLineEndings,
} from "./telnet.js";
import type { Session } from "./session.js";

/** Inactivity limit for a single `readLine()` call. */
export const DEFAULT_READ_TIMEOUT_MS = 5 * 60 * 1000;

/** Bytes kept for one line; anything past this is dropped. */
export const MAX_LINE_LENGTH = 1024;

/** Type-ahead kept while no read is pending; anything past this is dropped. */
export const MAX_QUEUED_BYTES = 8 * MAX_LINE_LENGTH;

export type ConnectionErrorReason =
	| "timeout"
	| "closed"
	| "interrupted"
	| "reset"
	| "busy";

/**
 * Raised by reads that cannot complete. Always terminal for the connection
 * except for `busy`, which only rejects the second of two concurrent reads.
 */
export class ConnectionError extends Error {
	readonly reason: ConnectionErrorReason;

	constructor(reason: ConnectionErrorReason, message: string) {
		super(message);
		this.name = "ConnectionError";
		this.reason = reason;
	}
}

/**
 * The slice of `net.Socket` a connection needs.
 */
export interface Transport {
	readonly remoteAddress?: string;
	readonly destroyed: boolean;
	write(
		data: string | Uint8Array,
		callback?: (error?: Error | null) => void
	): boolean;
	destroy(): void;
	on(event: "data", listener: (chunk: Buffer) => void): this;
	on(event: "close", listener: () => void): this;
	on(event: "error", listener: (error: Error) => void): this;
}

export interface ConnectionOptions {
	/** Overrides `DEFAULT_READ_TIMEOUT_MS`. */
	readTimeoutMs?: number;
}

interface PendingRead {
	echo: boolean;
	resolve: (line: string) => void;
	reject: (error: ConnectionError) => void;
	timer: NodeJS.Timeout;
}

enum TELNET_STATE {
	DATA,
	IAC,
	OPTION,
	SUBNEGOTIATION,
	SUBNEGOTIATION_IAC,
}

export class Connection extends EventEmitter {
	readonly id: string = randomUUID();
	readonly address: string;
	readonly connectedAt: Date = new Date();
	/** Set by the session registry when a session is bound. */
	session?: Session;

	private readonly transport: Transport;
	private readonly readTimeoutMs: number;
	private closed = false;
	private inbound: number[] = [];
	/** Bytes of the current chunk that did not fit in `inbound`. */
	private dropped = 0;
	private lineBuffer: number[] = [];
	private telnetState = TELNET_STATE.DATA;
	/** A CR completed the last line; a following LF or NUL is part of it. */
	private swallowLineFeed = false;
	private pending?: PendingRead;
	/** Resolvers of writes the transport has not acknowledged yet. */
	private readonly unacknowledged = new Set<() => void>();

	constructor(transport: Transport, options: ConnectionOptions = {}) {
		super();
		this.transport = transport;
		this.address = transport.remoteAddress ?? "unknown";
		this.readTimeoutMs = options.readTimeoutMs ?? DEFAULT_READ_TIMEOUT_MS;

		transport.on("data", (chunk: Buffer) => this.handleData(chunk));
		transport.on("close", () =>
			this.markClosed("reset", "Connection lost")
		);
		transport.on("error", (error: Error) => {
			logger.warn(`Transport error on ${this}: ${error.message}`);
			this.markClosed("reset", `Connection lost: ${error.message}`);
		});

		logger.debug(`Connection created: ${this}`);
	}

	public on(event: "close", listener: () => void): this;
	public on(event: string, listener: (...args: unknown[]) => void): this {
		return super.on(event, listener);
	}

	public once(event: "close", listener: () => void): this;
	public once(event: string, listener: (...args: unknown[]) => void): this {
		return super.once(event, listener);
	}

	public emit(event: "close"): boolean;
	public emit(event: string, ...args: unknown[]): boolean {
		return super.emit(event, ...args);
	}

	toString(): string {
		return `{connection ${this.id.slice(0, 8)}@${this.address}}`;
	}

	public isClosed(): boolean {
		return this.closed;
	}

	/**
	 * Tell the client the server will echo and suppress go-ahead, which puts
	 * conforming clients into character-at-a-time mode.
	 */
	public negotiate(): Promise<void> {
		return this.write(
			Buffer.concat([
				buildIACCommand(IAC.WILL, TELNET_OPTION.ECHO),
				buildIACCommand(IAC.WILL, TELNET_OPTION.SGA),
			])
		);
	}

	/**
	 * Send text to the client. Color tags are rendered and bare `\n` becomes
	 * `\r\n`. Resolves once the transport has taken the bytes or the
	 * connection has closed; never rejects.
	 */
	public send(text: string): Promise<void> {
		if (this.closed) {
			logger.debug(`Send on closed connection ${this} ignored`);
			return Promise.resolve();
		}
		return this.write(normalizeLineEndings(colorize(text)));
	}

	/**
	 * Send a line of text to the client (adds a line break).
	 */
	public sendLine(text: string): Promise<void> {
		return this.send(`${text}\n`);
	}

	/**
	 * Read the next complete line, trimmed.
	 *
	 * @param echo - echo typed characters back to the client
	 * @throws ConnectionError on timeout, interrupt, transport loss, or when
	 * the connection is already closed
	 */
	public readLine(echo = true): Promise<string> {
		if (this.closed) {
			return Promise.reject(
				new ConnectionError("closed", "Connection is closed")
			);
		}
		if (this.pending) {
			return Promise.reject(
				new ConnectionError("busy", "A read is already pending")
			);
		}
		return new Promise<string>((resolve, reject) => {
			const timer = setTimeout(() => {
				logger.info(`Read timeout on ${this}`);
				this.failRead(new ConnectionError("timeout", "Read timeout"));
				this.close();
			}, this.readTimeoutMs);
			this.pending = { echo, resolve, reject, timer };
			this.processInbound();
		});
	}

	/**
	 * `readLine()` without echo, for credentials.
	 */
	public readPassword(): Promise<string> {
		return this.readLine(false);
	}

	/**
	 * Close the transport. Safe to call any number of times.
	 */
	public close(): void {
		if (!this.transport.destroyed) {
			try {
				this.transport.destroy();
			} catch (error) {
				logger.warn(`Failed to destroy transport for ${this}`, {
					error: describeError(error),
				});
			}
		}
		this.markClosed("closed", "Connection closed");
	}

	private markClosed(reason: ConnectionErrorReason, message: string): void {
		if (this.closed) return;
		this.closed = true;
		this.inbound = [];
		this.lineBuffer = [];
		this.failRead(new ConnectionError(reason, message));
		for (const release of this.unacknowledged) release();
		this.unacknowledged.clear();
		logger.info(`Connection closed: ${this} (${reason})`);
		this.emit("close");
	}

	private write(data: string | Uint8Array): Promise<void> {
		if (this.closed) return Promise.resolve();
		return new Promise<void>((resolve) => {
			const release = () => {
				this.unacknowledged.delete(release);
				resolve();
			};
			this.unacknowledged.add(release);
			try {
				this.transport.write(data, (error) => {
					if (error) {
						logger.warn(`Send failed on ${this}: ${error.message}`);
						this.markClosed("reset", `Send failed: ${error.message}`);
					}
					release();
				});
			} catch (error) {
				logger.warn(`Send failed on ${this}`, { error: describeError(error) });
				this.markClosed("reset", "Send failed");
				release();
			}
		});
	}

	private failRead(error: ConnectionError): void {
		const pending = this.pending;
		if (!pending) return;
		this.pending = undefined;
		clearTimeout(pending.timer);
		pending.reject(error);
	}

	private handleData(chunk: Buffer): void {
		if (this.closed) return;
		this.dropped = 0;
		for (const byte of chunk) {
			switch (this.telnetState) {
				case TELNET_STATE.DATA:
					if (byte === IAC.IAC) this.telnetState = TELNET_STATE.IAC;
					else this.enqueue(byte);
					break;
				case TELNET_STATE.IAC:
					if (byte === IAC.IAC) {
						// escaped 0xff is data
						this.enqueue(byte);
						this.telnetState = TELNET_STATE.DATA;
					} else if (
						byte === IAC.WILL ||
						byte === IAC.WONT ||
						byte === IAC.DO ||
						byte === IAC.DONT
					) {
						this.telnetState = TELNET_STATE.OPTION;
					} else if (byte === IAC.SB) {
						this.telnetState = TELNET_STATE.SUBNEGOTIATION;
					} else {
						this.telnetState = TELNET_STATE.DATA;
					}
					break;
				case TELNET_STATE.OPTION:
					this.telnetState = TELNET_STATE.DATA;
					break;
				case TELNET_STATE.SUBNEGOTIATION:
					if (byte === IAC.IAC)
						this.telnetState = TELNET_STATE.SUBNEGOTIATION_IAC;
					break;
				case TELNET_STATE.SUBNEGOTIATION_IAC:
					this.telnetState =
						byte === IAC.SE
							? TELNET_STATE.DATA
							: TELNET_STATE.SUBNEGOTIATION;
					break;
			}
		}
		this.processInbound();
		if (this.dropped > 0) {
			logger.warn(`Input queue full on ${this}; dropped ${this.dropped} byte(s)`);
		}
	}

	private enqueue(byte: number): void {
		// let a pending read drain the queue before giving up on the byte
		if (this.inbound.length >= MAX_QUEUED_BYTES) this.processInbound();
		if (this.closed) return;
		if (this.inbound.length >= MAX_QUEUED_BYTES) {
			this.dropped++;
			return;
		}
		this.inbound.push(byte);
	}

	/**
	 * Feed queued bytes into the pending read until it completes or the
	 * queue runs dry.
	 */
	private processInbound(): void {
		while (this.pending && this.inbound.length > 0) {
			const pending = this.pending;
			const byte = this.inbound.shift();
			if (byte === undefined) break;

			if (this.swallowLineFeed) {
				this.swallowLineFeed = false;
				if (byte === CONTROL.LF || byte === CONTROL.NUL) continue;
			}

			switch (byte) {
				case CONTROL.CR:
					this.swallowLineFeed = true;
					this.completeLine(pending);
					break;
				case CONTROL.LF:
					this.completeLine(pending);
					break;
				case CONTROL.BS:
				case CONTROL.DEL:
					this.erase(pending);
					break;
				case CONTROL.ETX:
					logger.info(`Read interrupted on ${this}`);
					this.failRead(new ConnectionError("interrupted", "Read cancelled"));
					this.close();
					return;
				default:
					if (byte < CONTROL.PRINTABLE) break;
					if (this.lineBuffer.length >= MAX_LINE_LENGTH) break;
					this.lineBuffer.push(byte);
					if (pending.echo) void this.write(Buffer.from([byte]));
			}
		}
	}

	private erase(pending: PendingRead): void {
		if (this.lineBuffer.length === 0) return;
		// drop UTF-8 continuation bytes along with their lead byte
		let byte = this.lineBuffer.pop();
		while (byte !== undefined && (byte & 0xc0) === 0x80) {
			byte = this.lineBuffer.pop();
		}
		if (pending.echo) void this.write(ERASE_SEQUENCE);
	}

	private completeLine(pending: PendingRead): void {
		const line = Buffer.from(this.lineBuffer).toString("utf8").trim();
		this.lineBuffer = [];
		this.pending = undefined;
		clearTimeout(pending.timer);
		void this.write(LINEBREAK);
		pending.resolve(line);
	}
}
