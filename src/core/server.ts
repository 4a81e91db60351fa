/**
 * Core server module.
 *
 * `MudServer` owns the TCP listener. Each accepted socket becomes a
 * {@link Connection}, announced with a `connection` event. Addresses that
 * already hold the maximum number of connections are told so and dropped
 * before a `Connection` exists.
 *
 * ```ts
 * const server = new MudServer({ maxConnectionsPerIp: 5 });
 * server.on("connection", (connection) => handle(connection));
 * await server.start(4000, "0.0.0.0");
 * ```
 *
 * @module core/server
 */
import { EventEmitter } from "events";
import { createServer, type AddressInfo, type Server, type Socket } from "net";
import logger from "../utils/logger.js";
import { Connection, type Transport } from "./connection.js";
import { LINEBREAK } from "./telnet.js";

export const TOO_MANY_CONNECTIONS = "Too many connections from your IP address.";

export interface MudServerOptions {
	/** 0 means unlimited. */
	maxConnectionsPerIp?: number;
	/** Passed to every connection. */
	readTimeoutMs?: number;
}

export class MudServer extends EventEmitter {
	private readonly server: Server;
	private readonly connections = new Set<Connection>();
	private readonly perAddress = new Map<string, number>();
	private readonly maxConnectionsPerIp: number;
	private readonly readTimeoutMs?: number;
	private isListening = false;

	constructor(options: MudServerOptions = {}) {
		super();
		this.maxConnectionsPerIp = options.maxConnectionsPerIp ?? 0;
		this.readTimeoutMs = options.readTimeoutMs;
		this.server = createServer((socket: Socket) => {
			socket.setNoDelay(true);
			this.accept(socket);
		});
		this.server.on("error", (error: Error) => {
			logger.error(`Server error: ${error.message}`);
			if (this.listenerCount("error") > 0) this.emit("error", error);
		});
		this.server.on("close", () => {
			this.isListening = false;
			logger.info("MUD server closed");
		});
	}

	public on(event: "connection", listener: (connection: Connection) => void): this;
	public on(event: "disconnection", listener: (connection: Connection) => void): this;
	public on(event: "error", listener: (err: Error) => void): this;
	public on(event: string, listener: ((connection: Connection) => void) | ((err: Error) => void)): this {
		return super.on(event, listener);
	}

	public once(event: "connection", listener: (connection: Connection) => void): this;
	public once(event: "disconnection", listener: (connection: Connection) => void): this;
	public once(event: "error", listener: (err: Error) => void): this;
	public once(event: string, listener: ((connection: Connection) => void) | ((err: Error) => void)): this {
		return super.once(event, listener);
	}

	public emit(event: "connection", connection: Connection): boolean;
	public emit(event: "disconnection", connection: Connection): boolean;
	public emit(event: "error", err: Error): boolean;
	public emit(event: string, ...args: unknown[]): boolean {
		return super.emit(event, ...args);
	}

	/**
	 * Take ownership of a transport. Used by the listener for every socket;
	 * tests feed in-memory transports through it directly.
	 *
	 * @returns the new connection, or undefined when the address is over its cap
	 */
	public accept(transport: Transport): Connection | undefined {
		const address = transport.remoteAddress ?? "unknown";
		const count = this.perAddress.get(address) ?? 0;
		if (this.maxConnectionsPerIp > 0 && count >= this.maxConnectionsPerIp) {
			logger.warn(
				`Rejecting connection from ${address}: ${count} already open`
			);
			transport.write(`${TOO_MANY_CONNECTIONS}${LINEBREAK}`, () =>
				transport.destroy()
			);
			return undefined;
		}

		const connection = new Connection(transport, {
			readTimeoutMs: this.readTimeoutMs,
		});
		this.connections.add(connection);
		this.perAddress.set(address, count + 1);
		connection.once("close", () => this.release(connection));

		logger.info(
			`Client connected: ${connection.address} (${this.connections.size} total)`
		);
		this.emit("connection", connection);
		return connection;
	}

	private release(connection: Connection): void {
		if (!this.connections.delete(connection)) return;
		const remaining = (this.perAddress.get(connection.address) ?? 1) - 1;
		if (remaining > 0) this.perAddress.set(connection.address, remaining);
		else this.perAddress.delete(connection.address);
		logger.info(
			`Client disconnected: ${connection.address} (${this.connections.size} remaining)`
		);
		this.emit("disconnection", connection);
	}

	/**
	 * Start the server on the specified port
	 * @param port The port number to listen on (0 picks a free one)
	 * @param host Optional host to bind to
	 */
	public start(port: number, host?: string): Promise<void> {
		return new Promise((resolve, reject) => {
			if (this.isListening) {
				reject(new Error("Server is already listening"));
				return;
			}
			const onError = (error: Error) => reject(error);
			this.server.once("error", onError);
			this.server.listen(port, host, () => {
				this.server.removeListener("error", onError);
				this.isListening = true;
				logger.info(`MUD server listening on ${host ?? "*"}:${this.getPort()}`);
				resolve();
			});
		});
	}

	/**
	 * Close every connection and stop listening. Resolves immediately when
	 * the server is not listening.
	 */
	public stop(): Promise<void> {
		for (const connection of this.connections) connection.close();
		return new Promise((resolve, reject) => {
			if (!this.isListening) {
				resolve();
				return;
			}
			this.server.close((err) => {
				if (err) reject(err);
				else resolve();
			});
		});
	}

	public getConnections(): Connection[] {
		return Array.from(this.connections);
	}

	public getConnectionCount(): number {
		return this.connections.size;
	}

	public getConnectionCountFor(address: string): number {
		return this.perAddress.get(address) ?? 0;
	}

	/**
	 * @returns the bound port, or undefined if the server isn't listening
	 */
	public getPort(): number | undefined {
		const address: AddressInfo | string | null = this.server.address();
		return address && typeof address === "object" ? address.port : undefined;
	}

	public isRunning(): boolean {
		return this.isListening;
	}
}
