/**
 * In-process stand-ins used by the test suites: a transport that records
 * what the server writes and lets a test type bytes at it, and helpers that
 * build an engine with a small world and a memory-only store.
 *
 * @module utils/testing
 */
import { EventEmitter } from "events";
import { Connection, type ConnectionOptions, type Transport } from "../core/connection.js";
import { Room } from "../core/room.js";
import { SESSION_STATE, type Session } from "../core/session.js";
import { hashPassword, type CharacterRecord } from "../core/store.js";
import { IAC } from "../core/telnet.js";
import { stripAnsi } from "../core/telnet.js";
import { World } from "../core/world.js";
import { Engine, type EngineOptions } from "../engine.js";
import { YamlStore } from "../package/accounts.js";
import { loadCommands } from "../package/commands.js";

export const TEST_PASSWORD = "test-secret";
export const TEST_SALT = "test-salt";

export class FakeTransport extends EventEmitter implements Transport {
	readonly remoteAddress: string;
	destroyed = false;
	/** Make every later write fail. */
	failWrites = false;
	/** Record later writes but never acknowledge them, like a peer that stopped reading. */
	stallWrites = false;
	private readonly chunks: Buffer[] = [];

	constructor(remoteAddress = "127.0.0.1") {
		super();
		this.remoteAddress = remoteAddress;
	}

	write(
		data: string | Uint8Array,
		callback?: (error?: Error | null) => void
	): boolean {
		if (this.destroyed || this.failWrites) {
			const error = new Error("write EPIPE");
			queueMicrotask(() => callback?.(error));
			return false;
		}
		this.chunks.push(
			typeof data === "string" ? Buffer.from(data, "utf8") : Buffer.from(data)
		);
		if (this.stallWrites) return false;
		queueMicrotask(() => callback?.(null));
		return true;
	}

	destroy(): void {
		if (this.destroyed) return;
		this.destroyed = true;
		setImmediate(() => this.emit("close"));
	}

	/** Deliver text from the client side. */
	type(text: string): void {
		this.emit("data", Buffer.from(text, "utf8"));
	}

	/** Deliver raw bytes from the client side. */
	receive(bytes: readonly number[]): void {
		this.emit("data", Buffer.from(bytes));
	}

	/** Everything written so far, raw. */
	bytes(): Buffer {
		return Buffer.concat(this.chunks);
	}

	/** Written text with telnet commands and ANSI sequences removed. */
	text(): string {
		const kept: number[] = [];
		const bytes = this.bytes();
		for (let i = 0; i < bytes.length; i++) {
			if (bytes[i] === IAC.IAC) {
				i += 2;
				continue;
			}
			kept.push(bytes[i]);
		}
		return stripAnsi(Buffer.from(kept).toString("utf8"));
	}

	/** `text()` split on CR+LF. A trailing partial line is kept. */
	lines(): string[] {
		const text = this.text();
		const lines = text.split("\r\n");
		if (lines[lines.length - 1] === "") lines.pop();
		return lines;
	}

	clear(): void {
		this.chunks.length = 0;
	}
}

/**
 * Let pending callbacks and promise chains run.
 */
export function flush(): Promise<void> {
	return new Promise((resolve) => setImmediate(resolve));
}

/**
 * Poll until `check` passes.
 */
export async function waitFor(
	check: () => boolean,
	timeoutMs = 2000
): Promise<void> {
	const started = Date.now();
	while (!check()) {
		if (Date.now() - started > timeoutMs) {
			throw new Error("Timed out waiting for condition");
		}
		await flush();
	}
}

/**
 * Three rooms: square (north to gate, east to bakery), gate and bakery.
 */
export function buildTestWorld(): World {
	const world = new World();
	world.addRoom(
		new Room({
			id: "square",
			name: "Town Square",
			area: "town",
			description: "A cobbled square.",
			exits: { north: "gate", east: "bakery" },
		})
	);
	world.addRoom(
		new Room({
			id: "gate",
			name: "Town Gate",
			area: "town",
			description: "A heavy gate.",
			exits: { south: "square" },
		})
	);
	world.addRoom(
		new Room({
			id: "bakery",
			name: "The Bakery",
			area: "town",
			description: "Warm bread.",
			exits: { west: "square" },
		})
	);
	return world;
}

/**
 * A started engine with the built-in commands, the test world and a
 * memory-only store. Nothing is bound to a port. Call `stop()` when done.
 */
export async function createTestEngine(
	options: Partial<EngineOptions> = {}
): Promise<Engine> {
	const engine = new Engine({
		store: new YamlStore(),
		world: buildTestWorld(),
		commands: await loadCommands(),
		listen: false,
		tickIntervalMs: 60_000,
		commandRateLimit: 0,
		passwordSalt: TEST_SALT,
		gameName: "Test MUD",
		startingRoom: "square",
		...options,
	});
	await engine.start();
	return engine;
}

export interface TestClient {
	transport: FakeTransport;
	connection: Connection;
	session: Session;
}

/**
 * A session on a fake transport, outside the per-connection loop, so tests
 * can call `processCommand` directly.
 */
export function connect(
	engine: Engine,
	address = "127.0.0.1",
	options: ConnectionOptions = {}
): TestClient {
	const transport = new FakeTransport(address);
	const connection = new Connection(transport, options);
	const session = engine.sessions.createSession(connection);
	return { transport, connection, session };
}

export interface PlayingClient extends TestClient {
	character: CharacterRecord;
}

/**
 * Register an account and a character called `name` and put it in the
 * world. The transport starts out empty.
 */
export async function joinAs(
	engine: Engine,
	name: string,
	roomId = "square"
): Promise<PlayingClient> {
	const client = connect(engine);
	const user = await engine.store.createUser({
		name,
		passwordHash: hashPassword(TEST_PASSWORD, engine.passwordSalt),
	});
	if (!user.ok) throw new Error(user.reason);
	const character = await engine.store.createCharacter({
		userId: user.value.id,
		name,
		roomId,
	});
	if (!character.ok) throw new Error(character.reason);
	client.session.setUser(user.value.id);
	client.session.setState(SESSION_STATE.AUTHENTICATING);
	if (!engine.enterWorld(client.session, character.value)) {
		throw new Error(`${name} could not enter the world`);
	}
	client.transport.clear();
	return { ...client, character: character.value };
}
