/**
 * Engine - the central coordinator.
 *
 * Owns the world, the session registry, the command registry, the listener
 * and the tick loop, plus the index of which session plays which character.
 * Every connection gets its own async loop (`handleConnection`) that shows a
 * prompt, reads a line and hands it to {@link Engine.processCommand}. Because
 * each loop awaits the command before reading again, commands from one
 * connection run strictly in order.
 *
 * Shared state (world, character index) is only changed synchronously
 * between awaits, so no locking is needed on the single event loop.
 *
 * ```ts
 * const engine = new Engine({ store: await YamlStore.open() });
 * await engine.start();
 * process.once("SIGINT", () => engine.stop());
 * ```
 *
 * @module engine
 */
import logger, { describeError } from "./utils/logger.js";
import { CONFIG } from "./registry/config.js";
import { SessionRegistry } from "./registry/session.js";
import { COLOR, color } from "./core/color.js";
import { CommandRegistry, type Command, type CommandContext } from "./core/command.js";
import { ConnectionError, type Connection } from "./core/connection.js";
import { MudServer } from "./core/server.js";
import { SESSION_STATE, type Session } from "./core/session.js";
import { TickLoop, type TickCallback } from "./core/tick.js";
import { World } from "./core/world.js";
import type { Room } from "./core/room.js";
import type { CharacterRecord, Store } from "./core/store.js";
import { loadWorld, ROOMS_DIRECTORY } from "./package/world.js";
import { loadCommands } from "./package/commands.js";

export const MESSAGE = {
	UNKNOWN_COMMAND: (verb: string) =>
		`Unknown command: ${verb}. Type 'help' for a list of commands.`,
	NEEDS_CHARACTER: "You must be playing a character to use that command.",
	USAGE: (usage: string) => `Usage: ${usage}`,
	SLOW_DOWN: "Slow down!",
	COMMAND_FAILED: "Something went wrong. Please try again.",
	SHUTDOWN: "Server is shutting down. Goodbye!",
	IDLE: "You have been idle too long. Goodbye!",
} as const;

export const PROMPT = {
	LOGIN: "(Login) > ",
	CHARACTER_SELECT: "(Character Select) > ",
	PLAYING: "> ",
} as const;

const RATE_WINDOW_MS = 1000;

/** How long a goodbye may take before the connection is closed anyway. */
export const DEFAULT_NOTICE_TIMEOUT_MS = 2000;

export interface EngineOptions {
	store: Store;
	/** Use this world instead of loading `roomsDirectory`. */
	world?: World;
	roomsDirectory?: string;
	/** Register these instead of the built-in command set. */
	commands?: readonly Command[];
	/** Bind the TCP listener on start. Defaults to true. */
	listen?: boolean;
	host?: string;
	port?: number;
	maxConnectionsPerIp?: number;
	sessionTimeoutMinutes?: number;
	tickIntervalMs?: number;
	readTimeoutMs?: number;
	/** Commands per connection per second; 0 disables the limit. */
	commandRateLimit?: number;
	/** Overrides `DEFAULT_NOTICE_TIMEOUT_MS`. */
	noticeTimeoutMs?: number;
	passwordSalt?: string;
	gameName?: string;
	startingRoom?: string;
}

export class Engine {
	readonly store: Store;
	readonly sessions = new SessionRegistry();
	readonly commands = new CommandRegistry();
	readonly server: MudServer;
	readonly ticks: TickLoop;
	readonly gameName: string;
	readonly startingRoom: string;
	readonly passwordSalt: string;
	readonly sessionTimeoutMinutes: number;
	private _world: World;
	private readonly options: EngineOptions;
	private readonly commandRateLimit: number;
	private readonly noticeTimeoutMs: number;
	private readonly characterSessions = new Map<string, Session>();
	private readonly characters = new Map<string, CharacterRecord>();
	private readonly recentCommands = new WeakMap<Session, number[]>();
	private running = false;

	constructor(options: EngineOptions) {
		this.options = options;
		this.store = options.store;
		this.gameName = options.gameName ?? CONFIG.game.name;
		this.startingRoom = options.startingRoom ?? CONFIG.game.starting_room;
		this.passwordSalt = options.passwordSalt ?? CONFIG.security.password_salt;
		this.sessionTimeoutMinutes =
			options.sessionTimeoutMinutes ?? CONFIG.server.session_timeout;
		this.commandRateLimit =
			options.commandRateLimit ?? CONFIG.server.command_rate_limit;
		this.noticeTimeoutMs = options.noticeTimeoutMs ?? DEFAULT_NOTICE_TIMEOUT_MS;
		this._world = options.world ?? new World();
		this.server = new MudServer({
			maxConnectionsPerIp:
				options.maxConnectionsPerIp ?? CONFIG.server.max_connections_per_ip,
			readTimeoutMs: options.readTimeoutMs ?? CONFIG.server.read_timeout * 1000,
		});
		this.ticks = new TickLoop(
			options.tickIntervalMs ?? CONFIG.server.tick_interval * 1000
		);
		this.ticks.register("session-cleanup", () => this.cleanupIdleSessions());
		this.ticks.register("character-save", () => this.saveCharacters());
		this.server.on("connection", (connection) => {
			this.handleConnection(connection).catch((error: unknown) =>
				logger.error(`Connection handler for ${connection} failed`, {
					error: describeError(error),
				})
			);
		});
		this.server.on("error", (error) =>
			logger.error("Listener error", { error: describeError(error) })
		);
	}

	get world(): World {
		return this._world;
	}

	public isRunning(): boolean {
		return this.running;
	}

	/**
	 * Load content, register commands, bind the listener and start ticking.
	 * A failure tears down whatever was started and rethrows.
	 */
	public async start(): Promise<void> {
		if (this.running) return;
		this.running = true;
		try {
			await logger.block("world", async () => {
				if (!this.options.world) {
					this._world = await loadWorld(
						this.options.roomsDirectory ?? ROOMS_DIRECTORY
					);
				}
				if (!this._world.hasRoom(this.startingRoom)) {
					logger.warn(`Starting room ${this.startingRoom} does not exist`);
				}
			});

			await logger.block("commands", async () => {
				if (this.commands.size > 0) return;
				const commands = this.options.commands ?? (await loadCommands());
				for (const command of commands) this.commands.register(command);
				logger.info(`Registered ${this.commands.size} command(s)`);
			});

			if (this.options.listen ?? true) {
				await logger.block("listen", () =>
					this.server.start(
						this.options.port ?? CONFIG.server.port,
						this.options.host ?? CONFIG.server.host
					)
				);
			}

			this.ticks.start();
			logger.info(`${this.gameName} started`);
		} catch (error) {
			logger.error("Engine failed to start", { error: describeError(error) });
			await this.stop();
			throw error;
		}
	}

	/**
	 * Say goodbye to everyone, save characters and close down. Safe to call
	 * more than once and after a failed start.
	 */
	public async stop(): Promise<void> {
		this.ticks.stop();
		const connections = this.server.getConnections();
		await Promise.all(
			connections.map((connection) => this.notify(connection, MESSAGE.SHUTDOWN))
		);
		for (const session of this.sessions.getAllSessions()) {
			await this.leaveWorld(session);
		}
		await this.server.stop();
		if (this.running) logger.info(`${this.gameName} stopped`);
		this.running = false;
	}

	public registerTickCallback(name: string, run: TickCallback): void {
		this.ticks.register(name, run);
	}

	public promptFor(session: Session): string {
		if (session.state === SESSION_STATE.PLAYING) return PROMPT.PLAYING;
		if (session.userId) return PROMPT.CHARACTER_SELECT;
		return PROMPT.LOGIN;
	}

	public banner(): string {
		return [
			color(this.gameName, COLOR.CYAN),
			"",
			"To get started:",
			`  ${color("register <name> <password>", COLOR.YELLOW)} - create a new account`,
			`  ${color("login <name>", COLOR.YELLOW)} - log into an existing account`,
			`Type ${color("help", COLOR.YELLOW)} for a list of commands.`,
		].join("\n");
	}

	/**
	 * Drive one connection until it closes.
	 */
	public async handleConnection(connection: Connection): Promise<void> {
		const session = this.sessions.createSession(connection);
		try {
			await connection.negotiate();
			await connection.sendLine(this.banner());
			while (!connection.isClosed()) {
				await connection.send(this.promptFor(session));
				const line = await connection.readLine();
				await this.processCommand(session, line);
			}
		} catch (error) {
			if (error instanceof ConnectionError) {
				logger.info(`${session} ended: ${error.reason}`);
			} else {
				logger.error(`Loop for ${session} failed`, {
					error: describeError(error),
				});
			}
		} finally {
			await this.disconnect(session);
		}
	}

	/**
	 * Tokenize a line, find its command, check the gates and run it. User
	 * mistakes are answered with one line; handler failures are logged and
	 * answered with a generic apology.
	 *
	 * @throws ConnectionError when a command's read fails
	 */
	public async processCommand(session: Session, rawLine: string): Promise<void> {
		const line = rawLine.trim();
		if (!line) return;
		const connection = session.connection;
		session.touch();

		if (this.isRateLimited(session)) {
			await connection.sendLine(MESSAGE.SLOW_DOWN);
			return;
		}

		let verb: string;
		let argText: string;
		if (line.startsWith("'")) {
			verb = "say";
			argText = line.slice(1).trim();
		} else if (line.startsWith(":")) {
			verb = "emote";
			argText = line.slice(1).trim();
		} else {
			const space = line.search(/\s/);
			verb = (space === -1 ? line : line.slice(0, space)).toLowerCase();
			argText = space === -1 ? "" : line.slice(space).trim();
		}
		const args = argText ? argText.split(/\s+/) : [];

		const command = this.commands.get(verb);
		if (!command) {
			await connection.sendLine(MESSAGE.UNKNOWN_COMMAND(verb));
			return;
		}
		if (command.requiresCharacter && !session.characterId) {
			await connection.sendLine(MESSAGE.NEEDS_CHARACTER);
			return;
		}
		if (args.length < (command.minArgs ?? 0)) {
			await connection.sendLine(MESSAGE.USAGE(command.usage));
			return;
		}

		const context: CommandContext = {
			session,
			connection,
			engine: this,
			args,
			rawInput: line,
			argText,
		};
		try {
			await command.execute(context);
		} catch (error) {
			// the connection is gone; its loop ends the session
			if (error instanceof ConnectionError) throw error;
			logger.error(`Command ${command.name} failed`, {
				sessionId: session.id,
				verb,
				characterId: session.characterId,
				error: describeError(error),
			});
			await connection.sendLine(MESSAGE.COMMAND_FAILED);
		}
	}

	private isRateLimited(session: Session): boolean {
		if (this.commandRateLimit <= 0) return false;
		const now = Date.now();
		const recent = (this.recentCommands.get(session) ?? []).filter(
			(at) => now - at < RATE_WINDOW_MS
		);
		if (recent.length >= this.commandRateLimit) {
			this.recentCommands.set(session, recent);
			logger.warn(`${session} is sending commands too fast`);
			return true;
		}
		recent.push(now);
		this.recentCommands.set(session, recent);
		return false;
	}

	/**
	 * Send a line to every occupant of a room except `excludeSessionId`.
	 * Delivery is not awaited.
	 *
	 * @returns how many sessions the message was sent to
	 */
	public broadcastToRoom(
		roomId: string,
		message: string,
		excludeSessionId?: string
	): number {
		const room = this._world.getRoom(roomId);
		if (!room) return 0;
		let count = 0;
		for (const characterId of room.getOccupants()) {
			const session = this.characterSessions.get(characterId);
			if (!session || session.id === excludeSessionId) continue;
			this.deliver(session, message);
			count++;
		}
		return count;
	}

	/**
	 * Send a line to every session that is playing a character.
	 *
	 * @returns how many sessions the message was sent to
	 */
	public broadcastAll(message: string, excludeSessionId?: string): number {
		let count = 0;
		for (const session of this.characterSessions.values()) {
			if (session.id === excludeSessionId) continue;
			this.deliver(session, message);
			count++;
		}
		return count;
	}

	/**
	 * @returns false when nobody is playing that character
	 */
	public sendToCharacter(characterId: string, message: string): boolean {
		const session = this.characterSessions.get(characterId);
		if (!session) return false;
		this.deliver(session, message);
		return true;
	}

	/**
	 * Send a parting line, giving up after `noticeTimeoutMs` so a client
	 * that has stopped reading cannot hold up the caller.
	 */
	private notify(connection: Connection, message: string): Promise<void> {
		return new Promise((resolve) => {
			const timer = setTimeout(() => {
				logger.warn(`Notice to ${connection} timed out`);
				resolve();
			}, this.noticeTimeoutMs);
			const done = () => {
				clearTimeout(timer);
				resolve();
			};
			connection.sendLine(message).then(done, (error: unknown) => {
				logger.warn(`Notice to ${connection} failed`, {
					error: describeError(error),
				});
				done();
			});
		});
	}

	private deliver(session: Session, message: string): void {
		session.connection.sendLine(message).catch((error: unknown) =>
			logger.warn(`Delivery to ${session} failed`, {
				error: describeError(error),
			})
		);
	}

	/**
	 * Bind a character to a session and put it in the world, in its saved
	 * room or the starting room when that one is gone.
	 *
	 * @returns the room entered, or undefined when the character cannot
	 * enter; the reason is logged
	 */
	public enterWorld(session: Session, character: CharacterRecord): Room | undefined {
		if (!session.canTransition(SESSION_STATE.PLAYING)) {
			logger.warn(`${session} cannot enter the world as ${character.name}`);
			return undefined;
		}
		const owner = this.characterSessions.get(character.id);
		if (owner && owner !== session) {
			logger.warn(`${character.name} is already played by ${owner}`);
			return undefined;
		}
		const roomId = this._world.hasRoom(character.roomId)
			? character.roomId
			: this.startingRoom;
		const room = this._world.getRoom(roomId);
		if (!room) {
			logger.error(`No room available for ${character.name}`, { roomId });
			return undefined;
		}
		if (session.characterId && session.characterId !== character.id) {
			this.unbind(session);
		}

		this.characterSessions.set(character.id, session);
		this.characters.set(character.id, { ...character, roomId });
		this._world.place(character.id, roomId);
		session.setCharacter(character.id);
		session.setState(SESSION_STATE.PLAYING);
		logger.info(`${character.name} entered the world in ${room}`);
		return room;
	}

	/**
	 * Take the session's character out of the world and save where it was.
	 * The session keeps its identity; callers clear it as needed.
	 */
	public async leaveWorld(session: Session): Promise<void> {
		const character = this.unbind(session);
		if (!character) return;
		try {
			await this.store.updateCharacter(character.id, {
				roomId: character.roomId,
				lastPlayedAt: new Date().toISOString(),
			});
		} catch (error) {
			logger.error(`Could not save ${character.name}`, {
				characterId: character.id,
				error: describeError(error),
			});
		}
		logger.info(`${character.name} left the world`);
	}

	private unbind(session: Session): CharacterRecord | undefined {
		const characterId = session.characterId;
		if (!characterId || this.characterSessions.get(characterId) !== session) {
			return undefined;
		}
		const character = this.characters.get(characterId);
		const roomId = this._world.remove(characterId);
		this.characterSessions.delete(characterId);
		this.characters.delete(characterId);
		if (!character) return undefined;
		return roomId === undefined ? character : { ...character, roomId };
	}

	/**
	 * Write where the session's character is, in one transaction.
	 *
	 * @returns the saved record, or undefined when nothing is being played
	 */
	public async saveCharacter(session: Session): Promise<CharacterRecord | undefined> {
		const characterId = session.characterId;
		const character =
			characterId && this.characterSessions.get(characterId) === session
				? this.characters.get(characterId)
				: undefined;
		if (!character) return undefined;
		const saved = await this.store.transaction(() =>
			this.store.updateCharacter(character.id, {
				roomId: character.roomId,
				lastPlayedAt: new Date().toISOString(),
			})
		);
		logger.info(`Saved ${character.name}`, { characterId: character.id });
		return saved;
	}

	/** Name of a character that is in the world. */
	public getCharacterName(characterId: string): string | undefined {
		return this.characters.get(characterId)?.name;
	}

	/** Session playing the named character (case-insensitive). */
	public findPlayingSession(name: string): Session | undefined {
		const wanted = name.toLowerCase();
		for (const [characterId, character] of this.characters) {
			if (character.name.toLowerCase() === wanted) {
				return this.characterSessions.get(characterId);
			}
		}
		return undefined;
	}

	/** Sessions with a character in the world, in entry order. */
	public getPlayingSessions(): Session[] {
		return Array.from(this.characterSessions.values());
	}

	/** The room the session's character is in. */
	public getRoomFor(session: Session): Room | undefined {
		if (!session.characterId) return undefined;
		const roomId = this._world.locate(session.characterId);
		return roomId === undefined ? undefined : this._world.getRoom(roomId);
	}

	/**
	 * Move the session's character to another room, updating the cached
	 * location used for saving.
	 */
	public moveCharacter(session: Session, toRoomId: string): boolean {
		const characterId = session.characterId;
		if (!characterId) return false;
		if (!this._world.move(characterId, toRoomId)) return false;
		const character = this.characters.get(characterId);
		if (character) this.characters.set(characterId, { ...character, roomId: toRoomId });
		return true;
	}

	/**
	 * Tear down everything tied to a session. Called when its loop ends.
	 */
	public async disconnect(session: Session): Promise<void> {
		const characterId = session.characterId;
		if (characterId && this.characterSessions.get(characterId) === session) {
			const name = this.getCharacterName(characterId);
			const roomId = this._world.locate(characterId);
			if (name && roomId) {
				this.broadcastToRoom(roomId, `${name} has left the game.`, session.id);
			}
			await this.leaveWorld(session);
		}
		this.sessions.destroySession(session.id);
		session.connection.close();
	}

	private async cleanupIdleSessions(): Promise<void> {
		const expired = this.sessions.getExpired(this.sessionTimeoutMinutes);
		for (const session of expired) {
			logger.info(`${session} idle for ${this.sessionTimeoutMinutes} minute(s)`);
			await this.notify(session.connection, MESSAGE.IDLE);
			await this.disconnect(session);
		}
	}

	private async saveCharacters(): Promise<void> {
		if (this.characters.size === 0) return;
		const characters = Array.from(this.characters.values());
		await this.store.transaction(async () => {
			for (const character of characters) {
				await this.store.updateCharacter(character.id, {
					roomId: character.roomId,
				});
			}
		});
		logger.debug(`Saved ${characters.length} character(s)`);
	}
}
