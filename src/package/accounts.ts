/**
 * Package: accounts - YAML-backed account and character store
 *
 * Keeps every user and character record in memory and writes the whole set
 * to `data/accounts.yaml` whenever a transaction commits. Writes go to a
 * temporary file that is then renamed over the real one, so a crash never
 * leaves a half-written file behind.
 *
 * Transactions run one at a time. A store call made inside a transaction
 * joins it; a store call made outside one runs as its own transaction. A
 * transaction that throws restores the records it started from.
 *
 * @example
 * const store = await YamlStore.open(join(dataDir, "accounts.yaml"));
 * const created = await store.createUser({ name: "Ada", passwordHash });
 * if (!created.ok) await connection.sendLine(created.reason);
 *
 * @module package/accounts
 */
import { AsyncLocalStorage } from "async_hooks";
import { randomUUID } from "crypto";
import { dirname, join } from "path";
import { mkdir, readFile, rename, unlink, writeFile } from "fs/promises";
import YAML from "js-yaml";
import logger, { describeError } from "../utils/logger.js";
import { getSafeRootDirectory } from "../utils/path.js";
import {
	nameKey,
	type CharacterRecord,
	type CharacterUpdate,
	type NewCharacter,
	type NewUser,
	type Store,
	type StoreResult,
	type UserRecord,
	type UserUpdate,
} from "../core/store.js";

export const ACCOUNTS_PATH = join(getSafeRootDirectory(), "data", "accounts.yaml");

interface Snapshot {
	users: UserRecord[];
	characters: CharacterRecord[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
	return typeof value === "string" ? value : undefined;
}

function toUserRecord(value: unknown): UserRecord | undefined {
	if (!isRecord(value)) return undefined;
	const { id, name, passwordHash, createdAt, lastLoginAt } = value;
	if (
		typeof id !== "string" ||
		typeof name !== "string" ||
		typeof passwordHash !== "string" ||
		typeof createdAt !== "string"
	)
		return undefined;
	const record: UserRecord = { id, name, passwordHash, createdAt };
	const lastLogin = optionalString(lastLoginAt);
	if (lastLogin) record.lastLoginAt = lastLogin;
	return record;
}

function toCharacterRecord(value: unknown): CharacterRecord | undefined {
	if (!isRecord(value)) return undefined;
	const { id, userId, name, roomId, createdAt, lastPlayedAt } = value;
	if (
		typeof id !== "string" ||
		typeof userId !== "string" ||
		typeof name !== "string" ||
		typeof roomId !== "string" ||
		typeof createdAt !== "string"
	)
		return undefined;
	const record: CharacterRecord = { id, userId, name, roomId, createdAt };
	const lastPlayed = optionalString(lastPlayedAt);
	if (lastPlayed) record.lastPlayedAt = lastPlayed;
	return record;
}

/**
 * Parse the contents of an accounts file. Malformed entries are skipped
 * with a warning.
 */
export function parseAccounts(content: string): Snapshot {
	const parsed: unknown = YAML.load(content);
	const snapshot: Snapshot = { users: [], characters: [] };
	if (!isRecord(parsed)) return snapshot;

	const users = Array.isArray(parsed.users) ? parsed.users : [];
	for (const entry of users) {
		const user = toUserRecord(entry);
		if (user) snapshot.users.push(user);
		else logger.warn("Skipping malformed user record", { entry });
	}

	const characters = Array.isArray(parsed.characters) ? parsed.characters : [];
	for (const entry of characters) {
		const character = toCharacterRecord(entry);
		if (character) snapshot.characters.push(character);
		else logger.warn("Skipping malformed character record", { entry });
	}
	return snapshot;
}

export class YamlStore implements Store {
	private users = new Map<string, UserRecord>();
	private characters = new Map<string, CharacterRecord>();
	private readonly filePath?: string;
	private readonly active = new AsyncLocalStorage<true>();
	private queue: Promise<void> = Promise.resolve();

	/**
	 * @param filePath - where to persist; omit for a memory-only store
	 */
	constructor(filePath?: string) {
		this.filePath = filePath;
	}

	/**
	 * Open a store backed by `filePath`, loading it when it exists.
	 */
	static async open(filePath: string = ACCOUNTS_PATH): Promise<YamlStore> {
		const store = new YamlStore(filePath);
		let content: string | undefined;
		try {
			content = await readFile(filePath, "utf-8");
		} catch (error) {
			if (isRecord(error) && error.code === "ENOENT") {
				logger.info(`No accounts file at ${filePath}; starting empty`);
				return store;
			}
			throw error;
		}
		store.restore(parseAccounts(content));
		logger.info(
			`Loaded ${store.users.size} user(s) and ${store.characters.size} character(s)`
		);
		return store;
	}

	public async getUser(id: string): Promise<UserRecord | undefined> {
		const user = this.users.get(id);
		return user ? { ...user } : undefined;
	}

	public async findUserByName(name: string): Promise<UserRecord | undefined> {
		const key = nameKey(name);
		for (const user of this.users.values()) {
			if (nameKey(user.name) === key) return { ...user };
		}
		return undefined;
	}

	public createUser(user: NewUser): Promise<StoreResult<UserRecord>> {
		return this.transaction<StoreResult<UserRecord>>(async () => {
			if (await this.findUserByName(user.name)) {
				return { ok: false, reason: "That name is already taken." };
			}
			const record: UserRecord = {
				id: randomUUID(),
				name: user.name,
				passwordHash: user.passwordHash,
				createdAt: new Date().toISOString(),
			};
			this.users.set(record.id, record);
			logger.info(`Created user ${record.name}`, { userId: record.id });
			return { ok: true, value: { ...record } };
		});
	}

	public updateUser(
		id: string,
		changes: UserUpdate
	): Promise<UserRecord | undefined> {
		return this.transaction(async () => {
			const user = this.users.get(id);
			if (!user) return undefined;
			const updated = { ...user, ...changes };
			this.users.set(id, updated);
			return { ...updated };
		});
	}

	public async getCharacter(id: string): Promise<CharacterRecord | undefined> {
		const character = this.characters.get(id);
		return character ? { ...character } : undefined;
	}

	public async findCharacterByName(
		name: string
	): Promise<CharacterRecord | undefined> {
		const key = nameKey(name);
		for (const character of this.characters.values()) {
			if (nameKey(character.name) === key) return { ...character };
		}
		return undefined;
	}

	public async listCharacters(userId: string): Promise<CharacterRecord[]> {
		return Array.from(this.characters.values())
			.filter((character) => character.userId === userId)
			.map((character) => ({ ...character }));
	}

	public createCharacter(
		character: NewCharacter
	): Promise<StoreResult<CharacterRecord>> {
		return this.transaction<StoreResult<CharacterRecord>>(async () => {
			if (!this.users.has(character.userId)) {
				return { ok: false, reason: "Unknown account." };
			}
			if (await this.findCharacterByName(character.name)) {
				return { ok: false, reason: "A character with that name already exists." };
			}
			const record: CharacterRecord = {
				id: randomUUID(),
				userId: character.userId,
				name: character.name,
				roomId: character.roomId,
				createdAt: new Date().toISOString(),
			};
			this.characters.set(record.id, record);
			logger.info(`Created character ${record.name}`, {
				characterId: record.id,
				userId: record.userId,
			});
			return { ok: true, value: { ...record } };
		});
	}

	public updateCharacter(
		id: string,
		changes: CharacterUpdate
	): Promise<CharacterRecord | undefined> {
		return this.transaction(async () => {
			const character = this.characters.get(id);
			if (!character) return undefined;
			const updated = { ...character, ...changes };
			this.characters.set(id, updated);
			return { ...updated };
		});
	}

	public deleteCharacter(id: string): Promise<boolean> {
		return this.transaction(async () => {
			const character = this.characters.get(id);
			if (!character) return false;
			this.characters.delete(id);
			logger.info(`Deleted character ${character.name}`, {
				characterId: id,
				userId: character.userId,
			});
			return true;
		});
	}

	public transaction<T>(work: () => Promise<T>): Promise<T> {
		// already inside one: join it
		if (this.active.getStore()) return work();

		const run = this.queue.then(() =>
			this.active.run(true, () => this.commitOrRollback(work))
		);
		this.queue = run.then(
			() => undefined,
			() => undefined
		);
		return run;
	}

	private async commitOrRollback<T>(work: () => Promise<T>): Promise<T> {
		const before = this.snapshot();
		try {
			const result = await work();
			await this.persist();
			return result;
		} catch (error) {
			this.restore(before);
			logger.warn("Store transaction rolled back", {
				error: describeError(error),
			});
			throw error;
		}
	}

	private snapshot(): Snapshot {
		return {
			users: Array.from(this.users.values(), (user) => ({ ...user })),
			characters: Array.from(this.characters.values(), (character) => ({
				...character,
			})),
		};
	}

	private restore(snapshot: Snapshot): void {
		this.users = new Map(snapshot.users.map((user) => [user.id, user]));
		this.characters = new Map(
			snapshot.characters.map((character) => [character.id, character])
		);
	}

	private async persist(): Promise<void> {
		if (!this.filePath) return;
		const content = YAML.dump(this.snapshot(), { noRefs: true, lineWidth: 120 });
		const tempPath = `${this.filePath}.tmp`;
		await mkdir(dirname(this.filePath), { recursive: true });
		try {
			await writeFile(tempPath, content, "utf-8");
			await rename(tempPath, this.filePath);
		} catch (error) {
			await unlink(tempPath).catch((cleanupError: unknown) =>
				logger.debug(`Could not remove ${tempPath}`, {
					error: describeError(cleanupError),
				})
			);
			throw error;
		}
	}
}
