/**
 * Core store module.
 *
 * The persistence boundary. The engine and the built-in commands only ever
 * talk to a `Store`; the YAML-backed implementation lives in
 * `package/accounts.ts` and tests can supply their own.
 *
 * Lookups return `undefined` when nothing matches. Creation returns a
 * {@link StoreResult} so that name clashes are ordinary values the caller
 * reports to the player.
 *
 * @module core/store
 */
import { createHash } from "crypto";

export interface UserRecord {
	id: string;
	name: string;
	passwordHash: string;
	createdAt: string;
	lastLoginAt?: string;
}

export interface CharacterRecord {
	id: string;
	userId: string;
	name: string;
	roomId: string;
	createdAt: string;
	lastPlayedAt?: string;
}

export type StoreResult<T> =
	| { ok: true; value: T }
	| { ok: false; reason: string };

export interface NewUser {
	name: string;
	passwordHash: string;
}

export interface NewCharacter {
	userId: string;
	name: string;
	roomId: string;
}

export type CharacterUpdate = Partial<Pick<CharacterRecord, "roomId" | "lastPlayedAt">>;
export type UserUpdate = Partial<Pick<UserRecord, "lastLoginAt">>;

export interface Store {
	getUser(id: string): Promise<UserRecord | undefined>;
	findUserByName(name: string): Promise<UserRecord | undefined>;
	createUser(user: NewUser): Promise<StoreResult<UserRecord>>;
	updateUser(id: string, changes: UserUpdate): Promise<UserRecord | undefined>;
	getCharacter(id: string): Promise<CharacterRecord | undefined>;
	findCharacterByName(name: string): Promise<CharacterRecord | undefined>;
	listCharacters(userId: string): Promise<CharacterRecord[]>;
	createCharacter(character: NewCharacter): Promise<StoreResult<CharacterRecord>>;
	updateCharacter(
		id: string,
		changes: CharacterUpdate
	): Promise<CharacterRecord | undefined>;
	/** @returns false when there was no such character */
	deleteCharacter(id: string): Promise<boolean>;
	/**
	 * Run `work` as one unit. Changes are committed when it resolves and
	 * rolled back when it throws; the error is rethrown.
	 */
	transaction<T>(work: () => Promise<T>): Promise<T>;
}

/**
 * SHA-256 over the password followed by the salt, hex encoded.
 */
export function hashPassword(password: string, salt: string): string {
	return createHash("sha256").update(password + salt).digest("hex");
}

/** Lower-cased key used for case-insensitive name uniqueness. */
export function nameKey(name: string): string {
	return name.trim().toLowerCase();
}

const NAME_PATTERN = /^[A-Za-z][A-Za-z0-9]{2,19}$/;

/**
 * Account and character names: a letter followed by letters or digits,
 * 3 to 20 characters long.
 *
 * @returns the problem to report, or undefined when the name is valid
 */
export function validateName(name: string): string | undefined {
	if (NAME_PATTERN.test(name)) return undefined;
	return "Names must be 3-20 letters or digits and start with a letter.";
}

/**
 * "ada" → "Ada".
 */
export function capitalizeName(name: string): string {
	const lower = name.toLowerCase();
	return lower.charAt(0).toUpperCase() + lower.slice(1);
}
