/**
 * Core session module.
 *
 * A `Session` is one player's logical login on one `Connection`. It tracks
 * who is logged in, which character is being played, and how long the
 * player has been idle.
 *
 * State only moves forward (`CONNECTED` → `AUTHENTICATING` → `PLAYING`),
 * except that a logout returns to `CONNECTED`. `DISCONNECTED` is terminal.
 *
 * @module core/session
 */
import { randomUUID } from "crypto";
import logger from "../utils/logger.js";
import type { Connection } from "./connection.js";

export enum SESSION_STATE {
	CONNECTED = "connected",
	AUTHENTICATING = "authenticating",
	PLAYING = "playing",
	DISCONNECTED = "disconnected",
}

const MS_PER_MINUTE = 60 * 1000;

/** Logout is the one step back: `AUTHENTICATING`/`PLAYING` → `CONNECTED`. */
const TRANSITIONS: Record<SESSION_STATE, readonly SESSION_STATE[]> = {
	[SESSION_STATE.CONNECTED]: [
		SESSION_STATE.AUTHENTICATING,
		SESSION_STATE.DISCONNECTED,
	],
	[SESSION_STATE.AUTHENTICATING]: [
		SESSION_STATE.PLAYING,
		SESSION_STATE.CONNECTED,
		SESSION_STATE.DISCONNECTED,
	],
	[SESSION_STATE.PLAYING]: [SESSION_STATE.CONNECTED, SESSION_STATE.DISCONNECTED],
	[SESSION_STATE.DISCONNECTED]: [],
};

export class Session {
	readonly id: string = randomUUID();
	readonly connection: Connection;
	readonly createdAt: Date;
	private _state = SESSION_STATE.CONNECTED;
	private _userId?: string;
	private _characterId?: string;
	private _lastActivity: Date;

	constructor(connection: Connection, now: Date = new Date()) {
		this.connection = connection;
		this.createdAt = now;
		this._lastActivity = now;
	}

	get state(): SESSION_STATE {
		return this._state;
	}

	get userId(): string | undefined {
		return this._userId;
	}

	get characterId(): string | undefined {
		return this._characterId;
	}

	get lastActivity(): Date {
		return this._lastActivity;
	}

	toString(): string {
		return `{session ${this.id.slice(0, 8)} ${this._state}}`;
	}

	/** Refresh last activity. */
	public touch(now: Date = new Date()): void {
		this._lastActivity = now;
	}

	public setUser(userId: string): void {
		this._userId = userId;
		this.touch();
		logger.info(`${this} logged in as user ${userId}`);
	}

	public setCharacter(characterId: string): void {
		this._characterId = characterId;
		this.touch();
		logger.info(`${this} playing character ${characterId}`);
	}

	/**
	 * Forget the user and character. Used on logout.
	 */
	public clearIdentity(): void {
		logger.info(
			`${this} cleared identity (user ${this._userId ?? "none"}, character ${
				this._characterId ?? "none"
			})`
		);
		this._userId = undefined;
		this._characterId = undefined;
		this.touch();
	}

	/**
	 * True when `state` is the current state or one step away from it.
	 */
	public canTransition(state: SESSION_STATE): boolean {
		return state === this._state || TRANSITIONS[this._state].includes(state);
	}

	/**
	 * Move to a new state. Steps missing from the state machine are logged
	 * and ignored, which also keeps `DISCONNECTED` terminal.
	 *
	 * @returns whether the session is now in `state`
	 */
	public setState(state: SESSION_STATE): boolean {
		if (state === this._state) return true;
		if (!this.canTransition(state)) {
			logger.warn(`${this} cannot move from ${this._state} to ${state}`);
			return false;
		}
		const previous = this._state;
		this._state = state;
		this.touch();
		logger.debug(`Session ${this.id} state ${previous} -> ${state}`);
		return true;
	}

	/**
	 * True when the session has been idle for more than `timeoutMinutes`.
	 */
	public isExpired(timeoutMinutes: number, now: Date = new Date()): boolean {
		return (
			now.getTime() - this._lastActivity.getTime() >
			timeoutMinutes * MS_PER_MINUTE
		);
	}
}
