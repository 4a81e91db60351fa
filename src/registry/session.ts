/**
 * Registry: session - live sessions by id
 *
 * Owns every `Session` the server knows about. Each connection gets exactly
 * one session, and a destroyed session is gone for good.
 *
 * One registry is created per engine, so tests can build as many as they
 * like side by side.
 *
 * @example
 * const sessions = new SessionRegistry();
 * const session = sessions.createSession(connection);
 * sessions.destroySession(session.id); // true
 * sessions.destroySession(session.id); // false
 *
 * @module registry/session
 */
import logger from "../utils/logger.js";
import { SESSION_STATE, Session } from "../core/session.js";
import type { Connection } from "../core/connection.js";

export class SessionRegistry {
	private readonly sessions = new Map<string, Session>();

	get size(): number {
		return this.sessions.size;
	}

	/**
	 * Create and register a session for a connection, binding the two
	 * together. A connection that already has a session gets that one back.
	 */
	public createSession(connection: Connection): Session {
		if (connection.session && this.sessions.has(connection.session.id)) {
			logger.warn(`${connection} already has ${connection.session}`);
			return connection.session;
		}
		const session = new Session(connection);
		connection.session = session;
		this.sessions.set(session.id, session);
		logger.info(`Created ${session} for ${connection}`);
		return session;
	}

	public getSession(id: string): Session | undefined {
		return this.sessions.get(id);
	}

	public getSessionByUser(userId: string): Session | undefined {
		for (const session of this.sessions.values()) {
			if (session.userId === userId) return session;
		}
		return undefined;
	}

	public getAllSessions(): Session[] {
		return Array.from(this.sessions.values());
	}

	/**
	 * Mark a session disconnected and drop it.
	 *
	 * @returns false when the id was not registered
	 */
	public destroySession(id: string): boolean {
		const session = this.sessions.get(id);
		if (!session) return false;
		session.setState(SESSION_STATE.DISCONNECTED);
		this.sessions.delete(id);
		logger.info(`Destroyed ${session}`);
		return true;
	}

	public getExpired(timeoutMinutes: number, now: Date = new Date()): Session[] {
		return this.getAllSessions().filter((session) =>
			session.isExpired(timeoutMinutes, now)
		);
	}

	/**
	 * Destroy every session idle for longer than `timeoutMinutes`.
	 *
	 * @returns how many were destroyed
	 */
	public cleanupExpired(timeoutMinutes: number, now: Date = new Date()): number {
		let count = 0;
		for (const session of this.getExpired(timeoutMinutes, now)) {
			if (this.destroySession(session.id)) count++;
		}
		if (count > 0) logger.info(`Cleaned up ${count} expired session(s)`);
		return count;
	}
}
