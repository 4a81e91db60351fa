/**
 * Login command.
 *
 * Without a password on the line the player is prompted for one, and the
 * reply is read without echo.
 *
 * @example
 * ```
 * login Ada
 * Password:
 * ```
 *
 * @module commands/login
 */

import type { Command } from "../core/command.js";
import { SESSION_STATE } from "../core/session.js";
import { hashPassword } from "../core/store.js";
import logger from "../utils/logger.js";

export const INVALID_LOGIN = "Invalid name or password.";

export const command = {
	name: "login",
	usage: "login <name> [password]",
	description: "Log into an existing account.",
	minArgs: 1,
	async execute({ engine, session, connection, args }) {
		if (session.userId) {
			await connection.sendLine("You are already logged in.");
			return;
		}
		if (session.state === SESSION_STATE.CONNECTED) {
			session.setState(SESSION_STATE.AUTHENTICATING);
		}

		const name = args[0] ?? "";
		let password: string | undefined = args[1];
		if (password === undefined) {
			await connection.send("Password: ");
			password = await connection.readPassword();
		}

		const user = await engine.store.findUserByName(name);
		if (!user || user.passwordHash !== hashPassword(password, engine.passwordSalt)) {
			logger.warn(`Failed login for ${name} from ${connection.address}`);
			await connection.sendLine(INVALID_LOGIN);
			return;
		}
		const elsewhere = engine.sessions.getSessionByUser(user.id);
		if (elsewhere && elsewhere !== session) {
			await connection.sendLine("That account is already logged in.");
			return;
		}

		session.setUser(user.id);
		await engine.store.updateUser(user.id, {
			lastLoginAt: new Date().toISOString(),
		});
		await connection.sendLine(
			`Welcome back, ${user.name}!\nType 'characters' to list your characters or 'create <name>' to make one.`
		);
	},
} satisfies Command;
