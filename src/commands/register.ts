/**
 * Register command - create an account and log into it.
 *
 * @example
 * ```
 * register Ada correct-horse
 * ```
 *
 * @module commands/register
 */

import type { Command } from "../core/command.js";
import { SESSION_STATE } from "../core/session.js";
import { capitalizeName, hashPassword, validateName } from "../core/store.js";

export const MIN_PASSWORD_LENGTH = 6;

export const command = {
	name: "register",
	usage: "register <name> <password>",
	description: "Create a new account.",
	minArgs: 2,
	async execute({ engine, session, connection, args }) {
		if (session.userId) {
			await connection.sendLine("You are already logged in.");
			return;
		}
		const [rawName = "", password = ""] = args;
		const problem = validateName(rawName);
		if (problem) {
			await connection.sendLine(problem);
			return;
		}
		if (password.length < MIN_PASSWORD_LENGTH) {
			await connection.sendLine(
				`Passwords must be at least ${MIN_PASSWORD_LENGTH} characters.`
			);
			return;
		}

		const name = capitalizeName(rawName);
		const created = await engine.store.createUser({
			name,
			passwordHash: hashPassword(password, engine.passwordSalt),
		});
		if (!created.ok) {
			await connection.sendLine(created.reason);
			return;
		}
		session.setUser(created.value.id);
		session.setState(SESSION_STATE.AUTHENTICATING);
		await connection.sendLine(
			`Account ${name} created. You are now logged in.\nType 'create <name>' to make a character.`
		);
	},
} satisfies Command;
