/**
 * Create command - make a new character in the starting room.
 *
 * @example
 * ```
 * create Ada
 * ```
 *
 * @module commands/create
 */

import type { Command } from "../core/command.js";
import { capitalizeName, validateName } from "../core/store.js";

export const command = {
	name: "create",
	usage: "create <name>",
	description: "Create a new character.",
	minArgs: 1,
	async execute({ engine, session, connection, args }) {
		if (!session.userId) {
			await connection.sendLine("You must log in first.");
			return;
		}
		const [rawName = ""] = args;
		const problem = validateName(rawName);
		if (problem) {
			await connection.sendLine(problem);
			return;
		}
		const name = capitalizeName(rawName);
		const created = await engine.store.createCharacter({
			userId: session.userId,
			name,
			roomId: engine.startingRoom,
		});
		if (!created.ok) {
			await connection.sendLine(created.reason);
			return;
		}
		await connection.sendLine(
			`Character ${name} created. Type 'play ${name}' to enter the world.`
		);
	},
} satisfies Command;
