/**
 * Characters command - list the characters on the logged-in account.
 *
 * @module commands/characters
 */

import type { Command } from "../core/command.js";

export const command = {
	name: "characters",
	usage: "characters",
	description: "List your characters.",
	async execute({ engine, session, connection }) {
		if (!session.userId) {
			await connection.sendLine("You must log in first.");
			return;
		}
		const characters = await engine.store.listCharacters(session.userId);
		if (characters.length === 0) {
			await connection.sendLine(
				"You have no characters. Type 'create <name>' to make one."
			);
			return;
		}
		const lines = ["Your characters:"];
		for (const character of characters) lines.push(`  ${character.name}`);
		lines.push("Type 'play <name>' to enter the world.");
		await connection.sendLine(lines.join("\n"));
	},
} satisfies Command;
