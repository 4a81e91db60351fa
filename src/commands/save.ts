/**
 * Save command - write the character's current state to the account store.
 *
 * @module commands/save
 */

import type { Command } from "../core/command.js";

export const command = {
	name: "save",
	usage: "save",
	description: "Save your character.",
	requiresCharacter: true,
	async execute({ engine, session, connection }) {
		const saved = await engine.saveCharacter(session);
		if (!saved) {
			await connection.sendLine("There is nothing to save.");
			return;
		}
		await connection.sendLine(`${saved.name} has been saved.`);
	},
} satisfies Command;
