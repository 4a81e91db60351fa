/**
 * Delete command - remove one of your characters for good.
 *
 * The player has to type the character's name again, exactly as it is
 * stored, before anything is deleted. A character in the game cannot be
 * deleted.
 *
 * @example
 * ```
 * delete Ada
 * Type 'Ada' to confirm: Ada
 * ```
 *
 * @module commands/delete
 */

import { COLOR, color } from "../core/color.js";
import type { Command } from "../core/command.js";
import logger from "../utils/logger.js";

export const command = {
	name: "delete",
	usage: "delete <name>",
	description: "Delete one of your characters (permanent).",
	minArgs: 1,
	async execute({ engine, session, connection, args }) {
		if (!session.userId) {
			await connection.sendLine("You must log in first.");
			return;
		}
		const [name = ""] = args;
		const character = await engine.store.findCharacterByName(name);
		if (!character || character.userId !== session.userId) {
			await connection.sendLine(`You have no character named ${name}.`);
			return;
		}
		if (engine.findPlayingSession(character.name)) {
			await connection.sendLine("You cannot delete a character that is in the game.");
			return;
		}

		await connection.sendLine(
			color(`This will permanently delete ${character.name}!`, COLOR.CRIMSON)
		);
		await connection.send(`Type '${character.name}' to confirm: `);
		const confirmation = await connection.readLine();
		if (confirmation !== character.name) {
			await connection.sendLine("Deletion cancelled.");
			return;
		}

		if (!(await engine.store.deleteCharacter(character.id))) {
			await connection.sendLine(`You have no character named ${name}.`);
			return;
		}
		logger.info(`${session} deleted ${character.name}`);
		await connection.sendLine(`${character.name} has been deleted.`);
	},
} satisfies Command;
