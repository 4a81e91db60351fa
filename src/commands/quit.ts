/**
 * Quit command - save and disconnect.
 *
 * **Aliases:** `exit`
 * @module commands/quit
 */

import type { Command } from "../core/command.js";

export const command = {
	name: "quit",
	aliases: ["exit"],
	usage: "quit",
	description: "Save and leave the game.",
	async execute({ engine, session, connection }) {
		await connection.sendLine("Goodbye!");
		await engine.disconnect(session);
	},
} satisfies Command;
