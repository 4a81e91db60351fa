/**
 * Chat command - out-of-character talk to everyone in the game.
 *
 * **Aliases:** `ooc`
 * @module commands/chat
 */

import type { Command } from "../core/command.js";

export const command = {
	name: "chat",
	aliases: ["ooc"],
	usage: "chat <message>",
	description: "Talk to everyone in the game.",
	minArgs: 1,
	requiresCharacter: true,
	async execute({ engine, session, connection, argText }) {
		const name = engine.getCharacterName(session.characterId ?? "") ?? "Someone";
		engine.broadcastAll(`{C[OOC]{x ${name}: ${argText}`, session.id);
		await connection.sendLine(`{C[OOC]{x You: ${argText}`);
	},
} satisfies Command;
