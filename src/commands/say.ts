/**
 * Say command for in-character speech.
 *
 * Sends a message to everyone in the same room as the speaker.
 *
 * @example
 * ```
 * say Hello, traveler!
 * 'This is a shortcut for say
 * ```
 *
 * **Aliases:** `'`
 * @module commands/say
 */

import type { Command } from "../core/command.js";

export const command = {
	name: "say",
	usage: "say <message>",
	description: "Speak to everyone in the room.",
	minArgs: 1,
	requiresCharacter: true,
	async execute({ engine, session, connection, argText }) {
		const room = engine.getRoomFor(session);
		if (!room) {
			await connection.sendLine("You are not in a room.");
			return;
		}
		const name = engine.getCharacterName(session.characterId ?? "") ?? "Someone";
		engine.broadcastToRoom(room.id, `${name} says, "${argText}"`, session.id);
		await connection.sendLine(`You say, "${argText}"`);
	},
} satisfies Command;
