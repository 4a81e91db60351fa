/**
 * Emote command - describe an action to the room.
 *
 * @example
 * ```
 * emote waves.
 * :grins.
 * ```
 *
 * **Aliases:** `:`
 * @module commands/emote
 */

import type { Command } from "../core/command.js";

export const command = {
	name: "emote",
	usage: "emote <action>",
	description: "Act something out for the room.",
	minArgs: 1,
	requiresCharacter: true,
	async execute({ engine, session, connection, argText }) {
		const room = engine.getRoomFor(session);
		if (!room) {
			await connection.sendLine("You are not in a room.");
			return;
		}
		const name = engine.getCharacterName(session.characterId ?? "") ?? "Someone";
		const message = `${name} ${argText}`;
		engine.broadcastToRoom(room.id, message, session.id);
		await connection.sendLine(message);
	},
} satisfies Command;
