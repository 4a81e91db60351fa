/**
 * Look command for viewing the current room.
 *
 * @example
 * ```
 * look
 * l
 * ```
 *
 * **Aliases:** `l`
 * @module commands/look
 */

import type { Command } from "../core/command.js";
import { describeRoom } from "../utils/display.js";

export const command = {
	name: "look",
	aliases: ["l"],
	usage: "look",
	description: "Describe your surroundings.",
	requiresCharacter: true,
	async execute({ engine, session, connection }) {
		const room = engine.getRoomFor(session);
		if (!room) {
			await connection.sendLine("You are not in a room.");
			return;
		}
		await connection.sendLine(describeRoom(engine, room, session.characterId));
	},
} satisfies Command;
