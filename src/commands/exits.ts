/**
 * Exits command - list the ways out of the current room and where they lead.
 *
 * @module commands/exits
 */

import type { Command } from "../core/command.js";
import { pad } from "../utils/string.js";

export const command = {
	name: "exits",
	usage: "exits",
	description: "List the exits from this room.",
	requiresCharacter: true,
	async execute({ engine, session, connection }) {
		const room = engine.getRoomFor(session);
		if (!room) {
			await connection.sendLine("You are not in a room.");
			return;
		}
		const directions = room.getExitDirections();
		if (directions.length === 0) {
			await connection.sendLine("There are no obvious exits.");
			return;
		}
		const lines = ["Obvious exits:"];
		for (const direction of directions) {
			const target = engine.world.getRoom(room.getExit(direction) ?? "");
			lines.push(`  ${pad(direction, 10)} - ${target?.name ?? "Somewhere"}`);
		}
		await connection.sendLine(lines.join("\n"));
	},
} satisfies Command;
