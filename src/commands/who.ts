/**
 * Who command - displays every character in the game.
 *
 * **Output:**
 * ```
 * === Players Online ===
 * Ada             Town
 * Bob             Forest
 *
 * Total Players: 2
 * ```
 *
 * @module commands/who
 */

import type { Command } from "../core/command.js";
import { pad } from "../utils/string.js";

export const command = {
	name: "who",
	usage: "who",
	description: "List the players in the game.",
	async execute({ engine, connection }) {
		const lines = ["=== Players Online ==="];
		const playing = engine.getPlayingSessions();
		for (const other of playing) {
			const characterId = other.characterId ?? "";
			const name = engine.getCharacterName(characterId) ?? "Someone";
			const area = engine.getRoomFor(other)?.area ?? "";
			lines.push(`${pad(name, 16)}${area}`.trimEnd());
		}
		lines.push("", `Total Players: ${playing.length}`);
		await connection.sendLine(lines.join("\n"));
	},
} satisfies Command;
