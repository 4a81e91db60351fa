/**
 * Go command - walk in a named direction.
 *
 * @example
 * ```
 * go north
 * go ne
 * ```
 *
 * @module commands/go
 */

import type { Command } from "../core/command.js";
import { parseDirection } from "../core/room.js";
import { executeMovement } from "./_movement.js";

export const command = {
	name: "go",
	usage: "go <direction>",
	description: "Walk in the given direction.",
	minArgs: 1,
	requiresCharacter: true,
	async execute(context) {
		const direction = parseDirection(context.args[0] ?? "");
		if (!direction) {
			await context.connection.sendLine(
				`'${context.args[0]}' is not a direction.`
			);
			return;
		}
		await executeMovement(context, direction);
	},
} satisfies Command;
