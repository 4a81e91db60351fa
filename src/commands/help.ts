/**
 * Help command - list commands, or describe one.
 *
 * `help <topic>` accepts any verb or alias, or the start of a command name.
 *
 * @example
 * ```
 * help
 * help look
 * ? nor
 * ```
 *
 * **Aliases:** `?`
 * @module commands/help
 */

import type { Command } from "../core/command.js";
import { autocomplete, pad } from "../utils/string.js";

const USAGE_WIDTH = 28;

function listing(title: string, commands: Command[]): string[] {
	if (commands.length === 0) return [];
	return [
		title,
		...commands.map(
			(command) => `  ${pad(command.usage, USAGE_WIDTH)}${command.description}`
		),
	];
}

export const command = {
	name: "help",
	aliases: ["?"],
	usage: "help [command]",
	description: "List commands, or show help for one.",
	async execute({ engine, session, connection, args }) {
		const topic: string | undefined = args[0];
		if (topic === undefined) {
			const lines = listing("Commands:", engine.commands.getCommandsForHelp(false));
			if (session.characterId) {
				lines.push(
					...listing("In the world:", engine.commands.getCommandsForHelp(true))
				);
			}
			await connection.sendLine(lines.join("\n"));
			return;
		}

		const found =
			engine.commands.get(topic) ??
			engine.commands
				.getAllCommands()
				.find((candidate) => autocomplete(topic, candidate.name));
		if (!found) {
			await connection.sendLine(`No help is available for '${topic}'.`);
			return;
		}
		const lines = [`Usage: ${found.usage}`, found.description];
		if (found.aliases && found.aliases.length > 0) {
			lines.push(`Aliases: ${found.aliases.join(", ")}`);
		}
		await connection.sendLine(lines.join("\n"));
	},
} satisfies Command;
