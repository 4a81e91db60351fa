/**
 * Package: commands - built-in command loader
 *
 * Discovers the command modules in `src/commands` (`dist/src/commands` when
 * built). Each module exports a `command` constant, a `commands` array, or
 * both. Files beginning with `_` hold shared helpers and are skipped, as are
 * tests and declaration files.
 *
 * @example
 * // src/commands/who.ts
 * export const command = {
 *   name: "who",
 *   usage: "who",
 *   description: "List the players in the game.",
 *   execute({ connection, engine }) { ... },
 * } satisfies Command;
 *
 * @module package/commands
 */
import { readdir } from "fs/promises";
import { join } from "path";
import { fileURLToPath, pathToFileURL } from "url";
import logger from "../utils/logger.js";
import { isCommand, type Command } from "../core/command.js";

export const COMMANDS_DIRECTORY = fileURLToPath(
	new URL("../commands/", import.meta.url)
);

/**
 * Check if a file is a command module (not a helper or test file)
 */
export function isCommandFile(filename: string): boolean {
	return (
		(filename.endsWith(".ts") || filename.endsWith(".js")) &&
		!filename.startsWith("_") &&
		!filename.endsWith(".d.ts") &&
		!filename.endsWith(".spec.ts") &&
		!filename.endsWith(".spec.js")
	);
}

function commandsOf(module: unknown, filename: string): Command[] {
	if (typeof module !== "object" || module === null) return [];
	const found: Command[] = [];
	const single: unknown = Reflect.get(module, "command");
	if (single !== undefined) {
		if (isCommand(single)) found.push(single);
		else logger.warn(`${filename} exports a malformed command`);
	}
	const many: unknown = Reflect.get(module, "commands");
	if (Array.isArray(many)) {
		for (const entry of many) {
			if (isCommand(entry)) found.push(entry);
			else logger.warn(`${filename} exports a malformed command`);
		}
	}
	return found;
}

/**
 * Import every command module in `directory`, in file name order.
 */
export async function loadCommands(
	directory: string = COMMANDS_DIRECTORY
): Promise<Command[]> {
	const filenames = (await readdir(directory)).filter(isCommandFile).sort();
	const commands: Command[] = [];
	for (const filename of filenames) {
		const module: unknown = await import(
			pathToFileURL(join(directory, filename)).href
		);
		const found = commandsOf(module, filename);
		if (found.length === 0) {
			logger.debug(`${filename} exports no commands`);
			continue;
		}
		logger.debug(`Loaded ${found.length} command(s) from ${filename}`);
		commands.push(...found);
	}
	return commands;
}
