/**
 * Core command module.
 *
 * A command is a stateless handler bound to a verb and any number of
 * aliases. The engine tokenizes input, looks the verb up here, checks the
 * gates (`requiresCharacter`, `minArgs`) and calls `execute` with a fresh
 * {@link CommandContext}.
 *
 * ```ts
 * const registry = new CommandRegistry();
 * registry.register({
 * 	name: "shout",
 * 	aliases: ["yell"],
 * 	usage: "shout <message>",
 * 	description: "Talk to everyone in the game.",
 * 	minArgs: 1,
 * 	requiresCharacter: true,
 * 	execute: ({ engine, argText }) => void engine.broadcastAll(argText),
 * });
 * registry.get("YELL"); // same command
 * ```
 *
 * @module core/command
 */
import logger from "../utils/logger.js";
import type { Connection } from "./connection.js";
import type { Session } from "./session.js";
import type { Engine } from "../engine.js";

/**
 * Everything a handler gets for one invocation.
 */
export interface CommandContext {
	session: Session;
	connection: Connection;
	engine: Engine;
	/** Tokens after the verb, case preserved. */
	args: string[];
	/** The input line as typed, trimmed. */
	rawInput: string;
	/** Everything after the verb, spacing preserved. */
	argText: string;
}

export interface Command {
	name: string;
	aliases?: readonly string[];
	usage: string;
	description: string;
	/** Fewer arguments than this get a usage line instead of `execute`. */
	minArgs?: number;
	requiresCharacter?: boolean;
	execute(context: CommandContext): Promise<void> | void;
}

/**
 * Narrow a module export to a command.
 */
export function isCommand(value: unknown): value is Command {
	if (typeof value !== "object" || value === null) return false;
	return (
		typeof Reflect.get(value, "name") === "string" &&
		typeof Reflect.get(value, "usage") === "string" &&
		typeof Reflect.get(value, "description") === "string" &&
		typeof Reflect.get(value, "execute") === "function"
	);
}

export class CommandRegistry {
	private readonly verbs = new Map<string, Command>();
	private readonly commands: Command[] = [];

	get size(): number {
		return this.commands.length;
	}

	/**
	 * Register a command under its name and every alias.
	 *
	 * @throws Error when the name is empty, or a verb repeats or is already taken
	 */
	public register(command: Command): void {
		const name = command.name.trim().toLowerCase();
		if (!name) throw new Error("Command name must not be empty");

		const verbs = [name, ...(command.aliases ?? []).map((alias) => alias.trim().toLowerCase())];
		const seen = new Set<string>();
		for (const verb of verbs) {
			if (!verb) throw new Error(`Command ${name} has an empty alias`);
			if (seen.has(verb)) {
				throw new Error(`Verb "${verb}" appears twice in command ${name}`);
			}
			seen.add(verb);
			const existing = this.verbs.get(verb);
			if (existing) {
				throw new Error(
					`Verb "${verb}" of command ${name} is already registered by ${existing.name}`
				);
			}
		}
		for (const verb of verbs) this.verbs.set(verb, command);
		this.commands.push(command);
		logger.debug(`Registered command ${name}`, { aliases: verbs.slice(1) });
	}

	/** Case-insensitive lookup by name or alias. */
	public get(verb: string): Command | undefined {
		return this.verbs.get(verb.toLowerCase());
	}

	/** Each command once, in registration order. */
	public getAllCommands(): Command[] {
		return [...this.commands];
	}

	/**
	 * Commands to list in help. With `requiresCharacter` given, only
	 * commands whose gate matches are returned.
	 */
	public getCommandsForHelp(requiresCharacter?: boolean): Command[] {
		if (requiresCharacter === undefined) return this.getAllCommands();
		return this.commands.filter(
			(command) => (command.requiresCharacter ?? false) === requiresCharacter
		);
	}
}
