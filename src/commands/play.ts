/**
 * Play command - enter the world as one of your characters.
 *
 * @example
 * ```
 * play Ada
 * ```
 *
 * @module commands/play
 */

import type { Command } from "../core/command.js";
import { describeRoom } from "../utils/display.js";

export const command = {
	name: "play",
	usage: "play <name>",
	description: "Enter the world as one of your characters.",
	minArgs: 1,
	async execute({ engine, session, connection, args }) {
		if (!session.userId) {
			await connection.sendLine("You must log in first.");
			return;
		}
		if (session.characterId) {
			const current = engine.getCharacterName(session.characterId);
			await connection.sendLine(`You are already playing ${current ?? "a character"}.`);
			return;
		}
		const [name = ""] = args;
		const character = await engine.store.findCharacterByName(name);
		if (!character || character.userId !== session.userId) {
			await connection.sendLine(`You have no character named ${name}.`);
			return;
		}
		if (engine.findPlayingSession(character.name)) {
			await connection.sendLine("That character is already in the game.");
			return;
		}
		const room = engine.enterWorld(session, character);
		if (!room) {
			await connection.sendLine("That character cannot enter the world right now.");
			return;
		}
		await engine.store.updateCharacter(character.id, {
			lastPlayedAt: new Date().toISOString(),
		});
		engine.broadcastToRoom(room.id, `${character.name} has entered the game.`, session.id);
		await connection.sendLine(
			`Welcome, ${character.name}!\n${describeRoom(engine, room, character.id)}`
		);
	},
} satisfies Command;
