/**
 * Tell command - a private message to one player, wherever they are.
 *
 * @example
 * ```
 * tell Bob meet me at the gate
 * whisper Bob it's a secret
 * ```
 *
 * **Aliases:** `whisper`
 * @module commands/tell
 */

import type { Command } from "../core/command.js";

export const command = {
	name: "tell",
	aliases: ["whisper"],
	usage: "tell <player> <message>",
	description: "Send a private message to another player.",
	minArgs: 2,
	requiresCharacter: true,
	async execute({ engine, session, connection, args, argText }) {
		const targetName = args[0] ?? "";
		const target = engine.findPlayingSession(targetName);
		const targetId = target?.characterId;
		if (!target || !targetId) {
			await connection.sendLine("Nobody by that name is playing.");
			return;
		}
		if (target === session) {
			await connection.sendLine("Talking to yourself again?");
			return;
		}
		const message = argText.slice(targetName.length).trim();
		const name = engine.getCharacterName(session.characterId ?? "") ?? "Someone";
		const targetDisplay = engine.getCharacterName(targetId) ?? targetName;
		engine.sendToCharacter(targetId, `{M${name} tells you, "${message}"{x`);
		await connection.sendLine(`{MYou tell ${targetDisplay}, "${message}"{x`);
	},
} satisfies Command;
