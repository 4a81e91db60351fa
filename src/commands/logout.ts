/**
 * Logout command - leave the game and the account, keeping the connection.
 *
 * @module commands/logout
 */

import type { Command } from "../core/command.js";
import { SESSION_STATE } from "../core/session.js";

export const command = {
	name: "logout",
	usage: "logout",
	description: "Log out and return to the login prompt.",
	async execute({ engine, session, connection }) {
		if (!session.userId) {
			await connection.sendLine("You are not logged in.");
			return;
		}
		const characterId = session.characterId;
		if (characterId) {
			const name = engine.getCharacterName(characterId);
			const room = engine.getRoomFor(session);
			if (name && room) {
				engine.broadcastToRoom(room.id, `${name} has left the game.`, session.id);
			}
			await engine.leaveWorld(session);
		}
		session.clearIdentity();
		session.setState(SESSION_STATE.CONNECTED);
		await connection.sendLine("You have logged out.");
	},
} satisfies Command;
