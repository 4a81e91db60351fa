/**
 * Shared movement command execution logic.
 *
 * The ten direction commands and `go` all end up in
 * {@link executeMovement}.
 *
 * @module commands/_movement
 */

import type { Command, CommandContext } from "../core/command.js";
import {
	DIRECTION,
	DIRECTION_SHORT,
	REVERSE_DIRECTION,
} from "../core/room.js";
import { describeRoom } from "../utils/display.js";
import logger from "../utils/logger.js";

function arrivalText(direction: DIRECTION): string {
	if (direction === DIRECTION.UP) return "from below";
	if (direction === DIRECTION.DOWN) return "from above";
	return `from the ${REVERSE_DIRECTION[direction]}`;
}

/**
 * Executes a movement command in the specified direction.
 *
 * @param context The command context
 * @param direction The direction to move
 */
export async function executeMovement(
	context: CommandContext,
	direction: DIRECTION
): Promise<void> {
	const { engine, session, connection } = context;
	const room = engine.getRoomFor(session);
	if (!room) {
		await connection.sendLine("You are not in a room.");
		return;
	}

	const targetId = room.getExit(direction);
	if (targetId === undefined) {
		await connection.sendLine(`You cannot go ${direction}.`);
		return;
	}
	const target = engine.world.getRoom(targetId);
	if (!target) {
		logger.warn(`${room} exit ${direction} leads to unknown room ${targetId}`);
		await connection.sendLine(`You cannot go ${direction}.`);
		return;
	}

	const characterId = session.characterId ?? "";
	const name = engine.getCharacterName(characterId) ?? "Someone";
	engine.broadcastToRoom(room.id, `${name} leaves ${direction}.`, session.id);
	engine.moveCharacter(session, target.id);
	engine.broadcastToRoom(
		target.id,
		`${name} arrives ${arrivalText(direction)}.`,
		session.id
	);
	await connection.sendLine(describeRoom(engine, target, characterId));
}

/**
 * Build the command for one direction, aliased by its short form.
 */
export function movementCommand(direction: DIRECTION): Command {
	return {
		name: direction,
		aliases: [DIRECTION_SHORT[direction]],
		usage: direction,
		description: `Walk ${direction}.`,
		requiresCharacter: true,
		execute: (context) => executeMovement(context, direction),
	};
}
