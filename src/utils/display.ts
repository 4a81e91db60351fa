/**
 * Display helpers shared by commands that show rooms.
 *
 * @module utils/display
 */
import type { Engine } from "../engine.js";
import { COLOR, color } from "../core/color.js";
import type { Room } from "../core/room.js";
import { wrap } from "./string.js";

/** Width descriptions are wrapped to. */
export const TEXT_WIDTH = 78;

export function formatExits(room: Room): string {
	const exits = room.getExitDirections();
	return `[Exits: ${exits.length > 0 ? exits.join(", ") : "none"}]`;
}

/**
 * The full room view: name, wrapped description, exits and whoever else
 * is there. Dark rooms hide the description and the occupants.
 *
 * @example
 * {YTown Square{x
 * A cobbled square.
 * [Exits: north, east]
 * Also here: Bob.
 */
export function describeRoom(
	engine: Engine,
	room: Room,
	viewerId?: string
): string {
	const lines = [color(room.name, COLOR.YELLOW)];
	if (!room.flags.lit) {
		lines.push("It is too dark to see much.", formatExits(room));
		return lines.join("\n");
	}
	lines.push(...wrap(room.description, TEXT_WIDTH), formatExits(room));

	const others: string[] = [];
	for (const occupant of room.getOccupants()) {
		if (occupant === viewerId) continue;
		const name = engine.getCharacterName(occupant);
		if (name) others.push(name);
	}
	if (others.length > 0) lines.push(`Also here: ${others.join(", ")}.`);
	return lines.join("\n");
}
