/**
 * Package: world - room content loader
 *
 * Reads every `*.yaml` / `*.yml` file under `data/world/rooms` and builds a
 * {@link World} from them. Each file holds a `rooms:` list:
 *
 * ```yaml
 * rooms:
 *   - id: square
 *     name: Town Square
 *     area: town
 *     description: A cobbled square.
 *     exits:
 *       north: gate
 *     properties:
 *       outdoor: true
 * ```
 *
 * Missing directories, empty or malformed files, rooms without the required
 * fields and duplicate ids abort the load with a {@link WorldLoadError}.
 * Exits to unknown rooms and one-way exits are only logged.
 *
 * @module package/world
 */
import { join, relative } from "path";
import { readdir, readFile } from "fs/promises";
import YAML from "js-yaml";
import logger from "../utils/logger.js";
import { getSafeRootDirectory } from "../utils/path.js";
import {
	DIRECTIONS,
	REVERSE_DIRECTION,
	Room,
	parseDirection,
	type DIRECTION,
	type RoomOptions,
} from "../core/room.js";
import { World } from "../core/world.js";

export const ROOMS_DIRECTORY = join(
	getSafeRootDirectory(),
	"data",
	"world",
	"rooms"
);

export class WorldLoadError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "WorldLoadError";
	}
}

type Entry = Record<string, unknown>;

function isEntry(value: unknown): value is Entry {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isRoomFile(filename: string): boolean {
	return filename.endsWith(".yaml") || filename.endsWith(".yml");
}

const REQUIRED_FIELDS = ["id", "name", "area", "description"] as const;

/**
 * Turn one `rooms:` entry into room options.
 *
 * @throws WorldLoadError when a required field is missing or mistyped
 */
export function parseRoom(entry: unknown, source: string): RoomOptions {
	if (!isEntry(entry)) {
		throw new WorldLoadError(`Room entry in ${source} is not a mapping`);
	}
	const label = typeof entry.id === "string" ? entry.id : "unknown";
	const fields: Record<(typeof REQUIRED_FIELDS)[number], string> = {
		id: "",
		name: "",
		area: "",
		description: "",
	};
	for (const field of REQUIRED_FIELDS) {
		const value = entry[field];
		if (typeof value !== "string" || value.trim() === "") {
			throw new WorldLoadError(
				`Room '${label}' in ${source} missing required field: ${field}`
			);
		}
		fields[field] = field === "description" ? value.trim() : value;
	}

	const exits: Partial<Record<DIRECTION, string>> = {};
	if (entry.exits !== undefined) {
		if (!isEntry(entry.exits)) {
			throw new WorldLoadError(
				`Room '${label}' in ${source} has invalid exits (must be a mapping)`
			);
		}
		for (const [name, target] of Object.entries(entry.exits)) {
			const direction = parseDirection(name);
			if (!direction || typeof target !== "string") {
				logger.warn(`Room '${label}' has unusable exit '${name}'; skipped`);
				continue;
			}
			exits[direction] = target;
		}
	}

	let properties: Entry = {};
	if (entry.properties !== undefined) {
		if (!isEntry(entry.properties)) {
			throw new WorldLoadError(
				`Room '${label}' in ${source} has invalid properties (must be a mapping)`
			);
		}
		properties = entry.properties;
	}

	return {
		...fields,
		exits,
		flags: {
			outdoor: properties.outdoor === true,
			lit: properties.lit !== false,
			safeZone: properties.safe_zone === true,
		},
	};
}

/**
 * Parse one room file.
 *
 * @throws WorldLoadError on invalid YAML or a missing `rooms` list
 */
export function parseRoomFile(content: string, source: string): RoomOptions[] {
	let parsed: unknown;
	try {
		parsed = YAML.load(content);
	} catch (error) {
		const reason = error instanceof Error ? error.message : String(error);
		throw new WorldLoadError(`YAML parsing error in ${source}: ${reason}`);
	}
	if (parsed === undefined || parsed === null) {
		throw new WorldLoadError(`Empty YAML file: ${source}`);
	}
	if (!isEntry(parsed) || !Array.isArray(parsed.rooms)) {
		throw new WorldLoadError(`Missing 'rooms' list in ${source}`);
	}
	return parsed.rooms.map((entry: unknown) => parseRoom(entry, source));
}

/**
 * Problems with exits that do not stop the server from running.
 */
export function validateExits(world: World): string[] {
	const warnings: string[] = [];
	for (const room of world.getRooms()) {
		for (const direction of DIRECTIONS) {
			const targetId = room.getExit(direction);
			if (targetId === undefined) continue;
			const target = world.getRoom(targetId);
			if (!target) {
				warnings.push(
					`Room '${room.id}' has exit '${direction}' to unknown room '${targetId}'`
				);
				continue;
			}
			const back = target.getExit(REVERSE_DIRECTION[direction]);
			if (back !== room.id) {
				warnings.push(
					`One-way exit: '${room.id}' ${direction} -> '${targetId}'`
				);
			}
		}
	}
	return warnings;
}

/**
 * Load every room file in `directory` into a new world.
 *
 * @throws WorldLoadError when the content cannot be loaded
 */
export async function loadWorld(
	directory: string = ROOMS_DIRECTORY
): Promise<World> {
	let filenames: string[];
	try {
		filenames = (await readdir(directory)).filter(isRoomFile).sort();
	} catch (error) {
		const reason = error instanceof Error ? error.message : String(error);
		throw new WorldLoadError(`Cannot read room directory ${directory}: ${reason}`);
	}
	if (filenames.length === 0) {
		throw new WorldLoadError(`No YAML files found in ${directory}`);
	}

	const world = new World();
	for (const filename of filenames) {
		const path = join(directory, filename);
		const source = relative(getSafeRootDirectory(), path);
		const content = await readFile(path, "utf-8");
		const rooms = parseRoomFile(content, source);
		for (const options of rooms) {
			if (world.hasRoom(options.id)) {
				throw new WorldLoadError(
					`Duplicate room ID '${options.id}' found in ${source}`
				);
			}
			world.addRoom(new Room(options));
		}
		logger.debug(`Loaded ${rooms.length} room(s) from ${source}`);
	}

	for (const warning of validateExits(world)) logger.warn(warning);
	logger.info(`Loaded ${world.size} room(s)`);
	return world;
}
