/**
 * Core room module.
 *
 * Rooms are the nodes of the world graph. Their static data (name,
 * description, exits, flags) is fixed at load time; only the occupant set
 * changes while the server runs.
 *
 * @module core/room
 */

/**
 * The ten exit directions.
 */
export enum DIRECTION {
	NORTH = "north",
	SOUTH = "south",
	EAST = "east",
	WEST = "west",
	NORTHEAST = "northeast",
	NORTHWEST = "northwest",
	SOUTHEAST = "southeast",
	SOUTHWEST = "southwest",
	UP = "up",
	DOWN = "down",
}

export const DIRECTIONS: readonly DIRECTION[] = [
	DIRECTION.NORTH,
	DIRECTION.SOUTH,
	DIRECTION.EAST,
	DIRECTION.WEST,
	DIRECTION.NORTHEAST,
	DIRECTION.NORTHWEST,
	DIRECTION.SOUTHEAST,
	DIRECTION.SOUTHWEST,
	DIRECTION.UP,
	DIRECTION.DOWN,
];

export const DIRECTION_SHORT: Record<DIRECTION, string> = {
	[DIRECTION.NORTH]: "n",
	[DIRECTION.SOUTH]: "s",
	[DIRECTION.EAST]: "e",
	[DIRECTION.WEST]: "w",
	[DIRECTION.NORTHEAST]: "ne",
	[DIRECTION.NORTHWEST]: "nw",
	[DIRECTION.SOUTHEAST]: "se",
	[DIRECTION.SOUTHWEST]: "sw",
	[DIRECTION.UP]: "u",
	[DIRECTION.DOWN]: "d",
};

export const REVERSE_DIRECTION: Record<DIRECTION, DIRECTION> = {
	[DIRECTION.NORTH]: DIRECTION.SOUTH,
	[DIRECTION.SOUTH]: DIRECTION.NORTH,
	[DIRECTION.EAST]: DIRECTION.WEST,
	[DIRECTION.WEST]: DIRECTION.EAST,
	[DIRECTION.NORTHEAST]: DIRECTION.SOUTHWEST,
	[DIRECTION.NORTHWEST]: DIRECTION.SOUTHEAST,
	[DIRECTION.SOUTHEAST]: DIRECTION.NORTHWEST,
	[DIRECTION.SOUTHWEST]: DIRECTION.NORTHEAST,
	[DIRECTION.UP]: DIRECTION.DOWN,
	[DIRECTION.DOWN]: DIRECTION.UP,
};

/**
 * Resolve a full or abbreviated direction name.
 *
 * @example
 * parseDirection("NE") // DIRECTION.NORTHEAST
 * parseDirection("sideways") // undefined
 */
export function parseDirection(text: string): DIRECTION | undefined {
	const lower = text.trim().toLowerCase();
	for (const direction of DIRECTIONS) {
		if (direction === lower || DIRECTION_SHORT[direction] === lower)
			return direction;
	}
	return undefined;
}

export interface RoomFlags {
	outdoor: boolean;
	lit: boolean;
	safeZone: boolean;
}

export interface RoomOptions {
	id: string;
	name: string;
	area: string;
	description: string;
	exits?: Partial<Record<DIRECTION, string>>;
	flags?: Partial<RoomFlags>;
}

export class Room {
	readonly id: string;
	readonly name: string;
	readonly area: string;
	readonly description: string;
	readonly flags: Readonly<RoomFlags>;
	private readonly exits = new Map<DIRECTION, string>();
	private readonly occupants = new Set<string>();

	constructor(options: RoomOptions) {
		this.id = options.id;
		this.name = options.name;
		this.area = options.area;
		this.description = options.description;
		this.flags = {
			outdoor: options.flags?.outdoor ?? false,
			lit: options.flags?.lit ?? true,
			safeZone: options.flags?.safeZone ?? false,
		};
		for (const direction of DIRECTIONS) {
			const target = options.exits?.[direction];
			if (target) this.exits.set(direction, target);
		}
	}

	toString(): string {
		return `{room ${this.id}}`;
	}

	public getExit(direction: DIRECTION): string | undefined {
		return this.exits.get(direction);
	}

	/** Exit directions in canonical order. */
	public getExitDirections(): DIRECTION[] {
		return DIRECTIONS.filter((direction) => this.exits.has(direction));
	}

	public addOccupant(characterId: string): void {
		this.occupants.add(characterId);
	}

	public removeOccupant(characterId: string): void {
		this.occupants.delete(characterId);
	}

	public hasOccupant(characterId: string): boolean {
		return this.occupants.has(characterId);
	}

	/** Snapshot of the occupant ids. */
	public getOccupants(): string[] {
		return Array.from(this.occupants);
	}

	get occupantCount(): number {
		return this.occupants.size;
	}
}
