/**
 * Core world module.
 *
 * The world is the room table plus an index of where every character is.
 * All placement goes through `place`, `move` and `remove`, which update the
 * index and both occupant sets without yielding, so a character is never
 * seen in two rooms or (while placed) in none.
 *
 * @module core/world
 */
import logger from "../utils/logger.js";
import { Room } from "./room.js";

export class World {
	private readonly rooms = new Map<string, Room>();
	private readonly locations = new Map<string, string>();

	get size(): number {
		return this.rooms.size;
	}

	/**
	 * Add a room. Only used while loading content.
	 *
	 * @throws Error when the id is taken
	 */
	public addRoom(room: Room): void {
		if (this.rooms.has(room.id)) {
			throw new Error(`Duplicate room id: ${room.id}`);
		}
		this.rooms.set(room.id, room);
	}

	public getRoom(id: string): Room | undefined {
		return this.rooms.get(id);
	}

	public hasRoom(id: string): boolean {
		return this.rooms.has(id);
	}

	public getRooms(): Room[] {
		return Array.from(this.rooms.values());
	}

	/** Room id the character is in, if placed. */
	public locate(characterId: string): string | undefined {
		return this.locations.get(characterId);
	}

	/**
	 * Put a character in a room, taking it out of wherever it was.
	 *
	 * @returns false when the room does not exist
	 */
	public place(characterId: string, roomId: string): boolean {
		const destination = this.rooms.get(roomId);
		if (!destination) {
			logger.warn(`Cannot place ${characterId} in unknown room ${roomId}`);
			return false;
		}
		const previousId = this.locations.get(characterId);
		if (previousId !== undefined) {
			this.rooms.get(previousId)?.removeOccupant(characterId);
		}
		destination.addOccupant(characterId);
		this.locations.set(characterId, roomId);
		return true;
	}

	/**
	 * Move a placed character. Unplaced characters are refused.
	 *
	 * @returns false when the character is not placed or the room is unknown
	 */
	public move(characterId: string, toRoomId: string): boolean {
		if (!this.locations.has(characterId)) {
			logger.warn(`Cannot move unplaced character ${characterId}`);
			return false;
		}
		return this.place(characterId, toRoomId);
	}

	/**
	 * Take a character out of the world.
	 *
	 * @returns the room it was in
	 */
	public remove(characterId: string): string | undefined {
		const roomId = this.locations.get(characterId);
		if (roomId === undefined) return undefined;
		this.rooms.get(roomId)?.removeOccupant(characterId);
		this.locations.delete(characterId);
		return roomId;
	}
}
