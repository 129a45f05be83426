/**
 * The dungeon graph.
 *
 * A Dungeon is built fresh for every game from the content room
 * definitions. Exits are fixed; the only graph change during play is a
 * locked exit being unlocked, and that is permanent for the game.
 *
 * @example
 * ```typescript
 * const dungeon = Dungeon.fromDefinitions(content.rooms, content.startingRoom);
 * const start = dungeon.getStartingRoom();
 * const next = dungeon.getExitTarget(start, DIRECTION.NORTH);
 * ```
 *
 * @module core/dungeon
 */

import type { DIRECTION } from "../utils/direction.js";
import { type Chest, Room, type RoomDefinition } from "./room.js";

export class Dungeon {
	private readonly rooms: Map<string, Room>;
	readonly startingRoomId: string;

	constructor(rooms: Iterable<Room>, startingRoomId: string) {
		this.rooms = new Map();
		for (const room of rooms) this.rooms.set(room.id, room);
		this.startingRoomId = startingRoomId;
	}

	static fromDefinitions(
		definitions: Iterable<RoomDefinition>,
		startingRoomId: string
	): Dungeon {
		const rooms: Room[] = [];
		for (const definition of definitions) rooms.push(new Room(definition));
		return new Dungeon(rooms, startingRoomId);
	}

	getRoom(id: string): Room | undefined {
		return this.rooms.get(id);
	}

	getStartingRoom(): Room {
		const room = this.rooms.get(this.startingRoomId);
		if (!room) throw new Error(`Starting room '${this.startingRoomId}' is missing`);
		return room;
	}

	getRooms(): IterableIterator<Room> {
		return this.rooms.values();
	}

	/**
	 * The room an exit leads to, ignoring locks.
	 */
	getExitTarget(room: Room, direction: DIRECTION): Room | undefined {
		const targetId = room.getExit(direction);
		return targetId === undefined ? undefined : this.rooms.get(targetId);
	}

	isExitLocked(room: Room, direction: DIRECTION): boolean {
		return room.isExitLocked(direction);
	}

	getRequiredKey(room: Room, direction: DIRECTION): string | undefined {
		return room.getRequiredKey(direction);
	}

	unlockExit(room: Room, direction: DIRECTION): boolean {
		return room.unlockExit(direction);
	}

	addItem(room: Room, itemId: string): void {
		room.addItem(itemId);
	}

	removeItem(room: Room, itemId: string): boolean {
		return room.removeItem(itemId);
	}

	getChest(room: Room): Chest | undefined {
		return room.chest;
	}

	getVisitedRooms(): Room[] {
		return [...this.rooms.values()].filter((room) => room.visited);
	}
}
