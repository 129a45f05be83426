import { suite, test } from "node:test";
import assert from "node:assert";
import { Dungeon } from "./dungeon.js";
import type { RoomDefinition } from "./room.js";
import { DIRECTION } from "../utils/direction.js";

function room(id: string, exits: [DIRECTION, string][], locked: [DIRECTION, string][] = []): RoomDefinition {
	return {
		id,
		name: id,
		description: `The ${id}.`,
		shortDescription: id,
		exits: new Map(exits),
		lockedExits: new Map(locked),
		items: [],
		tavern: false,
		lore: {},
	};
}

function createDungeon(): Dungeon {
	return Dungeon.fromDefinitions(
		[
			room("hall", [[DIRECTION.NORTH, "vault"], [DIRECTION.EAST, "yard"]], [[DIRECTION.NORTH, "iron_key"]]),
			room("vault", [[DIRECTION.SOUTH, "hall"]]),
			room("yard", [[DIRECTION.WEST, "hall"]]),
		],
		"hall"
	);
}

suite("core/dungeon.ts", () => {
	test("should find exit targets", () => {
		const dungeon = createDungeon();
		const hall = dungeon.getStartingRoom();
		assert.strictEqual(dungeon.getExitTarget(hall, DIRECTION.EAST)?.id, "yard");
		assert.strictEqual(dungeon.getExitTarget(hall, DIRECTION.WEST), undefined);
	});

	test("should keep an unlocked exit unlocked", () => {
		const dungeon = createDungeon();
		const hall = dungeon.getStartingRoom();
		assert.strictEqual(dungeon.isExitLocked(hall, DIRECTION.NORTH), true);
		assert.strictEqual(dungeon.getRequiredKey(hall, DIRECTION.NORTH), "iron_key");
		assert.strictEqual(dungeon.unlockExit(hall, DIRECTION.NORTH), true);
		assert.strictEqual(dungeon.isExitLocked(hall, DIRECTION.NORTH), false);
		assert.strictEqual(dungeon.unlockExit(hall, DIRECTION.NORTH), false);
		assert.strictEqual(dungeon.isExitLocked(hall, DIRECTION.NORTH), false);
	});

	test("should not share state between dungeons built from the same definitions", () => {
		const first = createDungeon();
		const second = createDungeon();
		first.unlockExit(first.getStartingRoom(), DIRECTION.NORTH);
		first.addItem(first.getStartingRoom(), "torch");
		assert.strictEqual(second.isExitLocked(second.getStartingRoom(), DIRECTION.NORTH), true);
		assert.deepStrictEqual(second.getStartingRoom().items, []);
	});

	test("removeItem() should take the first match only", () => {
		const dungeon = createDungeon();
		const hall = dungeon.getStartingRoom();
		dungeon.addItem(hall, "torch");
		dungeon.addItem(hall, "torch");
		assert.strictEqual(dungeon.removeItem(hall, "torch"), true);
		assert.deepStrictEqual(hall.items, ["torch"]);
		assert.strictEqual(dungeon.removeItem(hall, "rope"), false);
	});

	test("getVisitedRooms() should list visited rooms only", () => {
		const dungeon = createDungeon();
		dungeon.getStartingRoom().visited = true;
		assert.deepStrictEqual(
			dungeon.getVisitedRooms().map((visited) => visited.id),
			["hall"]
		);
	});

	test("getChest() should be undefined for a room without one", () => {
		const dungeon = createDungeon();
		assert.strictEqual(dungeon.getChest(dungeon.getStartingRoom()), undefined);
	});

	test("getStartingRoom() should throw when the room is missing", () => {
		const dungeon = new Dungeon([], "nowhere");
		assert.throws(() => dungeon.getStartingRoom(), /nowhere/);
	});
});
