import { suite, test } from "node:test";
import assert from "node:assert";
import { SAVE_VERSION, type Snapshot, createSnapshot, restoreSnapshot } from "./snapshot.js";
import { SaveError } from "./errors.js";
import { createTestContent, createTestGame } from "../testing/fixtures.js";

function snapshotOfPlayedGame(): Snapshot {
	const game = createTestGame();
	game.execute("take torch");
	game.execute("open chest");
	game.execute("up");
	game.player.gold = 42;
	return createSnapshot(game);
}

suite("core/snapshot.ts", () => {
	suite("createSnapshot()", () => {
		test("should record the player and current room", () => {
			const snapshot = snapshotOfPlayedGame();
			assert.strictEqual(snapshot.version, SAVE_VERSION);
			assert.strictEqual(snapshot.current_room, "tavern");
			assert.strictEqual(snapshot.player.gold, 42);
			assert.deepStrictEqual(snapshot.player.inventory.slice(0, 2), ["torch", "leather_armor"]);
			assert.strictEqual(snapshot.player.equipped_weapon, null);
		});

		test("should record every room's mutable state", () => {
			const snapshot = snapshotOfPlayedGame();
			assert.deepStrictEqual(snapshot.rooms.hall.items, ["health_potion"]);
			assert.strictEqual(snapshot.rooms.hall.chest?.opened, true);
			assert.deepStrictEqual(snapshot.rooms.hall.locked_exits, { east: "iron_key" });
			assert.strictEqual(snapshot.rooms.tavern.visited, true);
			assert.strictEqual(snapshot.rooms.den.visited, false);
			assert.strictEqual(snapshot.enemies.den.hp, 20);
		});
	});

	suite("restoreSnapshot()", () => {
		test("should rebuild the same state", () => {
			const content = createTestContent();
			const snapshot = snapshotOfPlayedGame();
			const state = restoreSnapshot(content, snapshot);
			assert.strictEqual(state.currentRoomId, "tavern");
			assert.strictEqual(state.player.gold, 42);
			assert.deepStrictEqual(state.dungeon.getRoom("hall")?.items, ["health_potion"]);
			assert.strictEqual(state.dungeon.getRoom("hall")?.chest?.opened, true);
			assert.strictEqual(state.enemies.get("den")?.isAlive(), true);
			assert.deepStrictEqual(createSnapshot(state), snapshot);
		});

		test("should reject a different major version", () => {
			const snapshot = { ...snapshotOfPlayedGame(), version: "2.0" };
			assert.throws(
				() => restoreSnapshot(createTestContent(), snapshot),
				(error: unknown) =>
					error instanceof SaveError && error.message === "Incompatible save file version: 2.0"
			);
		});

		test("should accept a newer minor version", () => {
			const snapshot = { ...snapshotOfPlayedGame(), version: "1.3" };
			assert.strictEqual(restoreSnapshot(createTestContent(), snapshot).currentRoomId, "tavern");
		});

		test("should reject items the content does not define", () => {
			const snapshot = snapshotOfPlayedGame();
			snapshot.player.inventory.push("golden_goose");
			assert.throws(() => restoreSnapshot(createTestContent(), snapshot), /unknown item 'golden_goose'/);
		});

		test("should reject unknown rooms", () => {
			const snapshot = { ...snapshotOfPlayedGame(), current_room: "moon" };
			assert.throws(() => restoreSnapshot(createTestContent(), snapshot), /unknown room 'moon'/);
		});

		test("should reject equipment that is not carried", () => {
			const snapshot = snapshotOfPlayedGame();
			snapshot.player.equipped_weapon = "iron_sword";
			assert.throws(() => restoreSnapshot(createTestContent(), snapshot), /not in the inventory/);
		});

		test("should reject hp above max hp", () => {
			const snapshot = snapshotOfPlayedGame();
			snapshot.player.hp = snapshot.player.max_hp + 1;
			assert.throws(() => restoreSnapshot(createTestContent(), snapshot), /'hp' is above 'max_hp'/);
		});

		test("should reject data that is not a mapping", () => {
			assert.throws(() => restoreSnapshot(createTestContent(), "garbage"), SaveError);
			assert.throws(() => restoreSnapshot(createTestContent(), null), SaveError);
		});
	});
});
