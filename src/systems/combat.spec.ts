import { suite, test } from "node:test";
import assert from "node:assert";
import { combatRound, engageEnemy } from "./combat.js";
import { GAME_MODE } from "../core/command.js";
import { createSeededRng, sequenceRng } from "../utils/random.js";
import { createTestGame, texts } from "../testing/fixtures.js";

suite("systems/combat.ts", () => {
	suite("attack", () => {
		test("should trade blows until the goblin falls", () => {
			const game = createTestGame();
			game.execute("north");
			const goblin = game.combatTarget;
			assert.ok(goblin);
			assert.strictEqual(goblin.id, "goblin");

			let result = combatRound(game, "attack");
			assert.deepStrictEqual(result.messages, [
				"You attack the Goblin for 9 damage!",
				"The Goblin attacks you for 4 damage!",
			]);
			assert.strictEqual(goblin.hp, 11);
			assert.strictEqual(game.player.hp, 96);

			result = combatRound(game, "attack");
			assert.strictEqual(goblin.hp, 2);
			assert.strictEqual(game.player.hp, 92);

			result = combatRound(game, "attack");
			assert.deepStrictEqual(result.messages, [
				"You attack the Goblin for 9 damage! The Goblin has been defeated!",
				"You gained 15 XP and 5 gold.",
			]);
			assert.strictEqual(result.combatEnded, true);
			assert.strictEqual(game.player.hp, 92);
			assert.strictEqual(game.player.xp, 15);
			assert.strictEqual(game.player.gold, 5);
			assert.strictEqual(game.combatTarget, undefined);
			assert.strictEqual(game.mode, GAME_MODE.EXPLORING);
		});

		test("should multiply a critical hit and truncate it", () => {
			const game = createTestGame({ rng: sequenceRng([0.05]) });
			game.execute("north");
			const result = combatRound(game, "attack");
			assert.strictEqual(result.messages[0], "You attack the Goblin for 14 damage! CRITICAL HIT!");
			assert.strictEqual(game.combatTarget?.hp, 6);
		});

		test("should add the weapon and subtract the armor", () => {
			const game = createTestGame();
			game.player.inventory.push("iron_sword", "leather_armor");
			game.player.equippedWeapon = "iron_sword";
			game.player.equippedArmor = "leather_armor";
			game.execute("north");
			assert.deepStrictEqual(combatRound(game, "attack").messages, [
				"You attack the Goblin for 14 damage!",
				"The Goblin attacks you for 2 damage!",
			]);
		});

		test("should end the game when the player dies", () => {
			const game = createTestGame();
			game.execute("west");
			game.execute("west");
			assert.strictEqual(game.combatTarget?.id, "ogre");
			const result = combatRound(game, "attack");
			assert.strictEqual(result.messages[1], "The Ogre attacks you for 198 damage! You have been slain!");
			assert.strictEqual(result.playerDied, true);
			assert.strictEqual(game.player.hp, 0);
			assert.strictEqual(game.mode, GAME_MODE.GAME_OVER);
		});
	});

	suite("flee", () => {
		test("should escape without a counter-attack", () => {
			const game = createTestGame({ rng: sequenceRng([0.2]) });
			game.execute("north");
			const result = combatRound(game, "flee");
			assert.deepStrictEqual(result.messages, ["You successfully flee from combat!"]);
			assert.strictEqual(game.player.hp, 100);
			assert.strictEqual(game.mode, GAME_MODE.EXPLORING);
			assert.strictEqual(game.getRoomEnemy()?.isAlive(), true);
		});

		test("should take a hit on a failed escape", () => {
			const game = createTestGame();
			game.execute("north");
			const result = combatRound(game, "flee");
			assert.deepStrictEqual(result.messages, [
				"You failed to escape! The Goblin attacks you for 4 damage!",
			]);
			assert.strictEqual(game.player.hp, 96);
			assert.strictEqual(game.mode, GAME_MODE.IN_COMBAT);
		});

		test("should succeed about half the time", () => {
			const game = createTestGame({ rng: createSeededRng(20240611) });
			game.execute("north");
			const goblin = game.getRoomEnemy();
			assert.ok(goblin);
			let escapes = 0;
			const trials = 10000;
			for (let i = 0; i < trials; i++) {
				game.startCombat(goblin);
				game.player.hp = 100;
				if (combatRound(game, "flee").combatEnded) escapes++;
			}
			const rate = escapes / trials;
			assert.ok(rate > 0.47 && rate < 0.53, `flee rate was ${rate}`);
		});
	});

	suite("use", () => {
		test("should win the fight when the item kills", () => {
			const game = createTestGame();
			game.player.addItem("fire_scroll");
			game.execute("north");
			const result = combatRound(game, "use", ["fire", "scroll"]);
			assert.deepStrictEqual(result.messages, [
				"You used Fire Scroll and dealt 24 damage to Goblin!",
				"You gained 15 XP and 5 gold.",
			]);
			assert.strictEqual(game.player.hp, 100);
			assert.strictEqual(game.player.hasItem("fire_scroll"), false);
		});

		test("should let the enemy answer a heal", () => {
			const game = createTestGame();
			game.player.addItem("health_potion");
			game.player.hp = 50;
			game.execute("north");
			const result = combatRound(game, "use", ["potion"]);
			assert.deepStrictEqual(result.messages, [
				"You used Health Potion and restored 30 HP.",
				"The Goblin attacks you for 4 damage!",
			]);
			assert.strictEqual(game.player.hp, 76);
		});

		test("should not spend the turn on a failed use", () => {
			const game = createTestGame();
			game.execute("north");
			const result = combatRound(game, "use", ["elixir"]);
			assert.deepStrictEqual(result.messages, ["You don't have 'elixir' in your inventory."]);
			assert.strictEqual(game.player.hp, 100);
		});

		test("should skip the counter-attack when the item ends combat", () => {
			const game = createTestGame();
			game.player.addItem("hourglass");
			game.execute("north");
			const result = combatRound(game, "use", ["hourglass"]);
			assert.strictEqual(result.combatEnded, true);
			assert.strictEqual(result.messages.length, 1);
			assert.strictEqual(game.player.hp, 100);
			assert.strictEqual(game.getRoomEnemy()?.isAlive(), true);
		});
	});

	suite("victory over the boss", () => {
		test("should grant the win item", () => {
			const game = createTestGame();
			game.enterRoom("throne");
			game.takeOutput();
			combatRound(game, "attack");
			combatRound(game, "attack");
			const result = combatRound(game, "attack");
			assert.deepStrictEqual(result.messages, [
				"You attack the Dungeon Warlord for 10 damage! The Dungeon Warlord has been defeated!",
				"You gained 100 XP and 50 gold. LEVEL UP! You are now level 2! The enemy dropped: Iron Sword. You obtained the Warlord's Amulet!",
			]);
			assert.strictEqual(game.player.hasItem("warlord_amulet"), true);
			assert.strictEqual(game.won, true);
		});

		test("should leave the win item on the floor when the pack is full", () => {
			const game = createTestGame();
			for (let i = 0; i < 10; i++) game.player.addItem("pebble");
			game.enterRoom("throne");
			combatRound(game, "attack");
			combatRound(game, "attack");
			const result = combatRound(game, "attack");
			assert.strictEqual(
				result.messages[1],
				"You gained 100 XP and 50 gold. LEVEL UP! You are now level 2! The Warlord's Amulet falls to the floor. Your pack is full, so make room to take it."
			);
			assert.deepStrictEqual(game.currentRoom.items, ["warlord_amulet"]);
			assert.strictEqual(game.won, false);

			game.execute("drop pebble");
			game.execute("take amulet");
			assert.strictEqual(game.won, true);
		});
	});

	suite("engageEnemy()", () => {
		test("should refuse when nothing is here", () => {
			const game = createTestGame();
			assert.deepStrictEqual(engageEnemy(game), {
				success: false,
				message: "There's nothing to attack here.",
			});
		});

		test("should restart a fight after fleeing", () => {
			const game = createTestGame({ rng: sequenceRng([0.2]) });
			game.execute("north");
			combatRound(game, "flee");
			assert.deepStrictEqual(texts(game.execute("attack")), ["You engage the Goblin in combat!"]);
			assert.strictEqual(game.mode, GAME_MODE.IN_COMBAT);
		});
	});
});
