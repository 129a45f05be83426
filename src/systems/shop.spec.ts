import { suite, test } from "node:test";
import assert from "node:assert";
import { buyItem, listShop, sellItem, sellPrice } from "./shop.js";
import { equipItem } from "./inventory.js";
import { createTestGame } from "../testing/fixtures.js";
import type { Game } from "../game.js";

function atMarket(gold = 0): Game {
	const game = createTestGame();
	game.enterRoom("market");
	game.player.gold = gold;
	return game;
}

suite("systems/shop.ts", () => {
	test("sellPrice() should be half the value rounded down", () => {
		assert.strictEqual(sellPrice(40), 20);
		assert.strictEqual(sellPrice(15), 7);
		assert.strictEqual(sellPrice(1), 0);
	});

	test("should only trade where there is a shop", () => {
		const game = createTestGame();
		game.player.gold = 100;
		const closed = { success: false, message: "There's no shop here." };
		assert.deepStrictEqual(listShop(game), closed);
		assert.deepStrictEqual(buyItem(game, "potion"), closed);
		assert.deepStrictEqual(sellItem(game, "potion"), closed);
		assert.strictEqual(listShop(atMarket()).success, true);
	});

	suite("buyItem()", () => {
		test("should charge full value", () => {
			const game = atMarket(50);
			assert.deepStrictEqual(buyItem(game, "iron"), {
				success: true,
				message: "You bought Iron Sword for 40 gold.",
			});
			assert.strictEqual(game.player.gold, 10);
			assert.deepStrictEqual(game.player.inventory, ["iron_sword"]);
		});

		test("should refuse what the player can't afford", () => {
			const game = atMarket(10);
			assert.deepStrictEqual(buyItem(game, "potion"), {
				success: false,
				message: "You can't afford Health Potion. It costs 15 gold and you have 10.",
			});
			assert.strictEqual(game.player.gold, 10);
		});

		test("should refuse items the shop does not stock", () => {
			const game = atMarket(100);
			assert.strictEqual(buyItem(game, "torch").message, "The shop doesn't sell 'torch'.");
		});

		test("should keep the gold when the pack is full", () => {
			const game = atMarket(100);
			for (let i = 0; i < 10; i++) game.player.addItem("pebble");
			assert.deepStrictEqual(buyItem(game, "potion"), {
				success: false,
				message: "Your inventory is full!",
			});
			assert.strictEqual(game.player.gold, 100);
		});
	});

	suite("sellItem()", () => {
		test("should pay half value", () => {
			const game = atMarket();
			game.player.addItem("torch");
			assert.deepStrictEqual(sellItem(game, "torch"), {
				success: true,
				message: "You sold Torch for 2 gold.",
			});
			assert.strictEqual(game.player.gold, 2);
			assert.deepStrictEqual(game.player.inventory, []);
		});

		test("should refuse equipped items", () => {
			const game = atMarket();
			game.player.addItem("iron_sword");
			equipItem(game, "iron");
			assert.strictEqual(sellItem(game, "iron").message, "You can't sell equipped items. Unequip first.");
			assert.deepStrictEqual(game.player.inventory, ["iron_sword"]);
		});

		test("should refuse quest items", () => {
			const game = atMarket();
			game.player.addItem("warlord_amulet");
			assert.strictEqual(sellItem(game, "amulet").message, "You can't sell quest items.");
			assert.strictEqual(game.player.gold, 0);
		});

		test("should refuse worthless items", () => {
			const game = atMarket();
			game.player.addItem("pebble");
			assert.deepStrictEqual(sellItem(game, "pebble"), {
				success: false,
				message: "Pebble has no value to the shopkeeper.",
			});
			assert.deepStrictEqual(game.player.inventory, ["pebble"]);
		});

		test("should refuse items the player does not have", () => {
			const game = atMarket();
			assert.strictEqual(sellItem(game, "crown").message, "You don't have 'crown' to sell.");
		});
	});
});
