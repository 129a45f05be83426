/**
 * Shop system: buying at full value, selling at half.
 *
 * Only rooms with a shop trade. The shop's stock never runs out, and it buys
 * anything that is neither equipped nor a quest item.
 *
 * @module systems/shop
 */
import type { Game } from "../game.js";
import { type SystemResult, fail, ok } from "../core/message.js";
import { renderShop } from "../utils/display.js";
import logger from "../utils/logger.js";
import { findItemByName } from "./inventory.js";

const NO_SHOP = "There's no shop here.";

export function sellPrice(value: number): number {
	return Math.floor(value / 2);
}

export function listShop(game: Game): SystemResult {
	const room = game.currentRoom;
	if (!room.shop) return fail(NO_SHOP);
	return ok(renderShop(game, room));
}

export function buyItem(game: Game, name: string): SystemResult {
	const { shop } = game.currentRoom;
	if (!shop) return fail(NO_SHOP);
	const { player } = game;

	const itemId = findItemByName(game, shop.inventory, name);
	const item = itemId === undefined ? undefined : game.getItem(itemId);
	if (!item) return fail(`The shop doesn't sell '${name}'.`);
	if (player.gold < item.value) {
		return fail(
			`You can't afford ${item.name}. It costs ${item.value} gold and you have ${player.gold}.`
		);
	}
	if (!player.addItem(item.id)) return fail("Your inventory is full!");

	player.gold -= item.value;
	logger.debug(`${player.name} bought ${item.id} for ${item.value}`);
	return ok(`You bought ${item.name} for ${item.value} gold.`);
}

export function sellItem(game: Game, name: string): SystemResult {
	if (!game.currentRoom.shop) return fail(NO_SHOP);
	const { player } = game;

	const itemId = findItemByName(game, player.inventory, name);
	if (itemId === undefined) return fail(`You don't have '${name}' to sell.`);
	if (player.isEquipped(itemId)) return fail("You can't sell equipped items. Unequip first.");
	const item = game.getItem(itemId);
	if (item?.category === "quest") return fail("You can't sell quest items.");

	const price = sellPrice(item?.value ?? 0);
	if (price <= 0) return fail(`${game.itemName(itemId)} has no value to the shopkeeper.`);

	player.removeItem(itemId);
	player.addGold(price);
	logger.debug(`${player.name} sold ${itemId} for ${price}`);
	return ok(`You sold ${game.itemName(itemId)} for ${price} gold.`);
}
