/**
 * Inventory system: picking up, dropping, using and equipping items.
 *
 * Items are named by the player, not by id. {@link findItemByName} matches a
 * case-insensitive substring of the display name, and the first match in
 * list order wins, so "potion" finds whichever potion comes first.
 *
 * Every operation returns a {@link SystemResult}; nothing changes when it
 * fails.
 *
 * @module systems/inventory
 */
import type { Game } from "../game.js";
import { itemStatSummary } from "../core/item.js";
import { type SystemResult, fail, ok } from "../core/message.js";
import logger from "../utils/logger.js";
import { applyEffect } from "./effects.js";

export function findItemByName(
	game: Game,
	itemIds: ReadonlyArray<string>,
	name: string
): string | undefined {
	const needle = name.trim().toLowerCase();
	if (needle === "") return undefined;
	return itemIds.find((id) => game.itemName(id).toLowerCase().includes(needle));
}

/** Damage bonus of the equipped weapon, or 0. */
export function getWeaponDamage(game: Game): number {
	const weaponId = game.player.equippedWeapon;
	if (weaponId === undefined) return 0;
	const item = game.getItem(weaponId);
	return item?.category === "weapon" ? item.damage : 0;
}

/** Defense bonus of the equipped armor, or 0. */
export function getArmorDefense(game: Game): number {
	const armorId = game.player.equippedArmor;
	if (armorId === undefined) return 0;
	const item = game.getItem(armorId);
	return item?.category === "armor" ? item.defenseBonus : 0;
}

export function takeItem(game: Game, name: string): SystemResult {
	const room = game.currentRoom;
	const itemId = findItemByName(game, room.items, name);
	if (itemId === undefined) return fail(`There is no '${name}' here.`);
	if (!game.player.canAddItem()) return fail("Your inventory is full.");

	room.removeItem(itemId);
	game.player.addItem(itemId);
	logger.debug(`${game.player.name} took ${itemId} in ${room.id}`);
	return ok(`You picked up ${game.itemName(itemId)}.`);
}

/**
 * Picks up everything on the floor that fits, in floor order.
 */
export function takeAllItems(game: Game): SystemResult {
	const room = game.currentRoom;
	if (!room.hasItems()) return fail("There's nothing here to pick up.");

	const taken: string[] = [];
	const left: string[] = [];
	for (const itemId of [...room.items]) {
		if (game.player.addItem(itemId)) {
			room.removeItem(itemId);
			taken.push(game.itemName(itemId));
		} else {
			left.push(game.itemName(itemId));
		}
	}

	if (taken.length === 0) return fail("Your inventory is full.");
	let message = `You picked up: ${taken.join(", ")}.`;
	if (left.length > 0) message += ` (Inventory full, couldn't take: ${left.join(", ")})`;
	return ok(message);
}

export function dropItem(game: Game, name: string): SystemResult {
	const { player } = game;
	const itemId = findItemByName(game, player.inventory, name);
	if (itemId === undefined) return fail(`You don't have '${name}' in your inventory.`);
	if (player.isEquipped(itemId)) return fail("You must unequip that item first.");

	player.removeItem(itemId);
	game.currentRoom.addItem(itemId);
	return ok(`You dropped ${game.itemName(itemId)}.`);
}

/**
 * Uses a consumable. The item is only spent when its effect succeeds.
 */
export function useItem(game: Game, name: string): SystemResult {
	const { player } = game;
	const itemId = findItemByName(game, player.inventory, name);
	if (itemId === undefined) return fail(`You don't have '${name}' in your inventory.`);
	const item = game.getItem(itemId);
	if (item?.category !== "consumable") return fail(`You can't use ${game.itemName(itemId)} like that.`);

	const result = applyEffect(game, item);
	if (result.success) {
		player.removeItem(itemId);
		logger.debug(`${player.name} used ${itemId} (${item.effectType})`);
	}
	return result;
}

export function equipItem(game: Game, name: string): SystemResult {
	const { player } = game;
	const itemId = findItemByName(game, player.inventory, name);
	if (itemId === undefined) return fail(`You don't have '${name}' in your inventory.`);
	const item = game.getItem(itemId);

	let previous: string | undefined;
	if (item?.category === "weapon") {
		previous = player.equippedWeapon;
		player.equippedWeapon = itemId;
	} else if (item?.category === "armor") {
		previous = player.equippedArmor;
		player.equippedArmor = itemId;
	} else {
		return fail(`You can't equip ${game.itemName(itemId)}.`);
	}

	let message = `You equipped ${item.name}.`;
	if (previous !== undefined && previous !== itemId) {
		message += ` (Unequipped ${game.itemName(previous)})`;
	}
	return ok(message);
}

/**
 * Takes off equipment by name, or by slot with "weapon" or "armor".
 */
export function unequipItem(game: Game, name: string): SystemResult {
	const { player } = game;
	const needle = name.trim().toLowerCase();
	const equipped = [player.equippedWeapon, player.equippedArmor].filter(
		(id): id is string => id !== undefined
	);

	let itemId: string | undefined;
	if (needle === "weapon") itemId = player.equippedWeapon;
	else if (needle === "armor") itemId = player.equippedArmor;
	else itemId = findItemByName(game, equipped, needle);
	if (itemId === undefined) return fail(`You don't have '${name}' equipped.`);

	if (player.equippedWeapon === itemId) player.equippedWeapon = undefined;
	else player.equippedArmor = undefined;
	return ok(`You unequipped ${game.itemName(itemId)}.`);
}

/**
 * Describes an item carried or lying in the room, carried items first.
 */
export function examineItem(game: Game, name: string): SystemResult {
	const itemId =
		findItemByName(game, game.player.inventory, name) ??
		findItemByName(game, game.currentRoom.items, name);
	const item = itemId === undefined ? undefined : game.getItem(itemId);
	if (!item) return fail(`You don't see any '${name}' here.`);

	const summary = itemStatSummary(item);
	let message = `${item.name}: ${item.description}`;
	if (summary !== "") message += ` (${summary})`;
	if (item.value > 0) message += ` Worth ${item.value} gold.`;
	return ok(message);
}
