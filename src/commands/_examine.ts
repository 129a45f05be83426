/**
 * Looking at things: items, the enemy, room features and lore.
 * @module commands/_examine
 */
import type { Game } from "../game.js";
import { type SystemResult, fail, ok } from "../core/message.js";
import { examineItem } from "../systems/inventory.js";

function findLore(lore: Readonly<Record<string, string>>, needle: string): string | undefined {
	for (const [key, text] of Object.entries(lore)) {
		const name = key.replace(/_/g, " ");
		if (name.includes(needle) || needle.includes(name)) return text;
	}
	return undefined;
}

/**
 * Describes whatever the player names, checking carried and floor items
 * first, then the enemy, then the room's features.
 */
export function describeTarget(game: Game, name: string): SystemResult {
	const needle = name.trim().toLowerCase();
	const room = game.currentRoom;

	const item = examineItem(game, needle);
	if (item.success) return item;

	const enemy = game.getRoomEnemy();
	if (enemy?.isAlive() && enemy.name.toLowerCase().includes(needle)) {
		return ok(`${enemy.name}: ${enemy.description} (HP: ${enemy.hp}/${enemy.maxHp})`);
	}

	if (room.chest && needle.includes("chest")) {
		if (room.chest.opened) return ok("An open chest. Whatever it held is gone.");
		return ok("A sturdy wooden chest bound with iron. Try 'open chest'.");
	}

	if (room.fountain && needle.includes("fountain")) {
		if (game.usedFountains.has(room.id)) return ok("The fountain's water is still and ordinary now.");
		return ok("The water shimmers with a strange light. Try 'drink'.");
	}

	const lore = findLore(room.lore, needle);
	if (lore !== undefined) return ok(lore);
	return fail(`You don't see any '${name}' here.`);
}
