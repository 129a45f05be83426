/**
 * Chest system.
 *
 * A chest opens once. How it opens depends on its state, one handler per
 * {@link ChestState}: unlocked chests just open, locked ones need their key
 * (kept afterwards), trapped ones hurt first, and a mimic turns into a fight.
 *
 * Loot is the chest's fixed items in order, then a single weighted draw from
 * its tier table. Items that don't fit in the pack stay on the floor.
 *
 * @module systems/chest
 */
import type { Game } from "../game.js";
import { createEnemy } from "../core/enemy.js";
import { type SystemResult, fail, ok } from "../core/message.js";
import { type Chest, type ChestState, DEFAULT_TRAP_DAMAGE, type Room } from "../core/room.js";
import { randomInt, weightedPick } from "../utils/random.js";
import logger from "../utils/logger.js";

export const MIMIC_ENEMY = "mimic";

type ChestOpener = (game: Game, room: Room, chest: Chest) => SystemResult;

/**
 * Marks the chest opened and hands out its loot.
 */
function grantLoot(game: Game, room: Room, chest: Chest, prefix = ""): SystemResult {
	const { player, rng } = game;
	chest.opened = true;
	const found: string[] = [];
	const left: string[] = [];

	const give = (itemId: string): void => {
		if (player.addItem(itemId)) {
			found.push(game.itemName(itemId));
		} else {
			room.addItem(itemId);
			left.push(game.itemName(itemId));
		}
	};

	for (const itemId of chest.fixedLoot) give(itemId);

	if (chest.lootTier !== undefined) {
		const tier = game.content.lootTiers[chest.lootTier];
		const entry = weightedPick(rng, tier.entries);
		if (entry?.kind === "gold") {
			const gold = randomInt(rng, tier.gold.min, tier.gold.max);
			player.addGold(gold);
			found.push(`${gold} gold`);
		} else if (entry) {
			give(entry.itemId);
		}
	}

	logger.debug(`${player.name} opened the chest in ${room.id}`);
	let message: string;
	if (found.length > 0) message = `${prefix}You open the chest. You found: ${found.join(", ")}!`;
	else if (left.length > 0) message = `${prefix}You open the chest.`;
	else message = `${prefix}You open the chest, but it's empty.`;
	if (left.length > 0) {
		message += ` Your pack is full, so you leave ${left.join(", ")} on the floor.`;
	}
	return ok(message);
}

const OPENERS: Record<ChestState, ChestOpener> = {
	unlocked: (game, room, chest) => grantLoot(game, room, chest),

	locked(game, room, chest) {
		const key = chest.keyRequired;
		if (key !== undefined && !game.player.hasItem(key)) {
			return fail(`The chest is locked. You need ${game.itemName(key)}.`);
		}
		return grantLoot(game, room, chest);
	},

	trapped(game, room, chest) {
		const damage = chest.trapDamage ?? DEFAULT_TRAP_DAMAGE;
		game.player.hp = Math.max(1, game.player.hp - damage);
		return grantLoot(game, room, chest, `The chest was trapped! You take ${damage} damage. `);
	},

	mimic(game, room, chest) {
		const template = game.content.enemies.get(MIMIC_ENEMY);
		if (!template) return grantLoot(game, room, chest);
		chest.opened = true;
		const mimic = createEnemy(template);
		game.enemies.set(room.id, mimic);
		game.startCombat(mimic);
		return fail("The chest springs to life! It's a MIMIC!");
	},
};

export function openChest(game: Game): SystemResult {
	const room = game.currentRoom;
	const chest = room.chest;
	if (!chest) return fail("There is no chest here.");
	if (chest.opened) return fail("The chest has already been opened.");
	return OPENERS[chest.state](game, room, chest);
}
