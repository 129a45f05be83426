/**
 * Magic fountains.
 *
 * Each fountain works once per session; {@link Game.usedFountains} remembers
 * which have been drunk from. The effect is drawn uniformly from the room's
 * list and applied from {@link FOUNTAIN_HANDLERS}. Fountain damage never
 * kills: hp stops at 1.
 *
 * @module systems/fountain
 */
import type { Game } from "../game.js";
import { type SystemResult, fail, ok } from "../core/message.js";
import type { FountainEffect } from "../core/room.js";
import { type Rng, pick, randomInt } from "../utils/random.js";
import logger from "../utils/logger.js";

type FountainHandler = (game: Game) => SystemResult;

/** Effects the `random` fountain chooses between. */
export const RANDOM_FOUNTAIN_EFFECTS = [
	"heal",
	"damage",
	"buff_attack",
	"buff_defense",
	"gold",
	"curse",
] as const satisfies ReadonlyArray<FountainEffect>;

const CURSES = ["attack", "defense", "hp"] as const;
const BLESSING_CHANCE = 0.7;

function hurt(game: Game, min: number, max: number): number {
	const damage = randomInt(game.rng, min, max);
	game.player.hp = Math.max(1, game.player.hp - damage);
	return damage;
}

function gainGold(game: Game, min: number, max: number): number {
	const gold = randomInt(game.rng, min, max);
	game.player.addGold(gold);
	return gold;
}

function conjure(
	game: Game,
	pool: ReadonlyArray<string>,
	found: (name: string) => string,
	full: string
): SystemResult {
	const itemId = pick(game.rng, pool);
	if (itemId === undefined) return ok("The water has no effect...");
	if (!game.player.addItem(itemId)) return ok(full);
	return ok(found(game.itemName(itemId)));
}

function curse(game: Game, rng: Rng): SystemResult {
	const { player } = game;
	switch (pick(rng, CURSES) ?? "attack") {
		case "attack": {
			const loss = randomInt(rng, 1, 3);
			player.attack = Math.max(1, player.attack - loss);
			return ok(`A curse weakens you! (-${loss} Attack permanently...)`);
		}
		case "defense": {
			const loss = randomInt(rng, 1, 2);
			player.defense = Math.max(0, player.defense - loss);
			return ok(`A curse weakens you! (-${loss} Defense permanently...)`);
		}
		case "hp": {
			const loss = randomInt(rng, 10, 20);
			player.maxHp = Math.max(20, player.maxHp - loss);
			player.hp = Math.min(player.hp, player.maxHp);
			return ok(`A curse weakens you! (-${loss} Max HP permanently...)`);
		}
	}
}

export const FOUNTAIN_HANDLERS: Record<FountainEffect, FountainHandler> = {
	heal(game) {
		const healed = game.player.heal(randomInt(game.rng, 30, 60));
		return ok(`The water fills you with warmth. You feel restored! (+${healed} HP)`);
	},

	major_heal(game) {
		const healed = game.player.heal(game.player.maxHp);
		return ok(`Divine energy surges through you! Your wounds close completely! (+${healed} HP)`);
	},

	full_heal(game) {
		game.player.maxHp += 20;
		game.player.hp = game.player.maxHp;
		return ok("The starlight water transforms you! Full heal and +20 max HP!");
	},

	damage(game) {
		const damage = hurt(game, 10, 25);
		return ok(`The water burns like acid! (-${damage} HP) You barely survive...`);
	},

	major_damage(game) {
		const damage = hurt(game, 30, 50);
		return ok(`The blood fountain demands sacrifice! (-${damage} HP)`);
	},

	buff_attack(game) {
		const buff = randomInt(game.rng, 2, 5);
		game.player.attack += buff;
		return ok(`Power flows into your arms! (+${buff} Attack permanently!)`);
	},

	buff_attack_large(game) {
		const buff = randomInt(game.rng, 5, 10);
		game.player.attack += buff;
		return ok(`Unholy strength surges through you! (+${buff} Attack permanently!)`);
	},

	buff_defense(game) {
		const buff = randomInt(game.rng, 1, 3);
		game.player.defense += buff;
		return ok(`Your skin hardens like stone! (+${buff} Defense permanently!)`);
	},

	gold: (game) => ok(`Gold coins materialize in your hands! (+${gainGold(game, 25, 75)} gold!)`),

	gold_large: (game) => ok(`A fortune appears before you! (+${gainGold(game, 75, 150)} gold!)`),

	gold_massive: (game) =>
		ok(`Treasure beyond imagining materializes! (+${gainGold(game, 200, 500)} gold!)`),

	level_up(game) {
		game.player.applyLevelUp();
		logger.info(`${game.player.name} reached level ${game.player.level} at a fountain`);
		return ok(`The fountain grants you wisdom! You gained a level! (Now level ${game.player.level})`);
	},

	curse: (game) => curse(game, game.rng),

	curse_or_blessing(game) {
		const { player } = game;
		if (game.rng() < BLESSING_CHANCE) {
			player.attack += 5;
			player.defense += 3;
			player.maxHp += 25;
			player.hp = player.maxHp;
			return ok("The stars bless you! +5 ATK, +3 DEF, +25 Max HP, full heal!");
		}
		player.attack = Math.max(1, player.attack - 3);
		player.defense = Math.max(0, player.defense - 2);
		return ok("The stars curse you! -3 ATK, -2 DEF...");
	},

	random_weapon: (game) =>
		conjure(
			game,
			game.content.fountainWeapons,
			(name) => `A weapon materializes in your hands: ${name}!`,
			"A weapon appears but you can't carry it... (inventory full)"
		),

	random_armor: (game) =>
		conjure(
			game,
			game.content.fountainArmors,
			(name) => `Armor materializes before you: ${name}!`,
			"Armor appears but you can't carry it... (inventory full)"
		),

	random(game) {
		const effect = pick(game.rng, RANDOM_FOUNTAIN_EFFECTS) ?? "heal";
		return FOUNTAIN_HANDLERS[effect](game);
	},
};

export function drinkFromFountain(game: Game): SystemResult {
	const room = game.currentRoom;
	if (!room.fountain) return fail("There's no fountain here to drink from.");
	if (game.usedFountains.has(room.id)) {
		return fail("The fountain's magic has been depleted. The water is now ordinary.");
	}

	game.usedFountains.add(room.id);
	const effect = pick(game.rng, room.fountain.effects) ?? "heal";
	logger.debug(`${game.player.name} drank from the fountain in ${room.id}: ${effect}`);
	return FOUNTAIN_HANDLERS[effect](game);
}
