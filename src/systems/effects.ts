/**
 * Consumable effects.
 *
 * Each {@link ConsumableEffect} has one handler in {@link EFFECT_HANDLERS}.
 * A handler applies the effect and reports it; a failed result means the
 * item is kept. Teleporting effects end combat and never trigger an
 * encounter in the room they arrive in.
 *
 * @module systems/effects
 */
import type { Game } from "../game.js";
import type { ConsumableEffect, ConsumableItem } from "../core/item.js";
import { type SystemResult, fail, ok } from "../core/message.js";
import type { Room } from "../core/room.js";
import { pick, randomInt } from "../utils/random.js";
import logger from "../utils/logger.js";

export type EffectHandler = (game: Game, item: ConsumableItem) => SystemResult;

const NOT_IN_COMBAT = "You can only use this in combat.";

export const CHAOS_OUTCOMES = ["heal", "harm", "gold", "teleport"] as const;
export type ChaosOutcome = (typeof CHAOS_OUTCOMES)[number];

/**
 * Moves the player without an encounter on arrival.
 */
function relocate(game: Game, roomId: string): Room {
	game.endCombat();
	logger.debug(`${game.player.name} teleported to ${roomId}`);
	return game.enterRoom(roomId, { encounter: false, describe: false });
}

function teleportTarget(game: Game): string | undefined {
	const candidates = game.dungeon
		.getVisitedRooms()
		.filter((room) => room.id !== game.currentRoomId)
		.map((room) => room.id);
	return pick(game.rng, candidates);
}

function chaos(game: Game, item: ConsumableItem): SystemResult {
	const { player, rng } = game;
	const outcome: ChaosOutcome = pick(rng, CHAOS_OUTCOMES) ?? "heal";
	const prefix = `You used ${item.name}. Chaos swirls around you...`;
	switch (outcome) {
		case "heal": {
			const healed = player.heal(randomInt(rng, 20, 50));
			return ok(`${prefix} and knits your wounds! (+${healed} HP)`);
		}
		case "harm": {
			const damage = randomInt(rng, 5, 20);
			player.hp = Math.max(1, player.hp - damage);
			return ok(`${prefix} and burns you! (-${damage} HP)`);
		}
		case "gold": {
			const gold = randomInt(rng, 10, 50);
			player.addGold(gold);
			return ok(`${prefix} and gold rains from nowhere! (+${gold} gold)`);
		}
		case "teleport": {
			const target = teleportTarget(game);
			if (target === undefined) return ok(`${prefix} and fizzles out.`);
			const room = relocate(game, target);
			return ok(`${prefix} and hurls you into the ${room.name}!`);
		}
	}
}

export const EFFECT_HANDLERS: Record<ConsumableEffect, EffectHandler> = {
	heal(game, item) {
		const healed = game.player.heal(item.effectValue);
		return ok(`You used ${item.name} and restored ${healed} HP.`);
	},

	damage(game, item) {
		const enemy = game.combatTarget;
		if (!enemy) return fail(NOT_IN_COMBAT);
		const dealt = enemy.takeDamage(item.effectValue);
		return ok(`You used ${item.name} and dealt ${dealt} damage to ${enemy.name}!`);
	},

	lifesteal(game, item) {
		const enemy = game.combatTarget;
		if (!enemy) return fail(NOT_IN_COMBAT);
		const dealt = enemy.takeDamage(item.effectValue);
		const healed = game.player.heal(dealt);
		return ok(
			`You used ${item.name}, draining ${dealt} HP from ${enemy.name} and restoring ${healed} HP.`
		);
	},

	cure(_game, item) {
		return ok(`You used ${item.name} and feel refreshed.`);
	},

	buff_attack(game, item) {
		game.player.attack += item.effectValue;
		return ok(`You used ${item.name}. Your attack rises by ${item.effectValue}!`);
	},

	buff_defense(game, item) {
		game.player.defense += item.effectValue;
		return ok(`You used ${item.name}. Your defense rises by ${item.effectValue}!`);
	},

	teleport(game, item) {
		const target = teleportTarget(game);
		if (target === undefined) {
			return fail("The magic fizzles. There is nowhere you have been to teleport to.");
		}
		const room = relocate(game, target);
		return ok(
			`You used ${item.name} and vanish in a flash of light, reappearing in the ${room.name}.`
		);
	},

	recall(game, item) {
		const room = relocate(game, game.dungeon.startingRoomId);
		return ok(`You used ${item.name} and are pulled back to the ${room.name}.`);
	},

	timestop(game, item) {
		const fighting = game.combatTarget !== undefined;
		game.endCombat();
		if (!fighting) return ok(`You used ${item.name}. Time stands still for a moment, then moves on.`);
		return ok(`You used ${item.name}. Time freezes around you, and you slip away from the fight.`);
	},

	chaos,
};

export function applyEffect(game: Game, item: ConsumableItem): SystemResult {
	return EFFECT_HANDLERS[item.effectType](game, item);
}
