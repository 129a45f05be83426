/**
 * Turn-based combat between the player and the enemy in the current room.
 *
 * Combat is entered by walking into a room with a living enemy, by the
 * `attack` command while exploring, or by a mimic chest. Each round the
 * player acts with {@link combatRound}; unless that action ended the fight,
 * the enemy strikes back once.
 *
 * Features:
 * - Critical hits and flee odds read from `CONFIG.combat`
 * - Victory rewards: xp with level-up, gold, rolled drops and the boss prize
 * - Every roll goes through `game.rng`
 *
 * @module systems/combat
 */
import type { Game } from "../game.js";
import type { Enemy } from "../core/enemy.js";
import { type SystemResult, fail, ok } from "../core/message.js";
import { chance } from "../utils/random.js";
import logger from "../utils/logger.js";
import { getArmorDefense, getWeaponDamage, useItem } from "./inventory.js";

export type CombatAction = "attack" | "use" | "flee";

export interface CombatResult {
	messages: string[];
	/** No combat target remains. */
	combatEnded: boolean;
	playerDied: boolean;
}

interface Strike {
	message: string;
	/** The target is now dead. */
	fatal: boolean;
}

/**
 * Starts a fight with the living enemy in the current room.
 */
export function engageEnemy(game: Game): SystemResult {
	const enemy = game.getRoomEnemy();
	if (!enemy?.isAlive()) return fail("There's nothing to attack here.");
	game.startCombat(enemy);
	return ok(`You engage the ${enemy.name} in combat!`);
}

export function playerAttack(game: Game, enemy: Enemy): Strike {
	const { combat } = game.config;
	let damage = game.player.attack + getWeaponDamage(game);
	const critical = chance(game.rng, combat.crit_chance);
	if (critical) damage = Math.trunc(damage * combat.crit_multiplier);

	const dealt = enemy.takeDamage(damage);
	let message = `You attack the ${enemy.name} for ${dealt} damage!`;
	if (critical) message += " CRITICAL HIT!";
	if (!enemy.isAlive()) message += ` The ${enemy.name} has been defeated!`;
	return { message, fatal: !enemy.isAlive() };
}

export function enemyAttack(game: Game, enemy: Enemy): Strike {
	const { player } = game;
	const damage = Math.max(1, enemy.attack - (player.defense + getArmorDefense(game)));
	player.hp = Math.max(0, player.hp - damage);
	let message = `The ${enemy.name} attacks you for ${damage} damage!`;
	if (!player.isAlive()) message += " You have been slain!";
	return { message, fatal: !player.isAlive() };
}

/**
 * Hands out the rewards for a defeated enemy and ends combat.
 */
export function processVictory(game: Game, enemy: Enemy): string {
	const { player } = game;
	const leveled = player.gainXp(enemy.xpReward);
	player.addGold(enemy.goldReward);

	let message = `You gained ${enemy.xpReward} XP and ${enemy.goldReward} gold.`;
	if (leveled) {
		message += ` LEVEL UP! You are now level ${player.level}!`;
		logger.info(`${player.name} reached level ${player.level}`);
	}

	const carried = enemy.getDrops(game.rng).filter((itemId) => player.addItem(itemId));
	if (carried.length > 0) {
		message += ` The enemy dropped: ${carried.map((id) => game.itemName(id)).join(", ")}.`;
	}

	game.endCombat();
	logger.debug(`${player.name} defeated ${enemy.id}`);

	const { boss_enemy, win_item } = game.config.victory;
	if (enemy.id === boss_enemy && !player.hasItem(win_item)) {
		const prize = game.itemName(win_item);
		if (player.addItem(win_item)) {
			message += ` You obtained the ${prize}!`;
		} else {
			game.currentRoom.addItem(win_item);
			message += ` The ${prize} falls to the floor. Your pack is full, so make room to take it.`;
		}
	}
	game.checkVictory();
	return message;
}

function endRound(game: Game, messages: string[], enemy: Enemy): CombatResult {
	const retaliation = enemyAttack(game, enemy);
	messages.push(retaliation.message);
	if (retaliation.fatal) {
		game.over = true;
		game.endCombat();
		return { messages, combatEnded: true, playerDied: true };
	}
	return { messages, combatEnded: false, playerDied: false };
}

/**
 * Runs one player action against the current combat target.
 */
export function combatRound(game: Game, action: CombatAction, args: string[] = []): CombatResult {
	const enemy = game.combatTarget;
	if (!enemy) return { messages: ["You're not in combat."], combatEnded: true, playerDied: false };
	const messages: string[] = [];

	switch (action) {
		case "attack": {
			const strike = playerAttack(game, enemy);
			messages.push(strike.message);
			if (strike.fatal) {
				messages.push(processVictory(game, enemy));
				return { messages, combatEnded: true, playerDied: false };
			}
			return endRound(game, messages, enemy);
		}

		case "flee": {
			if (chance(game.rng, game.config.combat.flee_chance)) {
				game.endCombat();
				messages.push("You successfully flee from combat!");
				return { messages, combatEnded: true, playerDied: false };
			}
			const result = endRound(game, [], enemy);
			result.messages = [`You failed to escape! ${result.messages.join(" ")}`];
			return result;
		}

		case "use": {
			if (args.length === 0) {
				return { messages: ["Use what?"], combatEnded: false, playerDied: false };
			}
			const result = useItem(game, args.join(" "));
			messages.push(result.message);
			if (!result.success) return { messages, combatEnded: false, playerDied: false };
			if (game.combatTarget !== enemy) return { messages, combatEnded: true, playerDied: false };
			if (!enemy.isAlive()) {
				messages.push(processVictory(game, enemy));
				return { messages, combatEnded: true, playerDied: false };
			}
			return endRound(game, messages, enemy);
		}
	}
}
