/**
 * Tavern dice games.
 *
 * Three games, all played against the house in rooms marked as a tavern:
 * - High/Low: call 2d6 high (8-12), low (2-6) or seven. 2x, or 4x on seven.
 * - Skull Dice: 3d6. Pair 1.5x (rounded down), triple 5x, triple six 10x.
 * - Death or Glory: d20. 1 loses triple, 2-10 loses, 11-19 wins, 20 wins triple.
 *
 * Payouts are gross; the player's gold changes by the net amount. A result's
 * `success` says whether the player won; `refused` marks a bet that was
 * never played, which changes nothing.
 *
 * @module systems/gambling
 */
import type { Game } from "../game.js";
import type { SystemResult } from "../core/message.js";
import { type Rng, randomInt } from "../utils/random.js";
import logger from "../utils/logger.js";

export const HIGH_LOW_CHOICES = ["high", "low", "seven"] as const;
export type HighLowChoice = (typeof HIGH_LOW_CHOICES)[number];

export interface GambleResult extends SystemResult {
	refused: boolean;
}

function refuse(message: string): GambleResult {
	return { success: false, refused: true, message };
}

export function rollDice(rng: Rng, count: number, sides = 6): number[] {
	return Array.from({ length: count }, () => randomInt(rng, 1, sides));
}

function formatDice(dice: ReadonlyArray<number>): string {
	return dice.map((die) => `[${die}]`).join(" ");
}

function parseChoice(choice: string): HighLowChoice | undefined {
	const normalized = choice.trim().toLowerCase();
	if (normalized === "7") return "seven";
	return HIGH_LOW_CHOICES.find((entry) => entry === normalized);
}

/**
 * Refusal for a bet the player can't make, or undefined if it is fine.
 */
function refuseBet(
	game: Game,
	bet: number,
	required = bet,
	short = `You don't have enough gold. You have ${game.player.gold}g.`
): GambleResult | undefined {
	if (!game.currentRoom.tavern) return refuse("There's no one here to gamble with. Find a tavern.");
	if (!Number.isInteger(bet) || bet <= 0) return refuse("You need to bet at least 1 gold.");
	if (game.player.gold < required) return refuse(short);
	return undefined;
}

function settle(
	game: Game,
	label: string,
	net: number,
	lines: string[],
	won = net > 0
): GambleResult {
	game.player.gold += net;
	logger.debug(`${game.player.name} played ${label}: ${net >= 0 ? "+" : ""}${net} gold`);
	return { success: won, refused: false, message: lines.join("\n") };
}

export function playHighLow(game: Game, bet: number, choice: string): GambleResult {
	const refusal = refuseBet(game, bet);
	if (refusal) return refusal;
	const call = parseChoice(choice);
	if (!call) return refuse("Choose 'high' (8-12), 'low' (2-6), or 'seven' (exactly 7).");

	const dice = rollDice(game.rng, 2);
	const total = dice[0] + dice[1];
	const result: HighLowChoice = total <= 6 ? "low" : total >= 8 ? "high" : "seven";
	const lines = ["The dice tumble across the table...", `${formatDice(dice)} = ${total}`, ""];

	if (call !== result) {
		lines.push(`${result.toUpperCase()}. You bet ${call}.`, `You lose ${bet} gold. Better luck next time.`);
		return settle(game, "high/low", -bet, lines);
	}
	const winnings = bet * (result === "seven" ? 4 : 2);
	lines.push(
		result === "seven" ? "LUCKY SEVEN! The crowd erupts!" : `${result.toUpperCase()}! You called it!`,
		`You win ${winnings} gold! (+${winnings - bet} net)`
	);
	return settle(game, "high/low", winnings - bet, lines);
}

export function playSkullDice(game: Game, bet: number): GambleResult {
	const refusal = refuseBet(game, bet);
	if (refusal) return refusal;

	const dice = rollDice(game.rng, 3);
	const [a, b, c] = dice;
	const lines = ["The skull dice clatter ominously...", formatDice(dice), ""];

	let winnings = 0;
	if (a === b && b === c) {
		const skulls = a === 6;
		winnings = bet * (skulls ? 10 : 5);
		lines.push(skulls ? "TRIPLE SKULLS! The tavern goes silent in awe!" : "THREE OF A KIND! Impressive!");
	} else if (a === b || b === c || a === c) {
		winnings = Math.floor(bet * 1.5);
		lines.push("A pair! Not bad.");
	} else {
		lines.push("Nothing. The bones weren't with you tonight.", `You lose ${bet} gold.`);
		return settle(game, "skull dice", -bet, lines);
	}
	lines.push(`You win ${winnings} gold! (+${winnings - bet} net)`);
	return settle(game, "skull dice", winnings - bet, lines, true);
}

export function playDeathOrGlory(game: Game, bet: number): GambleResult {
	const required = bet * 3;
	const refusal = refuseBet(
		game,
		bet,
		required,
		`Death or Glory requires ${required}g available (3x your bet). You have ${game.player.gold}g.`
	);
	if (refusal) return refusal;

	const roll = randomInt(game.rng, 1, 20);
	const lines = ["You blow on the d20 for luck...", `[${roll}]`, ""];
	if (roll === 1) {
		lines.push("DEATH! The dice gods are cruel!", `You lose ${required} gold (3x your bet)!`);
		return settle(game, "death or glory", -required, lines);
	}
	if (roll <= 10) {
		lines.push("Not enough. You needed 11+.", `You lose ${bet} gold.`);
		return settle(game, "death or glory", -bet, lines);
	}
	if (roll < 20) {
		lines.push("Victory! The dice favor you!", `You win ${bet} gold!`);
		return settle(game, "death or glory", bet, lines);
	}
	lines.push("GLORY! A NATURAL 20! The tavern ERUPTS!", `You win ${required} gold (3x your bet)!`);
	return settle(game, "death or glory", required, lines);
}

export function describeGames(): string {
	return [
		"Dice games in the tavern:",
		"  gamble highlow <bet> <high|low|seven>  - 2d6: high 8-12 or low 2-6 pays 2x, seven pays 4x",
		"  gamble skull <bet>                     - 3d6: pair 1.5x, three of a kind 5x, triple six 10x",
		"  gamble glory <bet>                     - d20: 1 loses 3x, 2-10 lose, 11-19 win, 20 wins 3x",
		"                                           (needs 3x your bet in gold)",
	].join("\n");
}
