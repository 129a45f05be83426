/**
 * Shared helper for commands that spend a combat round.
 * @module commands/_combat
 */
import type { Game } from "../game.js";
import { MESSAGE_GROUP } from "../core/message.js";
import { type CombatAction, combatRound } from "../systems/combat.js";

export function fightRound(game: Game, action: CombatAction, args: string[] = []): void {
	const result = combatRound(game, action, args);
	for (const message of result.messages) game.sendMessage(message, MESSAGE_GROUP.COMBAT);
}
