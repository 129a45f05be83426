/**
 * Gamble command for the tavern dice games.
 *
 * @example
 * ```
 * gamble
 * gamble highlow 10 high
 * gamble skull 5
 * gamble glory 20
 * ```
 *
 * @module commands/gamble
 */
import type { Game } from "../game.js";
import type { CommandContext, CommandObject } from "../core/command.js";
import { MESSAGE_GROUP } from "../core/message.js";
import {
	type GambleResult,
	describeGames,
	playDeathOrGlory,
	playHighLow,
	playSkullDice,
} from "../systems/gambling.js";
import { EXPLORING } from "./_modes.js";

const GAMES: ReadonlyMap<string, "highlow" | "skull" | "glory"> = new Map([
	["highlow", "highlow"],
	["hl", "highlow"],
	["dice", "highlow"],
	["skull", "skull"],
	["skulls", "skull"],
	["glory", "glory"],
	["death", "glory"],
]);

function report(game: Game, result: GambleResult): void {
	game.sendMessage(
		result.message,
		result.refused ? MESSAGE_GROUP.ERROR : MESSAGE_GROUP.COMMAND_RESPONSE
	);
}

export default {
	verb: "gamble",
	aliases: ["bet"],
	usage: "gamble <game> <bet> [call]",
	description: "Play dice in a tavern",
	modes: EXPLORING,
	execute({ game }: CommandContext, args: string[]): void {
		if (!game.currentRoom.tavern) {
			game.sendMessage("There's no one here to gamble with. Find a tavern.", MESSAGE_GROUP.ERROR);
			return;
		}
		const [name, betText, call] = args;
		const kind = name === undefined ? undefined : GAMES.get(name);
		if (kind === undefined) {
			game.sendMessage(describeGames(), MESSAGE_GROUP.INFO);
			return;
		}
		const bet = betText === undefined ? 0 : Number.parseInt(betText, 10);
		if (!Number.isInteger(bet) || bet <= 0) {
			game.sendMessage("You need to bet at least 1 gold.", MESSAGE_GROUP.ERROR);
			return;
		}
		switch (kind) {
			case "highlow":
				if (call === undefined) {
					game.sendMessage(
						"Choose 'high' (8-12), 'low' (2-6), or 'seven' (exactly 7).",
						MESSAGE_GROUP.ERROR
					);
					return;
				}
				report(game, playHighLow(game, bet, call));
				return;
			case "skull":
				report(game, playSkullDice(game, bet));
				return;
			case "glory":
				report(game, playDeathOrGlory(game, bet));
				return;
		}
	},
} satisfies CommandObject;
