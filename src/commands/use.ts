/**
 * Use command for consumables. In combat, using an item takes the turn and
 * the enemy answers unless the item ended the fight.
 *
 * @example
 * ```
 * use health potion
 * use fire scroll
 * ```
 *
 * @module commands/use
 */
import { type CommandContext, type CommandObject, GAME_MODE } from "../core/command.js";
import { MESSAGE_GROUP } from "../core/message.js";
import { useItem } from "../systems/inventory.js";
import { fightRound } from "./_combat.js";
import { ANY_PLAY_MODE } from "./_modes.js";

export default {
	verb: "use",
	usage: "use <item>",
	description: "Use a consumable item",
	modes: ANY_PLAY_MODE,
	execute({ game }: CommandContext, args: string[]): void {
		if (args.length === 0) {
			game.sendMessage("Use what?", MESSAGE_GROUP.ERROR);
			return;
		}
		if (game.mode === GAME_MODE.IN_COMBAT) {
			fightRound(game, "use", args);
			return;
		}
		game.report(useItem(game, args.join(" ")));
	},
} satisfies CommandObject;
