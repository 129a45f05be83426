/**
 * Buy command for purchasing from a shop.
 *
 * @example
 * ```
 * buy health potion
 * buy sword
 * ```
 *
 * @module commands/buy
 */
import type { CommandContext, CommandObject } from "../core/command.js";
import { MESSAGE_GROUP } from "../core/message.js";
import { buyItem } from "../systems/shop.js";
import { EXPLORING } from "./_modes.js";

export default {
	verb: "buy",
	usage: "buy <item>",
	description: "Buy an item from the shop",
	modes: EXPLORING,
	execute({ game }: CommandContext, args: string[]): void {
		if (args.length === 0) {
			game.sendMessage("Buy what?", MESSAGE_GROUP.ERROR);
			return;
		}
		game.report(buyItem(game, args.join(" ")));
	},
} satisfies CommandObject;
