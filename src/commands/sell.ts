import type { CommandContext, CommandObject } from "../core/command.js";
import { MESSAGE_GROUP } from "../core/message.js";
import { sellItem } from "../systems/shop.js";
import { EXPLORING } from "./_modes.js";

export default {
	verb: "sell",
	usage: "sell <item>",
	description: "Sell an item for half its value",
	modes: EXPLORING,
	execute({ game }: CommandContext, args: string[]): void {
		if (args.length === 0) {
			game.sendMessage("Sell what?", MESSAGE_GROUP.ERROR);
			return;
		}
		game.report(sellItem(game, args.join(" ")));
	},
} satisfies CommandObject;
