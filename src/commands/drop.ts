import type { CommandContext, CommandObject } from "../core/command.js";
import { MESSAGE_GROUP } from "../core/message.js";
import { dropItem } from "../systems/inventory.js";
import { EXPLORING } from "./_modes.js";

export default {
	verb: "drop",
	usage: "drop <item>",
	description: "Leave an item on the floor",
	modes: EXPLORING,
	execute({ game }: CommandContext, args: string[]): void {
		if (args.length === 0) {
			game.sendMessage("Drop what?", MESSAGE_GROUP.ERROR);
			return;
		}
		game.report(dropItem(game, args.join(" ")));
	},
} satisfies CommandObject;
