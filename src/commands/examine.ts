import type { CommandContext, CommandObject } from "../core/command.js";
import { MESSAGE_GROUP } from "../core/message.js";
import { describeTarget } from "./_examine.js";
import { EXPLORING } from "./_modes.js";

export default {
	verb: "examine",
	aliases: ["inspect", "read"],
	usage: "examine <target>",
	description: "Take a closer look at an item, enemy or feature",
	modes: EXPLORING,
	execute({ game }: CommandContext, args: string[]): void {
		if (args.length === 0) {
			game.sendMessage("Examine what?", MESSAGE_GROUP.ERROR);
			return;
		}
		game.report(describeTarget(game, args.join(" ")));
	},
} satisfies CommandObject;
