import type { CommandContext, CommandObject } from "../core/command.js";
import { MESSAGE_GROUP } from "../core/message.js";
import { unequipItem } from "../systems/inventory.js";
import { EXPLORING } from "./_modes.js";

export default {
	verb: "unequip",
	aliases: ["remove"],
	usage: "unequip <item|weapon|armor>",
	description: "Take off a weapon or armor",
	modes: EXPLORING,
	execute({ game }: CommandContext, args: string[]): void {
		if (args.length === 0) {
			game.sendMessage("Unequip what?", MESSAGE_GROUP.ERROR);
			return;
		}
		game.report(unequipItem(game, args.join(" ")));
	},
} satisfies CommandObject;
