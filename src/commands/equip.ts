import type { CommandContext, CommandObject } from "../core/command.js";
import { MESSAGE_GROUP } from "../core/message.js";
import { equipItem } from "../systems/inventory.js";
import { EXPLORING } from "./_modes.js";

export default {
	verb: "equip",
	aliases: ["wield", "wear"],
	usage: "equip <item>",
	description: "Equip a weapon or armor",
	modes: EXPLORING,
	execute({ game }: CommandContext, args: string[]): void {
		if (args.length === 0) {
			game.sendMessage("Equip what?", MESSAGE_GROUP.ERROR);
			return;
		}
		game.report(equipItem(game, args.join(" ")));
	},
} satisfies CommandObject;
