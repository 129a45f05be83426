import type { CommandContext, CommandObject } from "../core/command.js";
import { MESSAGE_GROUP } from "../core/message.js";
import { listShop } from "../systems/shop.js";
import { EXPLORING } from "./_modes.js";

export default {
	verb: "shop",
	aliases: ["list"],
	usage: "shop",
	description: "See what the shop sells",
	modes: EXPLORING,
	execute({ game }: CommandContext): void {
		const result = listShop(game);
		if (result.success) game.sendMessage(result.message, MESSAGE_GROUP.INFO);
		else game.report(result);
	},
} satisfies CommandObject;
