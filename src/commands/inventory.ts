import type { CommandContext, CommandObject } from "../core/command.js";
import { MESSAGE_GROUP } from "../core/message.js";
import { renderInventory } from "../utils/display.js";
import { ANY_PLAY_MODE } from "./_modes.js";

export default {
	verb: "inventory",
	aliases: ["i", "inv"],
	usage: "inventory",
	description: "List what you carry",
	modes: ANY_PLAY_MODE,
	execute({ game }: CommandContext): void {
		game.sendMessage(renderInventory(game), MESSAGE_GROUP.INFO);
	},
} satisfies CommandObject;
