import type { CommandContext, CommandObject } from "../core/command.js";
import { MESSAGE_GROUP } from "../core/message.js";
import { renderHelp } from "../utils/display.js";
import { ANY_PLAY_MODE } from "./_modes.js";

export default {
	verb: "help",
	aliases: ["?"],
	usage: "help",
	description: "List the commands you can use right now",
	modes: ANY_PLAY_MODE,
	execute({ game }: CommandContext): void {
		game.sendMessage(renderHelp(game.registry.list(), game.mode), MESSAGE_GROUP.INFO);
	},
} satisfies CommandObject;
