import type { CommandContext, CommandObject } from "../core/command.js";
import { MESSAGE_GROUP } from "../core/message.js";
import { renderStats } from "../utils/display.js";
import { ANY_PLAY_MODE } from "./_modes.js";

export default {
	verb: "stats",
	aliases: ["status"],
	usage: "stats",
	description: "Show your character",
	modes: ANY_PLAY_MODE,
	execute({ game }: CommandContext): void {
		game.sendMessage(renderStats(game.player), MESSAGE_GROUP.INFO);
	},
} satisfies CommandObject;
