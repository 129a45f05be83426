import type { CommandContext, CommandObject } from "../core/command.js";
import { MESSAGE_GROUP } from "../core/message.js";
import { renderMap } from "../utils/display.js";
import { EXPLORING } from "./_modes.js";

export default {
	verb: "map",
	usage: "map",
	description: "Show the rooms you have visited",
	modes: EXPLORING,
	execute({ game }: CommandContext): void {
		game.sendMessage(renderMap(game), MESSAGE_GROUP.INFO);
	},
} satisfies CommandObject;
