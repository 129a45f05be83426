import type { CommandContext, CommandObject } from "../core/command.js";
import { EXPLORING } from "./_modes.js";

export default {
	verb: "save",
	usage: "save",
	description: "Save your progress",
	modes: EXPLORING,
	execute({ game }: CommandContext): void {
		game.queueSave();
	},
} satisfies CommandObject;
