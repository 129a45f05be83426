import type { CommandContext, CommandObject } from "../core/command.js";
import { EXPLORING } from "./_modes.js";

export default {
	verb: "load",
	aliases: ["restore"],
	usage: "load",
	description: "Load your saved game",
	modes: EXPLORING,
	execute({ game }: CommandContext): void {
		game.queueLoad();
	},
} satisfies CommandObject;
