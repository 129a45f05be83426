import type { CommandContext, CommandObject } from "../core/command.js";
import { ANY_PLAY_MODE } from "./_modes.js";

export default {
	verb: "quit",
	aliases: ["q", "exit"],
	usage: "quit",
	description: "Leave the game (asks first)",
	modes: ANY_PLAY_MODE,
	execute({ game }: CommandContext): void {
		game.requestQuit();
	},
} satisfies CommandObject;
