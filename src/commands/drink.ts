import type { CommandContext, CommandObject } from "../core/command.js";
import { drinkFromFountain } from "../systems/fountain.js";
import { EXPLORING } from "./_modes.js";

export default {
	verb: "drink",
	aliases: ["quaff"],
	usage: "drink",
	description: "Drink from a fountain",
	modes: EXPLORING,
	execute({ game }: CommandContext): void {
		game.report(drinkFromFountain(game));
	},
} satisfies CommandObject;
