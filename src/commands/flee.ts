import type { CommandContext, CommandObject } from "../core/command.js";
import { fightRound } from "./_combat.js";
import { IN_COMBAT } from "./_modes.js";

export default {
	verb: "flee",
	aliases: ["run", "escape"],
	usage: "flee",
	description: "Try to escape from combat",
	modes: IN_COMBAT,
	execute({ game }: CommandContext): void {
		fightRound(game, "flee");
	},
} satisfies CommandObject;
