/**
 * Look command. Shows the room again, or looks at something in it.
 *
 * @example
 * ```
 * look
 * look at fountain
 * ```
 *
 * @module commands/look
 */
import type { CommandContext, CommandObject } from "../core/command.js";
import { describeTarget } from "./_examine.js";
import { EXPLORING } from "./_modes.js";

export default {
	verb: "look",
	aliases: ["l"],
	usage: "look [target]",
	description: "Describe the room, or something in it",
	modes: EXPLORING,
	execute({ game }: CommandContext, args: string[]): void {
		const target = (args[0] === "at" ? args.slice(1) : args).join(" ");
		if (target === "") {
			game.describeCurrentRoom();
			return;
		}
		game.report(describeTarget(game, target));
	},
} satisfies CommandObject;
