/**
 * Move command for walking through an exit.
 *
 * The aliases `n`, `s`, `e`, `w`, `u`, `d` and the bare direction names all
 * resolve to this command.
 *
 * @example
 * ```
 * move north
 * go w
 * n
 * ```
 *
 * @module commands/move
 */
import type { CommandContext, CommandObject } from "../core/command.js";
import { MESSAGE_GROUP } from "../core/message.js";
import { isDirection } from "../utils/direction.js";
import { EXPLORING } from "./_modes.js";

export default {
	verb: "move",
	aliases: ["go", "n/s/e/w/u/d"],
	usage: "move <direction>",
	description: "Walk through an exit",
	modes: EXPLORING,
	execute({ game }: CommandContext, args: string[]): void {
		const [direction] = args;
		if (direction === undefined) {
			game.sendMessage(
				"Move where? Specify a direction (north, south, east, west, up, down).",
				MESSAGE_GROUP.ERROR
			);
			return;
		}
		if (!isDirection(direction)) {
			game.sendMessage(`'${direction}' is not a valid direction.`, MESSAGE_GROUP.ERROR);
			return;
		}
		const result = game.move(direction);
		if (!result.success) game.report(result);
	},
} satisfies CommandObject;
