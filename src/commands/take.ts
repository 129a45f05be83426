/**
 * Take command for picking items up off the floor.
 *
 * @example
 * ```
 * take sword
 * pick up potion
 * take all
 * ```
 *
 * @module commands/take
 */
import type { CommandContext, CommandObject } from "../core/command.js";
import { MESSAGE_GROUP } from "../core/message.js";
import { takeAllItems, takeItem } from "../systems/inventory.js";
import { EXPLORING } from "./_modes.js";

export default {
	verb: "take",
	aliases: ["get", "grab", "pick up"],
	usage: "take <item|all>",
	description: "Pick up an item, or everything here",
	modes: EXPLORING,
	execute({ game }: CommandContext, args: string[]): void {
		if (args.length === 0) {
			game.sendMessage("Take what? Try 'take <item>' or 'take all'.", MESSAGE_GROUP.ERROR);
			return;
		}
		const name = args.join(" ");
		game.report(name === "all" ? takeAllItems(game) : takeItem(game, name));
	},
} satisfies CommandObject;
