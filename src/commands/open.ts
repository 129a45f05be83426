/**
 * Open command. Only chests open; a mimic starts a fight instead.
 * @module commands/open
 */
import type { CommandContext, CommandObject } from "../core/command.js";
import { MESSAGE_GROUP } from "../core/message.js";
import { openChest } from "../systems/chest.js";
import { EXPLORING } from "./_modes.js";

export default {
	verb: "open",
	usage: "open chest",
	description: "Open a chest",
	modes: EXPLORING,
	execute({ game }: CommandContext, args: string[]): void {
		if (args.length === 0) {
			game.sendMessage("Open what? Try 'open chest'.", MESSAGE_GROUP.ERROR);
			return;
		}
		if (!args.includes("chest")) {
			game.sendMessage(`You can't open '${args.join(" ")}'.`, MESSAGE_GROUP.ERROR);
			return;
		}
		const result = openChest(game);
		if (game.combatTarget) {
			game.sendMessage(result.message, MESSAGE_GROUP.COMBAT);
			return;
		}
		game.report(result);
	},
} satisfies CommandObject;
