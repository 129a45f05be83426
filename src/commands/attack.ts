/**
 * Attack command. While exploring it picks a fight with the enemy in the
 * room; in combat it strikes the current target.
 * @module commands/attack
 */
import { type CommandContext, type CommandObject, GAME_MODE } from "../core/command.js";
import { MESSAGE_GROUP } from "../core/message.js";
import { engageEnemy } from "../systems/combat.js";
import { fightRound } from "./_combat.js";
import { ANY_PLAY_MODE } from "./_modes.js";

export default {
	verb: "attack",
	aliases: ["a", "fight"],
	usage: "attack",
	description: "Attack the enemy",
	modes: ANY_PLAY_MODE,
	execute({ game }: CommandContext): void {
		if (game.mode === GAME_MODE.IN_COMBAT) {
			fightRound(game, "attack");
			return;
		}
		const result = engageEnemy(game);
		game.sendMessage(result.message, result.success ? MESSAGE_GROUP.COMBAT : MESSAGE_GROUP.ERROR);
	},
} satisfies CommandObject;
