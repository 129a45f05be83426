/**
 * The built-in command set, in the order help lists it.
 * @module commands
 */
import { type CommandObject, CommandRegistry } from "../core/command.js";
import attack from "./attack.js";
import buy from "./buy.js";
import drink from "./drink.js";
import drop from "./drop.js";
import equip from "./equip.js";
import examine from "./examine.js";
import flee from "./flee.js";
import gamble from "./gamble.js";
import help from "./help.js";
import inventory from "./inventory.js";
import load from "./load.js";
import look from "./look.js";
import map from "./map.js";
import move from "./move.js";
import open from "./open.js";
import quit from "./quit.js";
import save from "./save.js";
import sell from "./sell.js";
import shop from "./shop.js";
import stats from "./stats.js";
import take from "./take.js";
import unequip from "./unequip.js";
import use from "./use.js";

export const COMMANDS: ReadonlyArray<CommandObject> = [
	move,
	look,
	examine,
	take,
	drop,
	use,
	equip,
	unequip,
	open,
	shop,
	buy,
	sell,
	drink,
	gamble,
	attack,
	flee,
	inventory,
	stats,
	map,
	save,
	load,
	help,
	quit,
];

export function createCommandRegistry(): CommandRegistry {
	const registry = new CommandRegistry();
	for (const command of COMMANDS) registry.register(command);
	return registry;
}
