/**
 * Command resolution and the command registry.
 *
 * Player input goes through two steps. {@link resolve} turns the raw line
 * into a verb and its arguments, expanding aliases on the way ("n" becomes
 * `move north`, "pick up" becomes `take`). The game then looks the verb up
 * in a {@link CommandRegistry} and runs the matching {@link CommandObject}
 * if the current mode allows it.
 *
 * @example
 * ```typescript
 * resolve("GO NORTH"); // { verb: "move", args: ["north"] }
 * resolve("pick up sword"); // { verb: "take", args: ["sword"] }
 *
 * const registry = new CommandRegistry();
 * registry.register(lookCommand);
 * registry.get("look")?.execute({ game }, []);
 * ```
 *
 * @module core/command
 */

import type { Game } from "../game.js";
import { normalizeDirection } from "../utils/direction.js";

/**
 * What the game is doing. Commands declare the modes they run in; the
 * last three are terminal and accept no commands at all.
 */
export enum GAME_MODE {
	EXPLORING = "exploring",
	IN_COMBAT = "in_combat",
	GAME_OVER = "game_over",
	WON = "won",
	QUIT = "quit",
}

export interface ResolvedCommand {
	verb: string;
	args: string[];
}

/**
 * Alias phrases and their expansions. A single-word expansion replaces the
 * verb; a multi-word one replaces the verb and puts its remaining words in
 * front of whatever the player typed after the alias.
 */
export const ALIASES: ReadonlyMap<string, string> = new Map([
	["go", "move"],
	["walk", "move"],
	["n", "move north"],
	["s", "move south"],
	["e", "move east"],
	["w", "move west"],
	["u", "move up"],
	["d", "move down"],
	["north", "move north"],
	["south", "move south"],
	["east", "move east"],
	["west", "move west"],
	["up", "move up"],
	["down", "move down"],
	["l", "look"],
	["inspect", "examine"],
	["study", "examine"],
	["read", "examine"],
	["fight", "attack"],
	["a", "attack"],
	["run", "flee"],
	["escape", "flee"],
	["inv", "inventory"],
	["i", "inventory"],
	["pick", "take"],
	["grab", "take"],
	["get", "take"],
	["status", "stats"],
	["?", "help"],
	["exit", "quit"],
	["q", "quit"],
	["quaff", "drink"],
	["wield", "equip"],
	["wear", "equip"],
	["remove", "unequip"],
	["bet", "gamble"],
	["restore", "load"],
	["list", "shop"],
]);

function expand(verb: string, rest: string[]): ResolvedCommand {
	const expansion = ALIASES.get(verb);
	if (expansion === undefined) return { verb, args: rest };
	const [expandedVerb, ...prefix] = expansion.split(" ");
	return { verb: expandedVerb, args: [...prefix, ...rest] };
}

/**
 * Turns a raw input line into a verb and arguments.
 *
 * The line is lower-cased and stripped of punctuation before matching, so
 * "Take the SWORD!" resolves like "take the sword". Symbol aliases such as
 * "?" are matched against the trimmed line first, since stripping would
 * remove them.
 */
export function resolve(raw: string): ResolvedCommand {
	const trimmed = raw.trim().toLowerCase();
	let resolved: ResolvedCommand;
	if (ALIASES.has(trimmed)) {
		resolved = expand(trimmed, []);
	} else {
		const tokens = trimmed
			.replace(/[^\w\s]/g, "")
			.split(/\s+/)
			.filter(Boolean);
		if (tokens.length === 0) return { verb: "", args: [] };
		const [first, ...rest] = tokens;
		if (first === "pick" && rest[0] === "up") {
			resolved = { verb: "take", args: rest.slice(1) };
		} else {
			resolved = expand(first, rest);
		}
	}

	if (resolved.verb === "move" && resolved.args.length > 0) {
		const [direction, ...rest] = resolved.args;
		resolved.args = [normalizeDirection(direction), ...rest];
	}
	return resolved;
}

export interface CommandContext {
	game: Game;
}

/**
 * A command module. Each file under `src/commands` default-exports one of
 * these with `satisfies CommandObject`.
 */
export interface CommandObject {
	/** Canonical verb, after alias expansion. */
	verb: string;
	/** Shortcuts listed in help. Resolution itself uses {@link ALIASES}. */
	aliases?: string[];
	usage: string;
	description: string;
	modes: ReadonlyArray<GAME_MODE>;
	execute(context: CommandContext, args: string[]): void;
}

/**
 * Verb-indexed set of commands. Registration order is kept for help output.
 */
export class CommandRegistry {
	private readonly commands = new Map<string, CommandObject>();

	register(command: CommandObject): void {
		if (this.commands.has(command.verb)) {
			throw new Error(`Command '${command.verb}' is already registered`);
		}
		this.commands.set(command.verb, command);
	}

	get(verb: string): CommandObject | undefined {
		return this.commands.get(verb);
	}

	list(): CommandObject[] {
		return [...this.commands.values()];
	}
}
