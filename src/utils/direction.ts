/**
 * Direction utilities for movement and navigation.
 *
 * This module provides:
 * - Direction enum and constants
 * - The direction alias table used by the command resolver
 *
 * @module utils/direction
 */

/**
 * Enum for the exits a room can have.
 *
 * Values are the full lower-case names so that content files and save
 * snapshots can use them directly as map keys.
 *
 * @example
 * ```typescript
 * import { DIRECTION } from "./direction.js";
 *
 * const target = dungeon.getExitTarget(room, DIRECTION.NORTH);
 * ```
 */
export enum DIRECTION {
	NORTH = "north",
	SOUTH = "south",
	EAST = "east",
	WEST = "west",
	UP = "up",
	DOWN = "down",
}

/**
 * Array containing all possible direction values.
 * Order is: cardinal (N/S/E/W), vertical (U/D), which is also the order
 * exits are listed in room descriptions.
 */
export const DIRECTIONS: ReadonlyArray<DIRECTION> = [
	DIRECTION.NORTH,
	DIRECTION.SOUTH,
	DIRECTION.EAST,
	DIRECTION.WEST,
	DIRECTION.UP,
	DIRECTION.DOWN,
];

/**
 * Maps abbreviated direction names to their full names.
 *
 * @example
 * ```typescript
 * DIRECTION_ALIASES.get("n"); // "north"
 * DIRECTION_ALIASES.get("d"); // "down"
 * ```
 */
export const DIRECTION_ALIASES: ReadonlyMap<string, DIRECTION> = new Map<string, DIRECTION>([
	["n", DIRECTION.NORTH],
	["s", DIRECTION.SOUTH],
	["e", DIRECTION.EAST],
	["w", DIRECTION.WEST],
	["u", DIRECTION.UP],
	["d", DIRECTION.DOWN],
]);

/**
 * Type guard for full direction names.
 */
export function isDirection(text: string): text is DIRECTION {
	return DIRECTIONS.some((entry) => entry === text);
}

/**
 * Normalizes a direction alias to its full name.
 *
 * Abbreviations are expanded; anything else is lower-cased and passed
 * through unchanged, so the result is not guaranteed to be a valid
 * direction; check it with {@link isDirection}.
 *
 * @example
 * ```typescript
 * normalizeDirection("N");     // "north"
 * normalizeDirection("west");  // "west"
 * normalizeDirection("left");  // "left"
 * ```
 */
export function normalizeDirection(text: string): string {
	const lowered = text.toLowerCase();
	return DIRECTION_ALIASES.get(lowered) ?? lowered;
}
