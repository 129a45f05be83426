/**
 * Output messages produced by the game engine.
 *
 * Commands never print. They push {@link GameMessage}s onto the game's
 * output buffer through `sendMessage`, tagged with a group that the
 * presentation layer uses for styling.
 *
 * @module core/message
 */

/**
 * Message groups for categorizing output.
 */
export enum MESSAGE_GROUP {
	INFO = "INFO",
	COMBAT = "COMBAT",
	COMMAND_RESPONSE = "COMMAND_RESPONSE",
	ERROR = "ERROR",
	WARNING = "WARNING",
	SYSTEM = "SYSTEM",
	PROMPT = "PROMPT",
}

export interface GameMessage {
	group: MESSAGE_GROUP;
	text: string;
}

/**
 * Outcome of an interaction system call. Expected failures (missing item,
 * no gold, wrong room) come back as `success: false`, never as exceptions.
 */
export interface SystemResult {
	success: boolean;
	message: string;
}

export function ok(message: string): SystemResult {
	return { success: true, message };
}

export function fail(message: string): SystemResult {
	return { success: false, message };
}
