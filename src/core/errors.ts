/**
 * Error types for failures that are not ordinary user mistakes.
 *
 * @module core/errors
 */

/**
 * Malformed or inconsistent content data. Raised while loading the data
 * files at startup; the process stops before a session begins.
 */
export class ContentError extends Error {
	readonly file?: string;

	constructor(message: string, file?: string) {
		super(file ? `${file}: ${message}` : message);
		this.name = "ContentError";
		this.file = file;
	}
}

/**
 * A save file that cannot be written, read, parsed or applied.
 * Caught at the command boundary and reported; the running game is untouched.
 */
export class SaveError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = "SaveError";
	}
}
