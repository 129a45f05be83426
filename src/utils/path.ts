import { join, isAbsolute } from "path";

/**
 * Returns the safe current working directory for runtime operations.
 * Prefers the `DUNGEON_CRAWL_HOME` environment variable and falls back to
 * `process.cwd()` otherwise.
 */
export function getSafeRootDirectory(): string {
	const home = process.env.DUNGEON_CRAWL_HOME;
	if (home) return home;
	return process.cwd();
}

/**
 * Resolves a configured path against the root directory unless it is
 * already absolute.
 */
export function resolveFromRoot(path: string): string {
	return isAbsolute(path) ? path : join(getSafeRootDirectory(), path);
}
