/**
 * Package: config - YAML configuration loader
 *
 * Loads `data/config.yaml` (creating it with the defaults if missing) and
 * merges it into the in-memory `CONFIG` object from the config registry.
 *
 * Behavior
 * - Reads YAML from `data/config.yaml`
 * - Merges only known keys from file into `CONFIG` (unknown keys ignored)
 * - Values whose type differs from the default are ignored with a warning
 * - If the file is absent/unreadable, writes `CONFIG_DEFAULT` to disk
 * - Logs details at `info`/`debug` levels, including default vs overridden
 *
 * @example
 * import configPkg from './package/config.js';
 * import { CONFIG } from '../registry/config.js';
 * await configPkg.loader();
 * console.log(CONFIG.combat.flee_chance);
 *
 * @module package/config
 */
import { dirname, join, relative } from "path";
import { mkdir, readFile, writeFile, rename, unlink } from "fs/promises";
import YAML from "js-yaml";
import logger from "../utils/logger.js";
import { getSafeRootDirectory } from "../utils/path.js";
import {
	CONFIG_DEFAULT,
	type Config,
	defaultConfig,
	setConfig,
} from "../registry/config.js";
import type { Package } from "package-loader";
import { isRecord } from "../utils/types.js";

const ROOT_DIRECTORY = getSafeRootDirectory();
const DATA_DIRECTORY = join(ROOT_DIRECTORY, "data");
export const CONFIG_PATH = join(DATA_DIRECTORY, "config.yaml");

type Section = Record<string, unknown>;

function section(source: Section, name: keyof Config): Section {
	const value = source[name];
	return isRecord(value) ? value : {};
}

function readNumber(
	source: Section,
	key: string,
	fallback: number,
	path: string
): number {
	const value = source[key];
	if (value === undefined) {
		logger.debug(`DEFAULT ${path} = ${fallback}`);
		return fallback;
	}
	if (typeof value !== "number" || !Number.isFinite(value)) {
		logger.warn(`Ignoring ${path}: expected a number, got ${String(value)}`);
		return fallback;
	}
	if (value !== fallback) logger.debug(`Set ${path} = ${value}`);
	return value;
}

function readString(
	source: Section,
	key: string,
	fallback: string,
	path: string
): string {
	const value = source[key];
	if (value === undefined) {
		logger.debug(`DEFAULT ${path} = ${fallback}`);
		return fallback;
	}
	if (typeof value !== "string") {
		logger.warn(`Ignoring ${path}: expected a string, got ${String(value)}`);
		return fallback;
	}
	if (value !== fallback) logger.debug(`Set ${path} = ${value}`);
	return value;
}

function warnUnknownKeys(source: Section, known: object, path: string) {
	for (const key of Object.keys(source)) {
		if (!(key in known)) logger.debug(`Ignoring unknown key ${path}.${key}`);
	}
}

/**
 * Builds a full Config from parsed YAML, taking only known keys whose type
 * matches the default.
 */
export function mergeConfig(parsed: unknown): Config {
	const source: Section = isRecord(parsed) ? parsed : {};
	const merged = defaultConfig();

	const game = section(source, "game");
	warnUnknownKeys(game, CONFIG_DEFAULT.game, "game");
	merged.game.name = readString(game, "name", merged.game.name, "game.name");

	const player = section(source, "player");
	warnUnknownKeys(player, CONFIG_DEFAULT.player, "player");
	for (const key of [
		"max_hp",
		"attack",
		"defense",
		"xp_to_next",
		"gold",
		"max_inventory",
	] as const) {
		merged.player[key] = readNumber(
			player,
			key,
			merged.player[key],
			`player.${key}`
		);
	}

	const combat = section(source, "combat");
	warnUnknownKeys(combat, CONFIG_DEFAULT.combat, "combat");
	for (const key of ["crit_chance", "crit_multiplier", "flee_chance"] as const) {
		merged.combat[key] = readNumber(
			combat,
			key,
			merged.combat[key],
			`combat.${key}`
		);
	}

	const victory = section(source, "victory");
	warnUnknownKeys(victory, CONFIG_DEFAULT.victory, "victory");
	for (const key of ["boss_enemy", "win_item"] as const) {
		merged.victory[key] = readString(
			victory,
			key,
			merged.victory[key],
			`victory.${key}`
		);
	}

	const paths = section(source, "paths");
	warnUnknownKeys(paths, CONFIG_DEFAULT.paths, "paths");
	for (const key of ["content", "save_file"] as const) {
		merged.paths[key] = readString(
			paths,
			key,
			merged.paths[key],
			`paths.${key}`
		);
	}

	return merged;
}

async function writeDefaultConfig(configPath: string) {
	const defaultContent = YAML.dump(CONFIG_DEFAULT, {
		noRefs: true,
		lineWidth: 120,
	});
	const tempPath = `${configPath}.tmp`;
	try {
		await mkdir(dirname(configPath), { recursive: true });
		// Write to temporary file first
		await writeFile(tempPath, defaultContent, "utf-8");
		// Atomically rename temp file to final location
		await rename(tempPath, configPath);
		logger.debug("Default config file created");
	} catch (writeError) {
		await unlink(tempPath).catch((cleanupError: unknown) => {
			logger.debug(`No temp config to clean up: ${String(cleanupError)}`);
		});
		throw writeError;
	}
}

/**
 * Loads the config file at `configPath` into the registry.
 * A missing or unreadable file leaves the defaults in place and writes them out.
 */
export async function loadConfig(configPath: string = CONFIG_PATH) {
	logger.debug(`Loading config from ${relative(ROOT_DIRECTORY, configPath)}`);
	let content: string;
	try {
		content = await readFile(configPath, "utf-8");
	} catch {
		// if file can't be read or doesn't exist, save default config
		logger.debug(
			`Config file not found or unreadable, creating default at ${configPath}`
		);
		setConfig(defaultConfig());
		await writeDefaultConfig(configPath);
		return;
	}

	setConfig(mergeConfig(YAML.load(content)));
	logger.info("Config loaded successfully");
}

export default {
	name: "config",
	loader: async () => {
		// read config.yaml
		await loadConfig();
	},
} satisfies Package;
