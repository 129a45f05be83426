/**
 * Registry: config - centralized configuration access
 *
 * Provides a centralized location for accessing the game configuration.
 * The CONFIG object is loaded and updated by the config package.
 *
 * @module registry/config
 */

import type { DeepReadonly } from "../utils/types.js";

export { READONLY_CONFIG as CONFIG };

export type GameConfig = {
	name: string;
};

export type PlayerConfig = {
	max_hp: number;
	attack: number;
	defense: number;
	xp_to_next: number;
	gold: number;
	max_inventory: number;
};

export type CombatConfig = {
	crit_chance: number;
	crit_multiplier: number;
	flee_chance: number;
};

export type VictoryConfig = {
	boss_enemy: string;
	win_item: string;
};

export type PathsConfig = {
	content: string;
	save_file: string;
};

export type Config = {
	game: GameConfig;
	player: PlayerConfig;
	combat: CombatConfig;
	victory: VictoryConfig;
	paths: PathsConfig;
};

export const CONFIG_DEFAULT: DeepReadonly<Config> = {
	game: {
		name: "Dungeon Crawl",
	},
	player: {
		max_hp: 100,
		attack: 10,
		defense: 2,
		xp_to_next: 50,
		gold: 0,
		max_inventory: 10,
	},
	combat: {
		crit_chance: 0.1,
		crit_multiplier: 1.5,
		flee_chance: 0.5,
	},
	victory: {
		boss_enemy: "dungeon_warlord",
		win_item: "warlord_amulet",
	},
	paths: {
		content: "data",
		save_file: "data/saves/savegame.yaml",
	},
} as const;

/**
 * Fresh, mutable copy of the defaults.
 */
export function defaultConfig(): Config {
	return {
		game: { ...CONFIG_DEFAULT.game },
		player: { ...CONFIG_DEFAULT.player },
		combat: { ...CONFIG_DEFAULT.combat },
		victory: { ...CONFIG_DEFAULT.victory },
		paths: { ...CONFIG_DEFAULT.paths },
	};
}

// make a copy of the default, don't reference it directly
const CONFIG: Config = defaultConfig();

// export a readonly version of the config
const READONLY_CONFIG: DeepReadonly<Config> = CONFIG;

/**
 * Set the config object.
 * @param config - The config object to set.
 */
export function setConfig(config: Config) {
	CONFIG.game = config.game;
	CONFIG.player = config.player;
	CONFIG.combat = config.combat;
	CONFIG.victory = config.victory;
	CONFIG.paths = config.paths;
}
