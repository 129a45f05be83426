/**
 * Test helpers: a small fixed world and games built on it.
 *
 * The world in `world/` is laid out for tests rather than play:
 * - hall (start): torch and health potion on the floor, unlocked chest,
 *   locked east exit (iron key) to the vault
 * - den (north): goblin, trapped chest; throne beyond it holds the boss
 * - tavern (up): dice table; closet east of it hides a mimic
 * - spring (down): heal fountain
 * - market (west): shop; cave beyond it holds an ogre that kills in one hit
 *
 * @module testing/fixtures
 */
import { readFileSync } from "fs";
import { fileURLToPath } from "url";
import YAML from "js-yaml";
import { Game, type GameOptions } from "../game.js";
import { type ContentDocuments, buildContent } from "../package/content.js";
import type { ContentTables } from "../registry/content.js";
import { CONFIG_DEFAULT } from "../registry/config.js";
import { sequenceRng } from "../utils/random.js";

const WORLD_DIRECTORY = new URL("./world/", import.meta.url);

function readWorldFile(file: string): unknown {
	return YAML.load(readFileSync(fileURLToPath(new URL(file, WORLD_DIRECTORY)), "utf-8"));
}

/** Freshly parsed test world documents, safe to modify. */
export function readTestDocuments(): ContentDocuments {
	return {
		rooms: readWorldFile("rooms.yaml"),
		items: readWorldFile("items.yaml"),
		enemies: readWorldFile("enemies.yaml"),
		loot: readWorldFile("loot.yaml"),
	};
}

export function createTestContent(): ContentTables {
	return buildContent(readTestDocuments());
}

/**
 * A game on the test world with its opening output already taken. The
 * default rng always returns 0.99: no crits, failed flees, no drops.
 */
export function createTestGame(options: Partial<GameOptions> = {}): Game {
	const game = new Game({
		content: options.content ?? createTestContent(),
		config: options.config ?? CONFIG_DEFAULT,
		rng: options.rng ?? sequenceRng([0.99]),
		savePath: options.savePath ?? "unused-save.yaml",
		playerName: options.playerName ?? "Tester",
		registry: options.registry,
	});
	game.takeOutput();
	return game;
}

/** Message texts only, for compact assertions. */
export function texts(messages: ReadonlyArray<{ text: string }>): string[] {
	return messages.map((message) => message.text);
}
