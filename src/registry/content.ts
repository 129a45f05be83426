/**
 * Registry: content - read-only game data
 *
 * Holds the tables loaded from `data/*.yaml` by the content package: item
 * definitions, enemy templates, room definitions, loot tiers and the
 * fountain reward pools. Loaded once per process and never mutated.
 *
 * @module registry/content
 */

import type { EnemyTemplate } from "../core/enemy.js";
import type { Item } from "../core/item.js";
import type { LootTierName, RoomDefinition } from "../core/room.js";

/**
 * One weighted line of a loot tier: either an item id or the gold placeholder.
 */
export type LootEntry =
	| { readonly kind: "item"; readonly itemId: string; readonly weight: number }
	| { readonly kind: "gold"; readonly weight: number };

export interface LootTier {
	readonly entries: ReadonlyArray<LootEntry>;
	readonly gold: { readonly min: number; readonly max: number };
}

export interface ContentTables {
	readonly items: ReadonlyMap<string, Item>;
	readonly enemies: ReadonlyMap<string, EnemyTemplate>;
	readonly rooms: ReadonlyMap<string, RoomDefinition>;
	readonly startingRoom: string;
	readonly lootTiers: Readonly<Record<LootTierName, LootTier>>;
	readonly fountainWeapons: ReadonlyArray<string>;
	readonly fountainArmors: ReadonlyArray<string>;
}

let CONTENT: ContentTables | undefined;

/**
 * Set the loaded content tables.
 */
export function setContent(content: ContentTables) {
	CONTENT = content;
}

/**
 * The loaded content tables.
 * @throws Error if the content package has not run
 */
export function getContent(): ContentTables {
	if (!CONTENT) throw new Error("Content has not been loaded");
	return CONTENT;
}
