/**
 * Rooms and the features that can sit in them.
 *
 * A {@link RoomDefinition} is the read-only shape loaded from content. A
 * {@link Room} is the live copy the game mutates: its floor items, chest,
 * remaining locks and visited flag change during play, the exits do not.
 *
 * @module core/room
 */

import { DIRECTION, DIRECTIONS } from "../utils/direction.js";

export const CHEST_STATES = ["unlocked", "locked", "trapped", "mimic"] as const;
export type ChestState = (typeof CHEST_STATES)[number];

export const LOOT_TIERS = ["common", "uncommon", "rare"] as const;
export type LootTierName = (typeof LOOT_TIERS)[number];

export const DEFAULT_TRAP_DAMAGE = 10;

export interface Chest {
	state: ChestState;
	/** Once true the chest never grants loot again. */
	opened: boolean;
	keyRequired?: string;
	trapDamage?: number;
	fixedLoot: string[];
	lootTier?: LootTierName;
}

export const FOUNTAIN_EFFECTS = [
	"heal",
	"major_heal",
	"full_heal",
	"damage",
	"major_damage",
	"buff_attack",
	"buff_attack_large",
	"buff_defense",
	"gold",
	"gold_large",
	"gold_massive",
	"level_up",
	"curse",
	"curse_or_blessing",
	"random_weapon",
	"random_armor",
	"random",
] as const;

export type FountainEffect = (typeof FOUNTAIN_EFFECTS)[number];

export interface Shop {
	inventory: ReadonlyArray<string>;
}

export interface Fountain {
	effects: ReadonlyArray<FountainEffect>;
}

/**
 * Room as described by content. Shared by every game started in the process.
 */
export interface RoomDefinition {
	readonly id: string;
	readonly name: string;
	readonly description: string;
	readonly shortDescription: string;
	readonly exits: ReadonlyMap<DIRECTION, string>;
	readonly lockedExits: ReadonlyMap<DIRECTION, string>;
	readonly items: ReadonlyArray<string>;
	readonly enemyId?: string;
	readonly chest?: Readonly<Chest>;
	readonly shop?: Shop;
	readonly fountain?: Fountain;
	readonly tavern: boolean;
	/** Examinable scenery, keyed by the word the player types. */
	readonly lore: Readonly<Record<string, string>>;
}

export function isChestState(value: string): value is ChestState {
	return CHEST_STATES.some((entry) => entry === value);
}

export function isLootTier(value: string): value is LootTierName {
	return LOOT_TIERS.some((entry) => entry === value);
}

export function isFountainEffect(value: string): value is FountainEffect {
	return FOUNTAIN_EFFECTS.some((entry) => entry === value);
}

export function cloneChest(chest: Readonly<Chest>): Chest {
	return { ...chest, fixedLoot: [...chest.fixedLoot] };
}

/**
 * Live room state for one game.
 */
export class Room {
	readonly id: string;
	readonly name: string;
	readonly description: string;
	readonly shortDescription: string;
	readonly exits: ReadonlyMap<DIRECTION, string>;
	readonly enemyId?: string;
	readonly shop?: Shop;
	readonly fountain?: Fountain;
	readonly tavern: boolean;
	readonly lore: Readonly<Record<string, string>>;

	lockedExits: Map<DIRECTION, string>;
	items: string[];
	chest?: Chest;
	visited = false;

	constructor(definition: RoomDefinition) {
		this.id = definition.id;
		this.name = definition.name;
		this.description = definition.description;
		this.shortDescription = definition.shortDescription;
		this.exits = definition.exits;
		this.enemyId = definition.enemyId;
		this.shop = definition.shop;
		this.fountain = definition.fountain;
		this.tavern = definition.tavern;
		this.lore = definition.lore;
		this.lockedExits = new Map(definition.lockedExits);
		this.items = [...definition.items];
		this.chest = definition.chest ? cloneChest(definition.chest) : undefined;
	}

	getExit(direction: DIRECTION): string | undefined {
		return this.exits.get(direction);
	}

	hasExit(direction: DIRECTION): boolean {
		return this.exits.has(direction);
	}

	/**
	 * Exits in display order (north, south, east, west, up, down).
	 */
	getExitDirections(): DIRECTION[] {
		return DIRECTIONS.filter((dir) => this.exits.has(dir));
	}

	isExitLocked(direction: DIRECTION): boolean {
		return this.lockedExits.has(direction);
	}

	getRequiredKey(direction: DIRECTION): string | undefined {
		return this.lockedExits.get(direction);
	}

	/**
	 * Removes the lock on an exit for the rest of the game.
	 * @returns true if the exit was locked
	 */
	unlockExit(direction: DIRECTION): boolean {
		return this.lockedExits.delete(direction);
	}

	addItem(itemId: string): void {
		this.items.push(itemId);
	}

	/**
	 * Removes the first occurrence of an item id.
	 * @returns false if the item was not on the floor
	 */
	removeItem(itemId: string): boolean {
		const index = this.items.indexOf(itemId);
		if (index === -1) return false;
		this.items.splice(index, 1);
		return true;
	}

	hasItems(): boolean {
		return this.items.length > 0;
	}
}
