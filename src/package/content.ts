/**
 * Package: content - YAML game data loader
 *
 * Loads the four content files from the content directory
 * (`CONFIG.paths.content`, default `data/`) and publishes them through the
 * content registry.
 *
 * Files
 * - `rooms.yaml`   - `starting_room` and `rooms[]`
 * - `items.yaml`   - `items[]`
 * - `enemies.yaml` - `enemies[]`
 * - `loot.yaml`    - `tiers` (weighted entries + gold range) and the
 *                    `fountain.weapons` / `fountain.armors` pools
 *
 * Optional fields default (enemy defense 1, empty drop table, hp from
 * max_hp, item value 0, weight 1). Any malformed value or dangling
 * reference throws a {@link ContentError}; nothing is published unless all
 * four files check out.
 *
 * @example
 * import contentPkg from './package/content.js';
 * import { getContent } from '../registry/content.js';
 * await contentPkg.loader();
 * console.log(getContent().rooms.size);
 *
 * @module package/content
 */
import { join } from "path";
import { readFile } from "fs/promises";
import YAML from "js-yaml";
import logger from "../utils/logger.js";
import { resolveFromRoot } from "../utils/path.js";
import { isDirection, type DIRECTION } from "../utils/direction.js";
import { CONFIG } from "../registry/config.js";
import {
	type ContentTables,
	type LootEntry,
	type LootTier,
	setContent,
} from "../registry/content.js";
import { ContentError } from "../core/errors.js";
import {
	type ConsumableEffect,
	type Item,
	isConsumableEffect,
	isItemCategory,
} from "../core/item.js";
import type { DropEntry, EnemyTemplate } from "../core/enemy.js";
import {
	type Chest,
	type FountainEffect,
	type LootTierName,
	type RoomDefinition,
	DEFAULT_TRAP_DAMAGE,
	LOOT_TIERS,
	isChestState,
	isFountainEffect,
	isLootTier,
} from "../core/room.js";
import type { Package } from "package-loader";
import { isRecord } from "../utils/types.js";
import configPkg from "./config.js";

export const CONTENT_FILES = {
	rooms: "rooms.yaml",
	items: "items.yaml",
	enemies: "enemies.yaml",
	loot: "loot.yaml",
} as const;

/** Parsed but unchecked YAML documents, one per content file. */
export interface ContentDocuments {
	rooms: unknown;
	items: unknown;
	enemies: unknown;
	loot: unknown;
}

const SHORT_DESCRIPTION_LENGTH = 100;

/**
 * Typed field access over one parsed YAML object, reporting the path of
 * whatever is wrong.
 */
class Fields {
	constructor(
		private readonly data: Record<string, unknown>,
		private readonly path: string,
		private readonly file: string
	) {}

	static of(value: unknown, path: string, file: string): Fields {
		if (!isRecord(value)) throw new ContentError(`${path} must be a mapping`, file);
		return new Fields(value, path, file);
	}

	error(message: string): ContentError {
		return new ContentError(`${this.path}: ${message}`, this.file);
	}

	has(key: string): boolean {
		return this.data[key] !== undefined && this.data[key] !== null;
	}

	string(key: string): string {
		const value = this.data[key];
		if (typeof value !== "string" || value.length === 0)
			throw this.error(`'${key}' must be a non-empty string`);
		return value;
	}

	optionalString(key: string): string | undefined {
		return this.has(key) ? this.string(key) : undefined;
	}

	number(key: string, fallback?: number): number {
		const value = this.data[key];
		if ((value === undefined || value === null) && fallback !== undefined) return fallback;
		if (typeof value !== "number" || !Number.isFinite(value))
			throw this.error(`'${key}' must be a number`);
		return value;
	}

	boolean(key: string, fallback: boolean): boolean {
		const value = this.data[key];
		if (value === undefined || value === null) return fallback;
		if (typeof value !== "boolean") throw this.error(`'${key}' must be true or false`);
		return value;
	}

	stringList(key: string): string[] {
		const value = this.data[key];
		if (value === undefined || value === null) return [];
		if (!Array.isArray(value)) throw this.error(`'${key}' must be a list`);
		return value.map((entry, index) => {
			if (typeof entry !== "string")
				throw this.error(`'${key}[${index}]' must be a string`);
			return entry;
		});
	}

	list(key: string): unknown[] {
		const value = this.data[key];
		if (value === undefined || value === null) return [];
		if (!Array.isArray(value)) throw this.error(`'${key}' must be a list`);
		return value;
	}

	stringMap(key: string): Map<string, string> {
		const value = this.data[key];
		const result = new Map<string, string>();
		if (value === undefined || value === null) return result;
		if (!isRecord(value)) throw this.error(`'${key}' must be a mapping`);
		for (const [name, entry] of Object.entries(value)) {
			if (typeof entry !== "string")
				throw this.error(`'${key}.${name}' must be a string`);
			result.set(name, entry);
		}
		return result;
	}

	child(key: string): Fields {
		return Fields.of(this.data[key], `${this.path}.${key}`, this.file);
	}
}

function parseItem(value: unknown, index: number): Item {
	const fields = Fields.of(value, `items[${index}]`, CONTENT_FILES.items);
	const category = fields.string("category");
	if (!isItemCategory(category)) throw fields.error(`unknown category '${category}'`);
	const base = {
		id: fields.string("id"),
		name: fields.string("name"),
		description: fields.optionalString("description") ?? "Nothing special.",
		value: fields.number("value", 0),
		weight: fields.number("weight", 1),
	};
	switch (category) {
		case "weapon":
			return {
				...base,
				category,
				stackable: fields.boolean("stackable", false),
				damage: fields.number("damage", 0),
			};
		case "armor":
			return {
				...base,
				category,
				stackable: fields.boolean("stackable", false),
				defenseBonus: fields.number("defense_bonus", 0),
			};
		case "consumable": {
			const effect = fields.string("effect_type");
			if (!isConsumableEffect(effect)) throw fields.error(`unknown effect_type '${effect}'`);
			const effectType: ConsumableEffect = effect;
			return {
				...base,
				category,
				stackable: fields.boolean("stackable", true),
				effectType,
				effectValue: fields.number("effect_value", 0),
			};
		}
		default:
			return { ...base, category, stackable: fields.boolean("stackable", false) };
	}
}

function parseEnemy(value: unknown, index: number): EnemyTemplate {
	const fields = Fields.of(value, `enemies[${index}]`, CONTENT_FILES.enemies);
	const maxHp = fields.number("max_hp");
	const dropTable = fields.list("drop_table").map((entry, dropIndex): DropEntry => {
		const drop = Fields.of(
			entry,
			`enemies[${index}].drop_table[${dropIndex}]`,
			CONTENT_FILES.enemies
		);
		const chance = drop.number("chance");
		if (chance < 0 || chance > 1) throw drop.error("'chance' must be between 0 and 1");
		return { itemId: drop.string("item"), chance };
	});
	return {
		id: fields.string("id"),
		name: fields.string("name"),
		maxHp,
		hp: fields.number("hp", maxHp),
		attack: fields.number("attack"),
		defense: fields.number("defense", 1),
		xpReward: fields.number("xp_reward", 0),
		goldReward: fields.number("gold_reward", 0),
		dropTable,
		description: fields.optionalString("description") ?? "",
	};
}

function parseDirectionMap(
	fields: Fields,
	key: string
): Map<DIRECTION, string> {
	const result = new Map<DIRECTION, string>();
	for (const [name, target] of fields.stringMap(key)) {
		if (!isDirection(name)) throw fields.error(`'${key}' has unknown direction '${name}'`);
		result.set(name, target);
	}
	return result;
}

function parseChest(fields: Fields): Chest {
	const state = fields.string("state");
	if (!isChestState(state)) throw fields.error(`unknown chest state '${state}'`);
	const tier = fields.optionalString("tier");
	if (tier !== undefined && !isLootTier(tier)) throw fields.error(`unknown loot tier '${tier}'`);
	const keyRequired = fields.optionalString("key");
	if (state === "locked" && keyRequired === undefined)
		throw fields.error("a locked chest needs a 'key'");
	return {
		state,
		opened: fields.boolean("opened", false),
		keyRequired,
		trapDamage: state === "trapped" ? fields.number("trap_damage", DEFAULT_TRAP_DAMAGE) : undefined,
		fixedLoot: fields.stringList("loot"),
		lootTier: tier,
	};
}

function parseRoom(value: unknown, index: number): RoomDefinition {
	const fields = Fields.of(value, `rooms[${index}]`, CONTENT_FILES.rooms);
	const description = fields.string("description");
	const exits = parseDirectionMap(fields, "exits");
	const lockedExits = parseDirectionMap(fields, "locked_exits");
	for (const direction of lockedExits.keys()) {
		if (!exits.has(direction))
			throw fields.error(`locked exit '${direction}' has no matching exit`);
	}
	let fountainEffects: FountainEffect[] | undefined;
	if (fields.has("fountain")) {
		const fountain = fields.child("fountain");
		const effects = fountain.stringList("effects");
		fountainEffects = effects.map((effect) => {
			if (!isFountainEffect(effect)) throw fountain.error(`unknown fountain effect '${effect}'`);
			return effect;
		});
		if (fountainEffects.length === 0) fountainEffects = ["heal"];
	}
	return {
		id: fields.string("id"),
		name: fields.string("name"),
		description,
		shortDescription:
			fields.optionalString("short_description") ??
			description.slice(0, SHORT_DESCRIPTION_LENGTH),
		exits,
		lockedExits,
		items: fields.stringList("items"),
		enemyId: fields.optionalString("enemy"),
		chest: fields.has("chest") ? parseChest(fields.child("chest")) : undefined,
		shop: fields.has("shop")
			? { inventory: fields.child("shop").stringList("inventory") }
			: undefined,
		fountain: fountainEffects ? { effects: fountainEffects } : undefined,
		tavern: fields.boolean("tavern", false),
		lore: Object.fromEntries(fields.stringMap("lore")),
	};
}

function parseLootTier(fields: Fields, tier: LootTierName): LootTier {
	const goldFields = fields.child("gold");
	const min = goldFields.number("min");
	const max = goldFields.number("max");
	if (min > max) throw goldFields.error("'min' is greater than 'max'");
	const entries = fields.list("entries").map((value, index): LootEntry => {
		const entry = Fields.of(
			value,
			`tiers.${tier}.entries[${index}]`,
			CONTENT_FILES.loot
		);
		const weight = entry.number("weight");
		if (weight <= 0) throw entry.error("'weight' must be positive");
		if (entry.boolean("gold", false)) return { kind: "gold", weight };
		return { kind: "item", itemId: entry.string("item"), weight };
	});
	return { entries, gold: { min, max } };
}

function indexById<T extends { id: string }>(
	list: T[],
	file: string
): Map<string, T> {
	const map = new Map<string, T>();
	for (const entry of list) {
		if (map.has(entry.id)) throw new ContentError(`duplicate id '${entry.id}'`, file);
		map.set(entry.id, entry);
	}
	return map;
}

function checkReferences(tables: ContentTables): void {
	const requireItem = (id: string, where: string, file: string) => {
		if (!tables.items.has(id))
			throw new ContentError(`${where} references unknown item '${id}'`, file);
	};

	for (const enemy of tables.enemies.values()) {
		for (const drop of enemy.dropTable)
			requireItem(drop.itemId, `enemy '${enemy.id}'`, CONTENT_FILES.enemies);
	}

	if (!tables.rooms.has(tables.startingRoom))
		throw new ContentError(
			`starting_room '${tables.startingRoom}' does not exist`,
			CONTENT_FILES.rooms
		);

	const file = CONTENT_FILES.rooms;
	for (const room of tables.rooms.values()) {
		const where = `room '${room.id}'`;
		for (const [direction, target] of room.exits) {
			if (!tables.rooms.has(target))
				throw new ContentError(
					`${where} exit '${direction}' leads to unknown room '${target}'`,
					file
				);
		}
		for (const key of room.lockedExits.values()) requireItem(key, where, file);
		for (const item of room.items) requireItem(item, where, file);
		if (room.enemyId !== undefined && !tables.enemies.has(room.enemyId))
			throw new ContentError(`${where} references unknown enemy '${room.enemyId}'`, file);
		if (room.chest) {
			if (room.chest.keyRequired !== undefined)
				requireItem(room.chest.keyRequired, where, file);
			for (const item of room.chest.fixedLoot) requireItem(item, where, file);
			if (room.chest.state === "mimic" && !tables.enemies.has("mimic"))
				throw new ContentError(`${where} has a mimic chest but no 'mimic' enemy exists`, file);
		}
		for (const item of room.shop?.inventory ?? []) requireItem(item, where, file);
	}

	for (const tier of LOOT_TIERS) {
		for (const entry of tables.lootTiers[tier].entries) {
			if (entry.kind === "item")
				requireItem(entry.itemId, `loot tier '${tier}'`, CONTENT_FILES.loot);
		}
	}
	for (const id of tables.fountainWeapons) {
		const item = tables.items.get(id);
		if (item?.category !== "weapon")
			throw new ContentError(`fountain weapon '${id}' is not a weapon`, CONTENT_FILES.loot);
	}
	for (const id of tables.fountainArmors) {
		const item = tables.items.get(id);
		if (item?.category !== "armor")
			throw new ContentError(`fountain armor '${id}' is not armor`, CONTENT_FILES.loot);
	}
}

/**
 * Builds and cross-checks the content tables from parsed documents.
 * @throws ContentError on the first problem found
 */
export function buildContent(documents: ContentDocuments): ContentTables {
	const itemsDoc = Fields.of(documents.items, "items.yaml", CONTENT_FILES.items);
	const items = indexById(itemsDoc.list("items").map(parseItem), CONTENT_FILES.items);

	const enemiesDoc = Fields.of(documents.enemies, "enemies.yaml", CONTENT_FILES.enemies);
	const enemies = indexById(
		enemiesDoc.list("enemies").map(parseEnemy),
		CONTENT_FILES.enemies
	);

	const roomsDoc = Fields.of(documents.rooms, "rooms.yaml", CONTENT_FILES.rooms);
	const rooms = indexById(roomsDoc.list("rooms").map(parseRoom), CONTENT_FILES.rooms);
	if (rooms.size === 0) throw roomsDoc.error("no rooms defined");

	const lootDoc = Fields.of(documents.loot, "loot.yaml", CONTENT_FILES.loot);
	const tiersDoc = lootDoc.child("tiers");
	const lootTiers: Record<LootTierName, LootTier> = {
		common: parseLootTier(tiersDoc.child("common"), "common"),
		uncommon: parseLootTier(tiersDoc.child("uncommon"), "uncommon"),
		rare: parseLootTier(tiersDoc.child("rare"), "rare"),
	};
	const fountainDoc = lootDoc.has("fountain") ? lootDoc.child("fountain") : undefined;

	const tables: ContentTables = {
		items,
		enemies,
		rooms,
		startingRoom: roomsDoc.string("starting_room"),
		lootTiers,
		fountainWeapons: fountainDoc?.stringList("weapons") ?? [],
		fountainArmors: fountainDoc?.stringList("armors") ?? [],
	};
	checkReferences(tables);
	return tables;
}

async function readDocument(directory: string, file: string): Promise<unknown> {
	const path = join(directory, file);
	let text: string;
	try {
		text = await readFile(path, "utf-8");
	} catch (error) {
		throw new ContentError(`cannot read ${path}: ${String(error)}`, file);
	}
	try {
		return YAML.load(text);
	} catch (error) {
		throw new ContentError(`invalid YAML: ${String(error)}`, file);
	}
}

/**
 * Reads, checks and returns the content tables from a directory.
 */
export async function loadContentFrom(directory: string): Promise<ContentTables> {
	const [rooms, items, enemies, loot] = await Promise.all([
		readDocument(directory, CONTENT_FILES.rooms),
		readDocument(directory, CONTENT_FILES.items),
		readDocument(directory, CONTENT_FILES.enemies),
		readDocument(directory, CONTENT_FILES.loot),
	]);
	return buildContent({ rooms, items, enemies, loot });
}

export async function loadContent(directory = resolveFromRoot(CONFIG.paths.content)) {
	logger.debug(`Loading content from ${directory}`);
	const tables = await loadContentFrom(directory);
	setContent(tables);
	logger.info(
		`Content loaded: ${tables.rooms.size} rooms, ${tables.items.size} items, ${tables.enemies.size} enemies`
	);
}

export default {
	name: "content",
	dependencies: [configPkg],
	loader: async () => {
		await loadContent();
	},
} satisfies Package;
