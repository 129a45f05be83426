/**
 * Save snapshots: turning live game state into plain data and back.
 *
 * {@link createSnapshot} copies everything that changes during play into a
 * snake_case object that YAML can hold. {@link restoreSnapshot} goes the
 * other way: it builds a complete, new {@link GameState} from the data and
 * checks every field and id reference on the way. Nothing live is touched,
 * so a bad file leaves the running game exactly as it was.
 *
 * @module core/snapshot
 */

import type { ContentTables } from "../registry/content.js";
import { isRecord } from "../utils/types.js";
import { type DIRECTION, isDirection } from "../utils/direction.js";
import { Dungeon } from "./dungeon.js";
import { Enemy, type DropEntry } from "./enemy.js";
import { SaveError } from "./errors.js";
import { Player } from "./player.js";
import { type Chest, type ChestState, type LootTierName, isChestState, isLootTier } from "./room.js";

export const SAVE_VERSION = "1.0";

/** Everything a session needs to carry on. */
export interface GameState {
	dungeon: Dungeon;
	player: Player;
	enemies: Map<string, Enemy>;
	currentRoomId: string;
	usedFountains: Set<string>;
	won: boolean;
}

export interface PlayerSnapshot {
	name: string;
	hp: number;
	max_hp: number;
	attack: number;
	defense: number;
	level: number;
	xp: number;
	xp_to_next: number;
	gold: number;
	inventory: string[];
	equipped_weapon: string | null;
	equipped_armor: string | null;
	max_inventory: number;
}

export interface ChestSnapshot {
	state: ChestState;
	opened: boolean;
	key_required: string | null;
	trap_damage: number | null;
	fixed_loot: string[];
	loot_tier: LootTierName | null;
}

export interface RoomSnapshot {
	visited: boolean;
	items: string[];
	chest: ChestSnapshot | null;
	locked_exits: Record<string, string>;
}

export interface EnemySnapshot {
	id: string;
	name: string;
	hp: number;
	max_hp: number;
	attack: number;
	defense: number;
	xp_reward: number;
	gold_reward: number;
	drop_table: { item: string; chance: number }[];
	description: string;
	defeated: boolean;
}

export interface Snapshot {
	version: string;
	player: PlayerSnapshot;
	current_room: string;
	rooms: Record<string, RoomSnapshot>;
	enemies: Record<string, EnemySnapshot>;
	used_fountains: string[];
	game_won: boolean;
}

function chestToSnapshot(chest: Chest): ChestSnapshot {
	return {
		state: chest.state,
		opened: chest.opened,
		key_required: chest.keyRequired ?? null,
		trap_damage: chest.trapDamage ?? null,
		fixed_loot: [...chest.fixedLoot],
		loot_tier: chest.lootTier ?? null,
	};
}

function enemyToSnapshot(enemy: Enemy): EnemySnapshot {
	const state = enemy.toState();
	return {
		id: state.id,
		name: state.name,
		hp: state.hp,
		max_hp: state.maxHp,
		attack: state.attack,
		defense: state.defense,
		xp_reward: state.xpReward,
		gold_reward: state.goldReward,
		drop_table: state.dropTable.map((entry) => ({ item: entry.itemId, chance: entry.chance })),
		description: state.description,
		defeated: state.defeated,
	};
}

export function createSnapshot(state: GameState): Snapshot {
	const { player } = state;
	const rooms: Record<string, RoomSnapshot> = {};
	for (const room of state.dungeon.getRooms()) {
		rooms[room.id] = {
			visited: room.visited,
			items: [...room.items],
			chest: room.chest ? chestToSnapshot(room.chest) : null,
			locked_exits: Object.fromEntries(room.lockedExits),
		};
	}
	const enemies: Record<string, EnemySnapshot> = {};
	for (const [roomId, enemy] of state.enemies) enemies[roomId] = enemyToSnapshot(enemy);

	return {
		version: SAVE_VERSION,
		player: {
			name: player.name,
			hp: player.hp,
			max_hp: player.maxHp,
			attack: player.attack,
			defense: player.defense,
			level: player.level,
			xp: player.xp,
			xp_to_next: player.xpToNext,
			gold: player.gold,
			inventory: [...player.inventory],
			equipped_weapon: player.equippedWeapon ?? null,
			equipped_armor: player.equippedArmor ?? null,
			max_inventory: player.maxInventory,
		},
		current_room: state.currentRoomId,
		rooms,
		enemies,
		used_fountains: [...state.usedFountains],
		game_won: state.won,
	};
}

/**
 * Typed access to one mapping in the save data. Every failed check throws a
 * {@link SaveError} naming the path of the bad field.
 */
class Reader {
	private constructor(
		private readonly data: Record<string, unknown>,
		readonly path: string
	) {}

	static of(value: unknown, path: string): Reader {
		if (!isRecord(value)) throw new SaveError(`Invalid save file: ${path} must be a mapping`);
		return new Reader(value, path);
	}

	error(message: string): SaveError {
		return new SaveError(`Invalid save file: ${this.path}: ${message}`);
	}

	child(key: string): Reader {
		return Reader.of(this.data[key], `${this.path}.${key}`);
	}

	entries(): [string, unknown][] {
		return Object.entries(this.data);
	}

	has(key: string): boolean {
		const value = this.data[key];
		return value !== undefined && value !== null && value !== "";
	}

	string(key: string): string {
		const value = this.data[key];
		if (typeof value !== "string" || value === "") throw this.error(`'${key}' must be a non-empty string`);
		return value;
	}

	optionalString(key: string): string | undefined {
		return this.has(key) ? this.string(key) : undefined;
	}

	number(key: string, min = 0): number {
		const value = this.data[key];
		if (typeof value !== "number" || !Number.isFinite(value) || value < min) {
			throw this.error(`'${key}' must be a number of at least ${min}`);
		}
		return value;
	}

	integer(key: string, min = 0): number {
		const value = this.number(key, min);
		if (!Number.isInteger(value)) throw this.error(`'${key}' must be a whole number`);
		return value;
	}

	boolean(key: string): boolean {
		const value = this.data[key];
		if (typeof value !== "boolean") throw this.error(`'${key}' must be true or false`);
		return value;
	}

	stringList(key: string): string[] {
		const value = this.data[key];
		if (!Array.isArray(value)) throw this.error(`'${key}' must be a list`);
		const list: string[] = [];
		for (const entry of value) {
			if (typeof entry !== "string") throw this.error(`'${key}' must only hold strings`);
			list.push(entry);
		}
		return list;
	}

	list(key: string): unknown[] {
		const value = this.data[key];
		if (!Array.isArray(value)) throw this.error(`'${key}' must be a list`);
		return value;
	}
}

/**
 * Builds a new game state from snapshot data.
 * @throws SaveError if the data is malformed, from an incompatible version,
 * or refers to rooms, items or enemies the content does not define
 */
export function restoreSnapshot(content: ContentTables, data: unknown): GameState {
	const root = Reader.of(data, "save");
	const version = root.string("version");
	if (version.split(".")[0] !== SAVE_VERSION.split(".")[0]) {
		throw new SaveError(`Incompatible save file version: ${version}`);
	}

	const requireItem = (reader: Reader, itemId: string): string => {
		if (!content.items.has(itemId)) throw reader.error(`unknown item '${itemId}'`);
		return itemId;
	};

	const dungeon = Dungeon.fromDefinitions(content.rooms.values(), content.startingRoom);
	const requireRoom = (reader: Reader, roomId: string): string => {
		if (!dungeon.getRoom(roomId)) throw reader.error(`unknown room '${roomId}'`);
		return roomId;
	};

	const player = readPlayer(root.child("player"), requireItem, content);

	const rooms = root.child("rooms");
	for (const [roomId, value] of rooms.entries()) {
		const room = dungeon.getRoom(roomId);
		if (!room) throw rooms.error(`unknown room '${roomId}'`);
		const reader = Reader.of(value, `${rooms.path}.${roomId}`);
		room.visited = reader.boolean("visited");
		room.items = reader.stringList("items").map((id) => requireItem(reader, id));

		const locks = reader.child("locked_exits");
		const lockedExits = new Map<DIRECTION, string>();
		for (const [direction, key] of locks.entries()) {
			if (!isDirection(direction) || !room.hasExit(direction)) {
				throw locks.error(`'${direction}' is not an exit of this room`);
			}
			if (typeof key !== "string") throw locks.error(`key for '${direction}' must be a string`);
			lockedExits.set(direction, requireItem(locks, key));
		}
		room.lockedExits = lockedExits;

		if (reader.has("chest")) {
			if (!room.chest) throw reader.error("this room has no chest");
			room.chest = readChest(reader.child("chest"), requireItem);
		}
	}

	const enemies = new Map<string, Enemy>();
	const enemyData = root.child("enemies");
	for (const [roomId, value] of enemyData.entries()) {
		requireRoom(enemyData, roomId);
		enemies.set(roomId, readEnemy(Reader.of(value, `${enemyData.path}.${roomId}`), requireItem, content));
	}

	const currentRoomId = requireRoom(root, root.string("current_room"));
	const current = dungeon.getRoom(currentRoomId);
	if (current) current.visited = true;

	const usedFountains = new Set(root.stringList("used_fountains").map((id) => requireRoom(root, id)));

	return {
		dungeon,
		player,
		enemies,
		currentRoomId,
		usedFountains,
		won: root.boolean("game_won"),
	};
}

type ItemCheck = (reader: Reader, itemId: string) => string;

function readPlayer(reader: Reader, requireItem: ItemCheck, content: ContentTables): Player {
	const maxHp = reader.integer("max_hp", 1);
	const hp = reader.integer("hp");
	if (hp > maxHp) throw reader.error("'hp' is above 'max_hp'");

	const maxInventory = reader.integer("max_inventory", 1);
	const inventory = reader.stringList("inventory").map((id) => requireItem(reader, id));
	if (inventory.length > maxInventory) throw reader.error("inventory holds more than 'max_inventory'");

	const equipped = (key: string, category: "weapon" | "armor"): string | undefined => {
		const itemId = reader.optionalString(key);
		if (itemId === undefined) return undefined;
		if (!inventory.includes(itemId)) throw reader.error(`'${key}' is not in the inventory`);
		if (content.items.get(itemId)?.category !== category) {
			throw reader.error(`'${key}' is not a ${category}`);
		}
		return itemId;
	};

	return new Player({
		name: reader.string("name"),
		hp,
		maxHp,
		attack: reader.integer("attack"),
		defense: reader.integer("defense"),
		level: reader.integer("level", 1),
		xp: reader.integer("xp"),
		xpToNext: reader.integer("xp_to_next", 1),
		gold: reader.integer("gold"),
		inventory,
		equippedWeapon: equipped("equipped_weapon", "weapon"),
		equippedArmor: equipped("equipped_armor", "armor"),
		maxInventory,
	});
}

function readChest(reader: Reader, requireItem: ItemCheck): Chest {
	const state = reader.string("state");
	if (!isChestState(state)) throw reader.error(`unknown chest state '${state}'`);
	const keyRequired = reader.optionalString("key_required");
	const lootTier = reader.optionalString("loot_tier");
	if (lootTier !== undefined && !isLootTier(lootTier)) {
		throw reader.error(`unknown loot tier '${lootTier}'`);
	}
	return {
		state,
		opened: reader.boolean("opened"),
		keyRequired: keyRequired === undefined ? undefined : requireItem(reader, keyRequired),
		trapDamage: reader.has("trap_damage") ? reader.integer("trap_damage") : undefined,
		fixedLoot: reader.stringList("fixed_loot").map((id) => requireItem(reader, id)),
		lootTier,
	};
}

function readEnemy(reader: Reader, requireItem: ItemCheck, content: ContentTables): Enemy {
	const id = reader.string("id");
	if (!content.enemies.has(id)) throw reader.error(`unknown enemy '${id}'`);
	const maxHp = reader.integer("max_hp", 1);
	const hp = reader.integer("hp");
	if (hp > maxHp) throw reader.error("'hp' is above 'max_hp'");

	const dropTable: DropEntry[] = reader.list("drop_table").map((value, index): DropEntry => {
		const entry = Reader.of(value, `${reader.path}.drop_table[${index}]`);
		const chance = entry.number("chance");
		if (chance > 1) throw entry.error("'chance' must be between 0 and 1");
		return { itemId: requireItem(entry, entry.string("item")), chance };
	});

	return new Enemy({
		id,
		name: reader.string("name"),
		hp,
		maxHp,
		attack: reader.integer("attack"),
		defense: reader.integer("defense"),
		xpReward: reader.integer("xp_reward"),
		goldReward: reader.integer("gold_reward"),
		dropTable,
		description: reader.optionalString("description") ?? "",
		defeated: reader.boolean("defeated"),
	});
}
