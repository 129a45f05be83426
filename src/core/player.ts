/**
 * The player character.
 *
 * Holds stats, gold and an ordered inventory of item ids. Equipment slots
 * point at ids that are also in the inventory; the drop and sell paths
 * refuse equipped ids so that stays true.
 *
 * @module core/player
 */

export interface PlayerOptions {
	name: string;
	hp?: number;
	maxHp?: number;
	attack?: number;
	defense?: number;
	level?: number;
	xp?: number;
	xpToNext?: number;
	gold?: number;
	inventory?: string[];
	equippedWeapon?: string;
	equippedArmor?: string;
	maxInventory?: number;
}

export const PLAYER_DEFAULTS = {
	maxHp: 100,
	attack: 10,
	defense: 2,
	level: 1,
	xp: 0,
	xpToNext: 50,
	gold: 0,
	maxInventory: 10,
} as const;

/** Growth applied on every level-up. */
export const LEVEL_UP = {
	xpMultiplier: 1.5,
	maxHp: 10,
	attack: 2,
	defense: 1,
} as const;

export class Player {
	name: string;
	hp: number;
	maxHp: number;
	attack: number;
	defense: number;
	level: number;
	xp: number;
	xpToNext: number;
	gold: number;
	inventory: string[];
	equippedWeapon?: string;
	equippedArmor?: string;
	maxInventory: number;

	constructor(options: PlayerOptions) {
		this.name = options.name;
		this.maxHp = options.maxHp ?? PLAYER_DEFAULTS.maxHp;
		this.hp = options.hp ?? this.maxHp;
		this.attack = options.attack ?? PLAYER_DEFAULTS.attack;
		this.defense = options.defense ?? PLAYER_DEFAULTS.defense;
		this.level = options.level ?? PLAYER_DEFAULTS.level;
		this.xp = options.xp ?? PLAYER_DEFAULTS.xp;
		this.xpToNext = options.xpToNext ?? PLAYER_DEFAULTS.xpToNext;
		this.gold = options.gold ?? PLAYER_DEFAULTS.gold;
		this.inventory = [...(options.inventory ?? [])];
		this.equippedWeapon = options.equippedWeapon;
		this.equippedArmor = options.equippedArmor;
		this.maxInventory = options.maxInventory ?? PLAYER_DEFAULTS.maxInventory;
	}

	isAlive(): boolean {
		return this.hp > 0;
	}

	/**
	 * Applies damage reduced by base defense, never less than 1.
	 * @returns the damage actually dealt
	 */
	takeDamage(amount: number): number {
		const actual = Math.max(1, amount - this.defense);
		this.hp = Math.max(0, this.hp - actual);
		return actual;
	}

	/**
	 * Heals up to max hp.
	 * @returns the hp actually restored
	 */
	heal(amount: number): number {
		const before = this.hp;
		this.hp = Math.min(this.maxHp, this.hp + amount);
		return this.hp - before;
	}

	/**
	 * Adds xp. Crossing the threshold spends it and grants one level; any
	 * remainder carries over, even when it exceeds the new threshold.
	 * @returns whether a level was gained
	 */
	gainXp(amount: number): boolean {
		this.xp += amount;
		if (this.xp < this.xpToNext) return false;
		this.xp -= this.xpToNext;
		this.applyLevelUp();
		return true;
	}

	/**
	 * Level growth without touching xp.
	 */
	applyLevelUp(): void {
		this.level += 1;
		this.xpToNext = Math.floor(this.xpToNext * LEVEL_UP.xpMultiplier);
		this.maxHp += LEVEL_UP.maxHp;
		this.hp = this.maxHp;
		this.attack += LEVEL_UP.attack;
		this.defense += LEVEL_UP.defense;
	}

	canAddItem(): boolean {
		return this.inventory.length < this.maxInventory;
	}

	/**
	 * @returns false, leaving the inventory unchanged, when it is full
	 */
	addItem(itemId: string): boolean {
		if (!this.canAddItem()) return false;
		this.inventory.push(itemId);
		return true;
	}

	/**
	 * Removes the first occurrence of an item id.
	 */
	removeItem(itemId: string): boolean {
		const index = this.inventory.indexOf(itemId);
		if (index === -1) return false;
		this.inventory.splice(index, 1);
		return true;
	}

	hasItem(itemId: string): boolean {
		return this.inventory.includes(itemId);
	}

	isEquipped(itemId: string): boolean {
		return this.equippedWeapon === itemId || this.equippedArmor === itemId;
	}

	addGold(amount: number): void {
		this.gold += amount;
	}
}
