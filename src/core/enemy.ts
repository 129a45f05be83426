/**
 * Enemies.
 *
 * An {@link EnemyTemplate} comes from content; each room that names an
 * enemy gets its own {@link Enemy} instance when a game starts, so damage
 * and defeat are tracked per room.
 *
 * @module core/enemy
 */

import type { Rng } from "../utils/random.js";

export interface DropEntry {
	itemId: string;
	/** Probability in [0, 1]. */
	chance: number;
}

export interface EnemyTemplate {
	readonly id: string;
	readonly name: string;
	readonly maxHp: number;
	readonly hp: number;
	readonly attack: number;
	readonly defense: number;
	readonly xpReward: number;
	readonly goldReward: number;
	readonly dropTable: ReadonlyArray<Readonly<DropEntry>>;
	readonly description: string;
}

export interface EnemyState {
	id: string;
	name: string;
	hp: number;
	maxHp: number;
	attack: number;
	defense: number;
	xpReward: number;
	goldReward: number;
	dropTable: DropEntry[];
	description: string;
	defeated: boolean;
}

export class Enemy {
	readonly id: string;
	readonly name: string;
	hp: number;
	readonly maxHp: number;
	readonly attack: number;
	readonly defense: number;
	readonly xpReward: number;
	readonly goldReward: number;
	readonly dropTable: ReadonlyArray<DropEntry>;
	readonly description: string;
	private _defeated: boolean;

	constructor(state: EnemyState) {
		this.id = state.id;
		this.name = state.name;
		this.hp = state.hp;
		this.maxHp = state.maxHp;
		this.attack = state.attack;
		this.defense = state.defense;
		this.xpReward = state.xpReward;
		this.goldReward = state.goldReward;
		this.dropTable = state.dropTable.map((entry) => ({ ...entry }));
		this.description = state.description;
		this._defeated = state.defeated;
	}

	/** One-way: once set, it stays set for the game. */
	get defeated(): boolean {
		return this._defeated;
	}

	isAlive(): boolean {
		return this.hp > 0 && !this._defeated;
	}

	/**
	 * Applies damage reduced by defense, never less than 1.
	 * @returns the damage actually dealt
	 */
	takeDamage(amount: number): number {
		const actual = Math.max(1, amount - this.defense);
		this.hp = Math.max(0, this.hp - actual);
		if (this.hp === 0) this._defeated = true;
		return actual;
	}

	/**
	 * Rolls each drop-table entry on its own.
	 * @returns the ids that hit, in table order
	 */
	getDrops(rng: Rng): string[] {
		const drops: string[] = [];
		for (const entry of this.dropTable) {
			if (rng() < entry.chance) drops.push(entry.itemId);
		}
		return drops;
	}

	toState(): EnemyState {
		return {
			id: this.id,
			name: this.name,
			hp: this.hp,
			maxHp: this.maxHp,
			attack: this.attack,
			defense: this.defense,
			xpReward: this.xpReward,
			goldReward: this.goldReward,
			dropTable: this.dropTable.map((entry) => ({ ...entry })),
			description: this.description,
			defeated: this._defeated,
		};
	}
}

/**
 * Fresh instance from a template.
 */
export function createEnemy(template: EnemyTemplate): Enemy {
	return new Enemy({
		id: template.id,
		name: template.name,
		hp: template.hp,
		maxHp: template.maxHp,
		attack: template.attack,
		defense: template.defense,
		xpReward: template.xpReward,
		goldReward: template.goldReward,
		dropTable: template.dropTable.map((entry) => ({ ...entry })),
		description: template.description,
		defeated: false,
	});
}
