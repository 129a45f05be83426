/**
 * Item definitions.
 *
 * Items are static content: the game only ever moves item ids around
 * (inventory, room floors, chests, shops) and looks the definition up when
 * it needs a name or a number. The definition is a tagged union keyed by
 * `category`, so each category carries only the fields it uses.
 *
 * @example
 * ```typescript
 * const item = content.items.get("iron_sword");
 * if (item?.category === "weapon") console.log(item.damage);
 * ```
 *
 * @module core/item
 */

export const ITEM_CATEGORIES = [
	"weapon",
	"armor",
	"consumable",
	"key",
	"quest",
	"currency",
	"misc",
] as const;

export type ItemCategory = (typeof ITEM_CATEGORIES)[number];

/**
 * Effects a consumable can have when used.
 */
export const CONSUMABLE_EFFECTS = [
	"heal",
	"damage",
	"lifesteal",
	"cure",
	"buff_attack",
	"buff_defense",
	"teleport",
	"recall",
	"timestop",
	"chaos",
] as const;

export type ConsumableEffect = (typeof CONSUMABLE_EFFECTS)[number];

interface ItemBase {
	readonly id: string;
	readonly name: string;
	readonly description: string;
	/** Shop price. Sells for half. */
	readonly value: number;
	readonly weight: number;
	readonly stackable: boolean;
}

export interface WeaponItem extends ItemBase {
	readonly category: "weapon";
	readonly damage: number;
}

export interface ArmorItem extends ItemBase {
	readonly category: "armor";
	readonly defenseBonus: number;
}

export interface ConsumableItem extends ItemBase {
	readonly category: "consumable";
	readonly effectType: ConsumableEffect;
	readonly effectValue: number;
}

export interface PlainItem extends ItemBase {
	readonly category: "key" | "quest" | "currency" | "misc";
}

export type Item = WeaponItem | ArmorItem | ConsumableItem | PlainItem;

export function isItemCategory(value: string): value is ItemCategory {
	return ITEM_CATEGORIES.some((entry) => entry === value);
}

export function isConsumableEffect(value: string): value is ConsumableEffect {
	return CONSUMABLE_EFFECTS.some((entry) => entry === value);
}

/**
 * Short stat summary shown next to an item name, or an empty string.
 *
 * @example
 * itemStatSummary(ironSword); // "+5 damage"
 */
export function itemStatSummary(item: Item): string {
	switch (item.category) {
		case "weapon":
			return `+${item.damage} damage`;
		case "armor":
			return `+${item.defenseBonus} defense`;
		case "consumable":
			switch (item.effectType) {
				case "heal":
					return `restores ${item.effectValue} HP`;
				case "damage":
					return `deals ${item.effectValue} magic damage`;
				case "lifesteal":
					return `drains ${item.effectValue} HP`;
				default:
					return item.effectType.replace(/_/g, " ");
			}
		default:
			return "";
	}
}
