/**
 * Display utility functions for rendering game screens as tagged text.
 *
 * Every function returns a string of lines joined with `\n`, using the
 * `{letter}` color tags from {@link module:core/color}. Content text (room
 * and item names, descriptions) is escaped before it is embedded. The REPL
 * turns the tags into ANSI codes; tests can read the text through
 * `stripColors`.
 *
 * @module utils/display
 */

import type { Game } from "../game.js";
import type { Player } from "../core/player.js";
import type { Enemy } from "../core/enemy.js";
import type { Room } from "../core/room.js";
import { type Item, itemStatSummary } from "../core/item.js";
import { type CommandObject, GAME_MODE } from "../core/command.js";
import { string } from "mud-ext";
import { COLOR, SIZER, TEXT_STYLE, color, escapeColors, style } from "../core/color.js";

export const WIDTH = 70;

function border(char = "="): string {
	return char.repeat(WIDTH);
}

function center(text: string, width = WIDTH): string {
	return string.pad({ string: text, width, textAlign: string.ALIGN.CENTER, sizer: SIZER });
}

function padLeft(text: string, width: number): string {
	return string.pad({ string: text, width, textAlign: string.ALIGN.LEFT, sizer: SIZER });
}

/**
 * Frames lines in a plain box with a centered title.
 */
function framed(lines: string[], title: string, tint: COLOR, width = WIDTH): string {
	return string
		.box({
			input: lines,
			width,
			title,
			color: (str) => color(str, tint),
			sizer: SIZER,
			style: {
				...string.BOX_STYLES.PLAIN,
				titleHAlign: string.ALIGN.CENTER,
			},
		})
		.join("\n");
}

function header(title: string, char: string, tint: COLOR): string[] {
	return [color(border(char), tint), color(center(title), tint), color(border(char), tint)];
}

function label(item: Item | undefined, id: string): string {
	return escapeColors(item?.name ?? id);
}

function itemLine(item: Item | undefined, id: string, count = 1): string {
	const name = label(item, id);
	const tint = item?.category === "consumable" ? COLOR.LIME : COLOR.YELLOW;
	let line = color(name, tint);
	if (count > 1) line += ` ${color(`x${count}`, COLOR.GREY)}`;
	const summary = item ? itemStatSummary(item) : "";
	if (summary) line += ` (${summary})`;
	return line;
}

/**
 * Groups items by a key, keeping first-seen order.
 *
 * @example
 * ```typescript
 * const groups = groupItems(["potion", "sword", "potion"], (id) => id);
 * // groups.get("potion") = { item: "potion", count: 2 }
 * ```
 */
export function groupItems<T>(
	items: ReadonlyArray<T>,
	keyFn: (item: T) => string
): Map<string, { item: T; count: number }> {
	const groups = new Map<string, { item: T; count: number }>();

	for (const item of items) {
		const key = keyFn(item);

		const existing = groups.get(key);
		if (existing) {
			existing.count++;
		} else {
			groups.set(key, { item, count: 1 });
		}
	}

	return groups;
}

/**
 * Stackable items share a line; everything else gets one line per copy.
 */
function groupIds(game: Game, ids: ReadonlyArray<string>) {
	let unique = 0;
	return groupItems(ids, (id) =>
		game.getItem(id)?.stackable ? id : `${id}#${unique++}`
	);
}

/**
 * Horizontal health bar, colored by how much is left.
 *
 * @example
 * stripColors(hpBar(50, 100, 10)) // "[@@@@@.....] 50/100 HP"
 */
export function hpBar(current: number, maximum: number, width = 20): string {
	const ratio = maximum > 0 ? Math.max(0, current) / maximum : 0;
	const filled = Math.min(width, Math.floor(width * ratio));
	const tint = ratio > 0.6 ? COLOR.LIME : ratio > 0.3 ? COLOR.YELLOW : COLOR.CRIMSON;
	const bar = color("@".repeat(filled), tint) + color(".".repeat(width - filled), COLOR.GREY);
	return `[${bar}] ${current}/${maximum} HP`;
}

function renderChest(game: Game, room: Room): string | undefined {
	const chest = room.chest;
	if (!chest || chest.opened) return undefined;
	switch (chest.state) {
		case "locked": {
			const key = chest.keyRequired;
			const keyName = key === undefined ? "a key" : `the ${label(game.getItem(key), key)}`;
			return `  CHEST: A locked chest sits here. It requires ${keyName}.`;
		}
		case "trapped":
			return "  CHEST: A chest sits here. Something seems off about it...";
		default:
			return "  CHEST: An unlocked chest awaits opening.";
	}
}

export interface RenderRoomOptions {
	/** Use the short description (repeat visits). */
	brief?: boolean;
}

/**
 * Full room screen: name, description, floor items, chest, features, exits
 * and any living enemy.
 */
export function renderRoom(game: Game, room: Room, options: RenderRoomOptions = {}): string {
	const lines: string[] = [
		color(border(), COLOR.CYAN),
		style(center(escapeColors(room.name.toUpperCase())), TEXT_STYLE.BOLD),
		color(border(), COLOR.CYAN),
		"",
	];
	const description = options.brief ? room.shortDescription : room.description;
	lines.push(
		...string.wrap({ string: escapeColors(description), width: WIDTH - 4, sizer: SIZER }),
		""
	);

	if (room.hasItems()) {
		lines.push(color("  ITEMS ON THE GROUND:", COLOR.YELLOW));
		for (const { item: id, count } of groupIds(game, room.items).values()) {
			lines.push(`    - ${itemLine(game.getItem(id), id, count)}`);
		}
		lines.push("");
	}

	const chest = renderChest(game, room);
	if (chest) lines.push(color(chest, COLOR.OLIVE), "");

	if (room.shop) lines.push(color("  A merchant is open for business. Type 'shop' to browse.", COLOR.YELLOW), "");
	if (room.fountain) {
		const used = game.usedFountains.has(room.id);
		lines.push(
			color(
				used
					? "  FOUNTAIN: The fountain's water is still and ordinary now."
					: "  FOUNTAIN: Magical water shimmers in a fountain here. Type 'drink'.",
				COLOR.PINK
			),
			""
		);
	}
	if (room.tavern) lines.push(color("  The dice table is open. Type 'gamble' to see the games.", COLOR.YELLOW), "");

	const directions = room.getExitDirections();
	if (directions.length > 0) {
		lines.push(color("  EXITS:", COLOR.CYAN));
		for (const direction of directions) {
			const target = game.dungeon.getExitTarget(room, direction);
			const name = target ? escapeColors(target.name) : "???";
			let line = `    ${padLeft(direction.toUpperCase(), 8)} ${color("->", COLOR.GREY)} ${name}`;
			const key = room.getRequiredKey(direction);
			if (key !== undefined) {
				line += color(` [LOCKED - need ${label(game.getItem(key), key)}]`, COLOR.CRIMSON);
			}
			lines.push(line);
		}
		lines.push("");
	}

	const enemy = game.getRoomEnemy(room.id);
	if (enemy?.isAlive()) {
		lines.push(
			color(border("!"), COLOR.CRIMSON),
			color(`  DANGER: A ${escapeColors(enemy.name)} blocks your path!`, COLOR.CRIMSON),
			color(`  ${escapeColors(enemy.description)}`, COLOR.GREY),
			color(
				`  HP: ${enemy.hp}/${enemy.maxHp}  ATK: ${enemy.attack}  DEF: ${enemy.defense}`,
				COLOR.CRIMSON
			),
			color(border("!"), COLOR.CRIMSON),
			""
		);
	}

	lines.push(color(border(), COLOR.CYAN));
	return lines.join("\n");
}

export function renderCombatStatus(game: Game, enemy: Enemy): string {
	const player = game.player;
	const lines = [
		`${color("YOU:", COLOR.LIME)} ${escapeColors(player.name)}`,
		`     ${hpBar(player.hp, player.maxHp)}`,
		`     ATK: ${player.attack}  DEF: ${player.defense}`,
		"",
		`${color("ENEMY:", COLOR.CRIMSON)} ${escapeColors(enemy.name)}`,
		`     ${hpBar(enemy.hp, enemy.maxHp)}`,
		`     ATK: ${enemy.attack}  DEF: ${enemy.defense}`,
		"",
		style("YOUR OPTIONS:", TEXT_STYLE.BOLD),
		`  ${color("attack", COLOR.CRIMSON)}       - Strike with your weapon`,
		`  ${color("use <item>", COLOR.LIME)}   - Use a potion or scroll`,
		`  ${color("flee", COLOR.YELLOW)}         - Try to escape`,
	];
	return framed(lines, "=== COMBAT ===", COLOR.CRIMSON);
}

export function renderInventory(game: Game): string {
	const player = game.player;
	const lines = [...header("=== INVENTORY ===", "-", COLOR.YELLOW), ""];

	if (player.inventory.length === 0) {
		lines.push("  Your inventory is empty.");
	} else {
		lines.push(style("  CARRIED ITEMS:", TEXT_STYLE.BOLD));
		for (const { item: id, count } of groupIds(game, player.inventory).values()) {
			let line = `    ${itemLine(game.getItem(id), id, count)}`;
			if (player.isEquipped(id)) line += color(" [EQUIPPED]", COLOR.LIME);
			lines.push(line);
		}
	}

	lines.push("", style("  EQUIPMENT:", TEXT_STYLE.BOLD));
	const weapon = player.equippedWeapon === undefined ? undefined : game.getItem(player.equippedWeapon);
	const armor = player.equippedArmor === undefined ? undefined : game.getItem(player.equippedArmor);
	lines.push(
		weapon?.category === "weapon"
			? `    Weapon: ${color(escapeColors(weapon.name), COLOR.YELLOW)} (+${weapon.damage} damage)`
			: `    Weapon: ${color("Bare Fists", COLOR.GREY)} (+0 damage)`,
		armor?.category === "armor"
			? `    Armor:  ${color(escapeColors(armor.name), COLOR.CYAN)} (+${armor.defenseBonus} defense)`
			: `    Armor:  ${color("None", COLOR.GREY)} (+0 defense)`,
		"",
		`  ${color("Gold:", COLOR.YELLOW)} ${player.gold}`,
		`  Inventory: ${player.inventory.length}/${player.maxInventory} slots`,
		color(border("-"), COLOR.YELLOW)
	);
	return lines.join("\n");
}

export function renderStats(player: Player): string {
	const xpRatio = player.xpToNext > 0 ? player.xp / player.xpToNext : 0;
	const xpFilled = Math.min(20, Math.floor(20 * xpRatio));
	const xpBar = `[${color("=".repeat(xpFilled), COLOR.CYAN)}${color("-".repeat(20 - xpFilled), COLOR.GREY)}]`;
	const lines = [
		...header(`=== ${escapeColors(player.name.toUpperCase())}'S STATS ===`, "-", COLOR.LIME),
		"",
		`  Level:   ${style(String(player.level), TEXT_STYLE.BOLD)}`,
		`  HP:      ${hpBar(player.hp, player.maxHp)}`,
		`  Attack:  ${player.attack}`,
		`  Defense: ${player.defense}`,
		"",
		`  XP:      ${xpBar} ${player.xp}/${player.xpToNext}`,
		"",
		`  ${color("Gold:", COLOR.YELLOW)} ${player.gold}`,
		color(border("-"), COLOR.LIME),
	];
	return lines.join("\n");
}

/**
 * Visited rooms in content order. Exits into rooms not yet visited show
 * as `???`.
 */
export function renderMap(game: Game): string {
	const lines = [...header("=== DUNGEON MAP ===", "-", COLOR.LIGHT_BLUE), ""];
	for (const room of game.dungeon.getVisitedRooms()) {
		const here = room.id === game.currentRoomId;
		const name = escapeColors(room.name);
		const tag = here ? color(`[*${name}*]`, COLOR.LIME) : color(`[${name}]`, COLOR.CYAN);
		const exits = room.getExitDirections().map((direction) => {
			const target = game.dungeon.getExitTarget(room, direction);
			const targetName = target?.visited ? escapeColors(target.name) : "???";
			const lock = room.isExitLocked(direction) ? " (locked)" : "";
			return `${direction}: ${targetName}${lock}`;
		});
		lines.push(`  ${tag}`);
		if (exits.length > 0) lines.push(`      ${exits.join(", ")}`);
	}
	lines.push(
		"",
		`  ${color("[*NAME*]", COLOR.LIME)} = Your location`,
		`  ${color("[NAME]", COLOR.CYAN)} = Discovered`,
		`  ${color("???", COLOR.GREY)} = Undiscovered`,
		color(border("-"), COLOR.LIGHT_BLUE)
	);
	return lines.join("\n");
}

export function renderShop(game: Game, room: Room): string {
	const gold = game.player.gold;
	const lines = [
		...header("=== SHOP ===", "$", COLOR.YELLOW),
		"",
		`  Your Gold: ${color(String(gold), COLOR.YELLOW)}`,
		"",
		style("  FOR SALE:", TEXT_STYLE.BOLD),
	];
	(room.shop?.inventory ?? []).forEach((id, index) => {
		const item = game.getItem(id);
		const price = item?.value ?? 0;
		const priceTag = color(`${price}g`, gold >= price ? COLOR.LIME : COLOR.CRIMSON);
		const summary = item ? itemStatSummary(item) : "";
		lines.push(
			`    ${index + 1}. ${label(item, id)} - ${priceTag}${summary ? ` (${summary})` : ""}`
		);
	});
	lines.push(
		"",
		color("  COMMANDS:", COLOR.GREY),
		`    ${color("buy <item>", COLOR.LIME)}  - Purchase an item`,
		`    ${color("sell <item>", COLOR.YELLOW)} - Sell an item from inventory for half its value`,
		color(border("$"), COLOR.YELLOW)
	);
	return lines.join("\n");
}

/**
 * Command list for the current mode, in registration order.
 */
export function renderHelp(commands: ReadonlyArray<CommandObject>, mode: GAME_MODE): string {
	const lines: string[] = [];
	const available = commands.filter((command) => command.modes.includes(mode));
	for (const command of available) {
		const usage = [command.usage, ...(command.aliases ?? [])].join(" / ");
		lines.push(`${padLeft(color(usage, COLOR.CYAN), 28)} ${command.description}`);
	}
	if (mode === GAME_MODE.IN_COMBAT) {
		lines.push("", color("You are in combat. Other commands return once it ends.", COLOR.GREY));
	}
	return framed(lines, "=== ALL COMMANDS ===", COLOR.CYAN, 80);
}

export function renderTitle(gameName: string): string {
	return [
		color(border(), COLOR.CYAN),
		"",
		style(center(escapeColors(gameName.toUpperCase())), TEXT_STYLE.BOLD),
		color(center("A Text-Based Dungeon Adventure"), COLOR.GREY),
		color(center("Explore, Fight, Survive"), COLOR.GREY),
		"",
		color(border(), COLOR.CYAN),
		"",
		`  ${style("1.", TEXT_STYLE.BOLD)} New Game`,
		`  ${style("2.", TEXT_STYLE.BOLD)} Load Game`,
		`  ${style("3.", TEXT_STYLE.BOLD)} Quit`,
	].join("\n");
}

export function renderGameOver(player: Player): string {
	return [
		color(border(), COLOR.CRIMSON),
		"",
		color(center("YOU HAVE DIED"), COLOR.CRIMSON),
		"",
		center(`${escapeColors(player.name)} has fallen in the dungeon.`),
		center("The darkness claims another soul..."),
		"",
		center(`Level Reached: ${player.level}`),
		center(`Gold Collected: ${player.gold}`),
		"",
		color(border(), COLOR.CRIMSON),
	].join("\n");
}

export function renderVictory(player: Player, bossName: string): string {
	return [
		color(border(), COLOR.YELLOW),
		"",
		color(center("=== VICTORY ==="), COLOR.YELLOW),
		"",
		center(`${escapeColors(player.name)} has defeated the ${escapeColors(bossName)}!`),
		center("The dungeon's evil is vanquished... for now."),
		"",
		center(`Final Level: ${player.level}`),
		center(`Gold Collected: ${player.gold}`),
		"",
		color(border(), COLOR.YELLOW),
	].join("\n");
}
