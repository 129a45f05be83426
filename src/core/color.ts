/**
 * Color markup for rendered screens.
 *
 * Screens are built as plain strings with `{letter}` tags (`{R` crimson,
 * `{x` reset). `{{` is a literal `{`. The REPL turns tags into ANSI
 * sequences with {@link colorize}, or drops them with {@link stripColors}
 * when color is off.
 *
 * Text that comes from content or the player goes through
 * {@link escapeColors} before it is embedded in a tagged screen.
 *
 * @module core/color
 */

import { string } from "mud-ext";

export const COLOR_ESCAPE = "{";

const ESC = "\x1b[";

/** ANSI foreground sequences. */
export const FG = {
	BLACK: `${ESC}0;30m`,
	MAROON: `${ESC}0;31m`,
	DARK_GREEN: `${ESC}0;32m`,
	OLIVE: `${ESC}0;33m`,
	DARK_BLUE: `${ESC}0;34m`,
	PURPLE: `${ESC}0;35m`,
	TEAL: `${ESC}0;36m`,
	SILVER: `${ESC}0;37m`,
	GREY: `${ESC}1;30m`,
	CRIMSON: `${ESC}1;31m`,
	LIME: `${ESC}1;32m`,
	YELLOW: `${ESC}1;33m`,
	LIGHT_BLUE: `${ESC}1;34m`,
	PINK: `${ESC}1;35m`,
	CYAN: `${ESC}1;36m`,
	WHITE: `${ESC}1;37m`,
} as const;

export const STYLE = {
	RESET: `${ESC}0m`,
	BOLD: `${ESC}1m`,
	DIM: `${ESC}2m`,
	UNDERLINE: `${ESC}4m`,
} as const;

/**
 * Foreground colors, valued by their tag letter: lowercase for the dark
 * half of the palette, uppercase for the bright half.
 */
export enum COLOR {
	BLACK = "k",
	MAROON = "r",
	DARK_GREEN = "g",
	OLIVE = "y",
	DARK_BLUE = "b",
	PURPLE = "m",
	TEAL = "c",
	SILVER = "w",
	GREY = "K",
	CRIMSON = "R",
	LIME = "G",
	YELLOW = "Y",
	LIGHT_BLUE = "B",
	PINK = "M",
	CYAN = "C",
	WHITE = "W",
}

export enum TEXT_STYLE {
	BOLD = "d",
	DIM = "h",
	UNDERLINE = "u",
}

const RESET_TAG = `${COLOR_ESCAPE}x`;

const COLOR_SEQUENCES: Readonly<Record<COLOR, string>> = {
	[COLOR.BLACK]: FG.BLACK,
	[COLOR.MAROON]: FG.MAROON,
	[COLOR.DARK_GREEN]: FG.DARK_GREEN,
	[COLOR.OLIVE]: FG.OLIVE,
	[COLOR.DARK_BLUE]: FG.DARK_BLUE,
	[COLOR.PURPLE]: FG.PURPLE,
	[COLOR.TEAL]: FG.TEAL,
	[COLOR.SILVER]: FG.SILVER,
	[COLOR.GREY]: FG.GREY,
	[COLOR.CRIMSON]: FG.CRIMSON,
	[COLOR.LIME]: FG.LIME,
	[COLOR.YELLOW]: FG.YELLOW,
	[COLOR.LIGHT_BLUE]: FG.LIGHT_BLUE,
	[COLOR.PINK]: FG.PINK,
	[COLOR.CYAN]: FG.CYAN,
	[COLOR.WHITE]: FG.WHITE,
};

// both {x and {X reset
const TAG_SEQUENCES: ReadonlyMap<string, string> = new Map<string, string>([
	...Object.entries(COLOR_SEQUENCES),
	[TEXT_STYLE.BOLD, STYLE.BOLD],
	[TEXT_STYLE.DIM, STYLE.DIM],
	[TEXT_STYLE.UNDERLINE, STYLE.UNDERLINE],
	["x", STYLE.RESET],
	["X", STYLE.RESET],
]);

// {{ or { followed by any single character
const TAG_PATTERN = /\{(\{|.)/g;

/**
 * Wraps text in a color tag and a reset.
 *
 * @example
 * color("Goblin", COLOR.CRIMSON) // "{RGoblin{x"
 */
export function color(text: string, tint: COLOR): string {
	return `${COLOR_ESCAPE}${tint}${text}${RESET_TAG}`;
}

export function style(text: string, textStyle: TEXT_STYLE): string {
	return `${COLOR_ESCAPE}${textStyle}${text}${RESET_TAG}`;
}

/**
 * Replaces tags with ANSI sequences. Unknown tags are dropped.
 *
 * @example
 * colorize("{rRed text{x") // "\x1b[0;31mRed text\x1b[0m"
 * colorize("{{literal}") // "{literal}"
 */
export function colorize(text: string): string {
	return text.replace(TAG_PATTERN, (_match, code: string) => {
		if (code === COLOR_ESCAPE) return COLOR_ESCAPE;
		return TAG_SEQUENCES.get(code) ?? "";
	});
}

/**
 * Removes every tag, leaving the visible text.
 */
export function stripColors(text: string): string {
	return text.replace(TAG_PATTERN, (_match, code: string) =>
		code === COLOR_ESCAPE ? COLOR_ESCAPE : ""
	);
}

/**
 * Measures tagged text for `mud-ext` layout: `{{` renders as one column,
 * any other tag as none.
 */
export const SIZER: string.Sizer = {
	open: COLOR_ESCAPE,
	unrenderedSequenceLength: (text: string, i: number) => {
		if (text[i] !== COLOR_ESCAPE) return 0;
		return text[i + 1] === COLOR_ESCAPE ? 1 : 2;
	},
	size: (text: string) => stripColors(text).length,
};

/**
 * @example
 * escapeColors("a {b} c") // "a {{b} c"
 */
export function escapeColors(text: string): string {
	return text.split(COLOR_ESCAPE).join(COLOR_ESCAPE + COLOR_ESCAPE);
}
