/**
 * String helpers for tagged (colored) text. Layout (padding, wrapping,
 * boxes) goes through `mud-ext` with the
 * `SIZER` from core/color.
 */

import { COLOR_ESCAPE } from "../core/color.js";

/**
 * Capitalizes the first letter of a string while preserving color codes.
 *
 * @example
 * ```typescript
 * capitalizeFirst("a sword") // "A sword"
 * capitalizeFirst("{Ra red sword{x") // "{RA red sword{x"
 * capitalizeFirst("{{not a code}") // "{{not a code}" (literal { preserved)
 * ```
 */
export function capitalizeFirst(text: string): string {
	let i = 0;
	while (i < text.length) {
		if (text[i] === COLOR_ESCAPE) {
			// {{ is a literal brace, {letter is a code; skip either
			i += 2;
			continue;
		}
		return text.slice(0, i) + text[i].toUpperCase() + text.slice(i + 1);
	}
	return text;
}

/**
 * Converts a snake_case id to a title for display.
 *
 * @example
 * titleFromId("mossy_antechamber") // "Mossy Antechamber"
 */
export function titleFromId(id: string): string {
	return id
		.split("_")
		.filter(Boolean)
		.map((part) => capitalizeFirst(part))
		.join(" ");
}
