/**
 * Random number helpers.
 *
 * Every roll in the game goes through an {@link Rng}, a function returning a
 * float in [0, 1). The game holds one and hands it to the systems, so tests
 * can swap in {@link createSeededRng} or a scripted sequence.
 *
 * @module utils/random
 */

/** A source of uniform floats in [0, 1). */
export type Rng = () => number;

export const defaultRng: Rng = Math.random;

/**
 * Inclusive integer in [min, max].
 *
 * @example
 * randomInt(rng, 1, 6); // a die roll
 */
export function randomInt(rng: Rng, min: number, max: number): number {
	return Math.floor(rng() * (max - min + 1)) + min;
}

/**
 * True with the given probability.
 */
export function chance(rng: Rng, probability: number): boolean {
	return rng() < probability;
}

/**
 * Uniform choice from a non-empty list.
 * Returns undefined for an empty list.
 */
export function pick<T>(rng: Rng, list: ReadonlyArray<T>): T | undefined {
	if (list.length === 0) return undefined;
	return list[Math.floor(rng() * list.length)];
}

/**
 * Cumulative-weight draw: rolls an integer in [1, total weight] and returns
 * the first entry whose running weight reaches it.
 *
 * @example
 * weightedPick(rng, [
 * 	{ weight: 40, value: "health_potion" },
 * 	{ weight: 60, value: "gold" },
 * ]);
 */
export function weightedPick<T extends { weight: number }>(
	rng: Rng,
	entries: ReadonlyArray<T>
): T | undefined {
	const total = entries.reduce((sum, entry) => sum + entry.weight, 0);
	if (total <= 0) return undefined;
	const roll = randomInt(rng, 1, total);
	let cumulative = 0;
	for (const entry of entries) {
		cumulative += entry.weight;
		if (roll <= cumulative) return entry;
	}
	return undefined;
}

/**
 * Deterministic generator (mulberry32) for tests and replays.
 *
 * @example
 * const rng = createSeededRng(42);
 * rng(); // same value on every run
 */
export function createSeededRng(seed: number): Rng {
	let state = seed >>> 0;
	return () => {
		state = (state + 0x6d2b79f5) >>> 0;
		let t = state;
		t = Math.imul(t ^ (t >>> 15), t | 1);
		t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
		return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
	};
}

/**
 * Rng that replays a fixed list of values, then repeats the last one.
 * Used to script exact outcomes.
 *
 * @example
 * const rng = sequenceRng([0.99, 0.0]);
 * rng(); // 0.99
 * rng(); // 0
 * rng(); // 0
 */
export function sequenceRng(values: ReadonlyArray<number>): Rng {
	let index = 0;
	return () => {
		const value = values[Math.min(index, values.length - 1)] ?? 0;
		index++;
		return value;
	};
}
