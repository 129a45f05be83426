import { suite, test } from "node:test";
import assert from "node:assert";
import {
	chance,
	createSeededRng,
	pick,
	randomInt,
	sequenceRng,
	weightedPick,
} from "./random.js";

suite("utils/random.ts", () => {
	suite("randomInt()", () => {
		test("maps the bottom of the range to min", () => {
			assert.strictEqual(randomInt(() => 0, 5, 15), 5);
		});

		test("maps the top of the range to max", () => {
			assert.strictEqual(randomInt(() => 0.999999, 5, 15), 15);
		});

		test("stays within bounds for a seeded source", () => {
			const rng = createSeededRng(7);
			for (let i = 0; i < 1000; i++) {
				const value = randomInt(rng, 1, 6);
				assert.ok(value >= 1 && value <= 6);
			}
		});
	});

	test("chance() compares strictly below the probability", () => {
		assert.strictEqual(chance(() => 0.1, 0.1), false);
		assert.strictEqual(chance(() => 0.09, 0.1), true);
	});

	suite("pick()", () => {
		test("returns undefined for an empty list", () => {
			assert.strictEqual(pick(() => 0.5, []), undefined);
		});

		test("indexes by floor(rng * length)", () => {
			assert.strictEqual(pick(() => 0.5, ["a", "b", "c", "d"]), "c");
		});
	});

	suite("weightedPick()", () => {
		const table = [
			{ value: "a", weight: 40 },
			{ value: "b", weight: 40 },
			{ value: "c", weight: 20 },
		];

		test("roll 1 selects the first entry", () => {
			assert.strictEqual(weightedPick(() => 0, table)?.value, "a");
		});

		test("roll 41 selects the second entry", () => {
			// floor(0.4 * 100) + 1 = 41
			assert.strictEqual(weightedPick(() => 0.4, table)?.value, "b");
		});

		test("roll 100 selects the last entry", () => {
			assert.strictEqual(weightedPick(() => 0.999, table)?.value, "c");
		});

		test("returns undefined when there is no weight", () => {
			assert.strictEqual(weightedPick(() => 0.5, []), undefined);
		});
	});

	suite("createSeededRng()", () => {
		test("is deterministic per seed", () => {
			const a = createSeededRng(123);
			const b = createSeededRng(123);
			for (let i = 0; i < 10; i++) assert.strictEqual(a(), b());
		});

		test("stays in [0, 1)", () => {
			const rng = createSeededRng(99);
			for (let i = 0; i < 1000; i++) {
				const value = rng();
				assert.ok(value >= 0 && value < 1);
			}
		});
	});

	test("sequenceRng() replays then repeats the last value", () => {
		const rng = sequenceRng([0.5, 0.25]);
		assert.deepStrictEqual([rng(), rng(), rng()], [0.5, 0.25, 0.25]);
	});
});
