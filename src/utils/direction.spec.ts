import { suite, test } from "node:test";
import assert from "node:assert";
import { DIRECTION, DIRECTION_ALIASES, isDirection, normalizeDirection } from "./direction.js";

suite("utils/direction.ts", () => {
	suite("normalizeDirection()", () => {
		test("expands abbreviations", () => {
			assert.strictEqual(normalizeDirection("n"), "north");
			assert.strictEqual(normalizeDirection("D"), "down");
		});

		test("passes other words through lower-cased", () => {
			assert.strictEqual(normalizeDirection("West"), "west");
			assert.strictEqual(normalizeDirection("left"), "left");
		});
	});

	test("isDirection() only accepts full names", () => {
		assert.strictEqual(isDirection("south"), true);
		assert.strictEqual(isDirection("s"), false);
	});

	test("every alias maps to a distinct direction", () => {
		assert.strictEqual(DIRECTION_ALIASES.get("u"), DIRECTION.UP);
		assert.strictEqual(new Set(DIRECTION_ALIASES.values()).size, 6);
	});
});
