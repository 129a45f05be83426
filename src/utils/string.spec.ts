import { test, suite } from "node:test";
import assert from "node:assert";
import { capitalizeFirst, titleFromId } from "./string.js";

suite("utils/string.ts", () => {
	suite("capitalizeFirst()", () => {
		test("should capitalize first letter of plain text", () => {
			assert.strictEqual(capitalizeFirst("a sword"), "A sword");
			assert.strictEqual(capitalizeFirst("goblin"), "Goblin");
		});

		test("should handle empty string", () => {
			assert.strictEqual(capitalizeFirst(""), "");
		});

		test("should capitalize first letter after color codes", () => {
			assert.strictEqual(capitalizeFirst("{ra red sword{x"), "{rA red sword{x");
			assert.strictEqual(capitalizeFirst("{Ra red sword{x"), "{RA red sword{x");
		});

		test("should skip an escaped brace", () => {
			assert.strictEqual(capitalizeFirst("{{not a code}"), "{{Not a code}");
		});
	});

	test("titleFromId() converts snake case", () => {
		assert.strictEqual(titleFromId("mossy_antechamber"), "Mossy Antechamber");
	});
});
