import { suite, test } from "node:test";
import assert from "node:assert";
import { PassThrough, Writable } from "stream";
import { tmpdir } from "os";
import { join } from "path";
import { formatMessage, runRepl } from "./repl.js";
import { MESSAGE_GROUP } from "./core/message.js";
import { CONFIG_DEFAULT } from "./registry/config.js";
import { createTestContent } from "./testing/fixtures.js";
import { sequenceRng } from "./utils/random.js";

async function session(input: string[], savePath = "unused-save.yaml"): Promise<string[]> {
	const stdin = new PassThrough();
	let written = "";
	const stdout = new Writable({
		write(chunk: Buffer, _encoding, callback) {
			written += chunk.toString("utf-8");
			callback();
		},
	});
	const done = runRepl({
		content: createTestContent(),
		config: CONFIG_DEFAULT,
		rng: sequenceRng([0.99]),
		savePath,
		input: stdin,
		output: stdout,
	});
	stdin.write(input.map((line) => `${line}\n`).join(""));
	await done;
	return written.split("\n");
}

/** Prompts are not followed by a newline, so output can share their line. */
function shows(lines: string[], text: string): boolean {
	return lines.some((line) => line.includes(text));
}

suite("repl.ts", () => {
	test("formatMessage() should mark plain responses and keep braces", () => {
		assert.strictEqual(
			formatMessage({ group: MESSAGE_GROUP.COMMAND_RESPONSE, text: "There is no '{x' here." }),
			">> There is no '{x' here."
		);
		assert.strictEqual(
			formatMessage({ group: MESSAGE_GROUP.SYSTEM, text: "Quit cancelled." }),
			"Quit cancelled."
		);
		assert.strictEqual(formatMessage({ group: MESSAGE_GROUP.ERROR, text: "No {R here." }, false), ">> No {R here.");
	});

	test("should quit from the title menu", async () => {
		const lines = await session(["9", "3"]);
		assert.ok(shows(lines, ">> Please enter 1, 2, or 3."));
		assert.ok(shows(lines, "Farewell, adventurer!"));
	});

	test("should play a new game until the player quits", async () => {
		const lines = await session(["1", "Ayla", "take torch", "quit", "y"]);
		assert.ok(shows(lines, "Welcome, Ayla! Your adventure begins..."));
		assert.ok(shows(lines, ">> You picked up Torch."));
		assert.ok(shows(lines, "Farewell, adventurer!"));
	});

	test("should end the program when the player dies", async () => {
		const lines = await session(["1", "Ayla", "w", "w", "attack", "look"]);
		assert.ok(shows(lines, "=== COMBAT ==="));
		assert.ok(shows(lines, "YOU HAVE DIED"));
		assert.strictEqual(shows(lines, "The game has ended."), false);
	});

	test("should return to the title when there is no save to load", async () => {
		const path = join(tmpdir(), "dungeon-crawl-repl-missing", "save.yaml");
		const lines = await session(["2", "3"], path);
		assert.ok(shows(lines, ">> No save file found."));
		assert.ok(shows(lines, "Farewell, adventurer!"));
	});
});
