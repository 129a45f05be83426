import { suite, test, before, after } from "node:test";
import assert from "node:assert";
import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { COMBAT_HINT, Game, UNKNOWN_COMMAND } from "./game.js";
import { GAME_MODE } from "./core/command.js";
import { MESSAGE_GROUP } from "./core/message.js";
import { CONFIG_DEFAULT } from "./registry/config.js";
import { createTestContent, createTestGame, texts } from "./testing/fixtures.js";
import { sequenceRng } from "./utils/random.js";

suite("game.ts", () => {
	test("should welcome the player and show the first room", () => {
		const game = new Game({
			content: createTestContent(),
			config: CONFIG_DEFAULT,
			rng: sequenceRng([0.99]),
			savePath: "unused-save.yaml",
			playerName: "Ayla",
		});
		const output = game.takeOutput();
		assert.deepStrictEqual(output[0], {
			group: MESSAGE_GROUP.SYSTEM,
			text: "Welcome, Ayla! Your adventure begins...",
		});
		assert.strictEqual(output[1]?.group, MESSAGE_GROUP.INFO);
		assert.strictEqual(game.mode, GAME_MODE.EXPLORING);
		assert.strictEqual(game.currentRoom.visited, true);
	});

	suite("execute()", () => {
		test("should report unknown commands", () => {
			const game = createTestGame();
			assert.deepStrictEqual(game.execute("dance"), [
				{ group: MESSAGE_GROUP.ERROR, text: UNKNOWN_COMMAND },
			]);
		});

		test("should ignore blank lines", () => {
			const game = createTestGame();
			assert.deepStrictEqual(game.execute("   "), []);
		});

		test("should refuse combat-only commands while exploring", () => {
			const game = createTestGame();
			assert.deepStrictEqual(texts(game.execute("flee")), ["You're not in combat."]);
		});

		test("should expand aliases", () => {
			const game = createTestGame();
			assert.deepStrictEqual(texts(game.execute("Pick up TORCH!")), ["You picked up Torch."]);
			assert.deepStrictEqual(texts(game.execute("get potion")), ["You picked up Health Potion."]);
		});

		test("should only accept combat commands during a fight", () => {
			const game = createTestGame();
			game.execute("n");
			assert.strictEqual(game.mode, GAME_MODE.IN_COMBAT);
			assert.strictEqual(game.combatTarget?.id, "goblin");
			for (const line of ["take torch", "look", "s", "save", "dance"]) {
				assert.deepStrictEqual(game.execute(line), [{ group: MESSAGE_GROUP.ERROR, text: COMBAT_HINT }]);
			}
			assert.strictEqual(game.currentRoomId, "den");
		});
	});

	suite("movement", () => {
		test("should fail through a wall", () => {
			const game = createTestGame();
			assert.deepStrictEqual(game.execute("s"), [
				{ group: MESSAGE_GROUP.ERROR, text: "There is no exit to the south." },
			]);
			assert.strictEqual(game.currentRoomId, "hall");
		});

		test("should show the short description on a return visit", () => {
			const game = createTestGame();
			game.execute("d");
			const output = game.execute("u");
			assert.strictEqual(output.length, 1);
			assert.match(output[0]?.text ?? "", /The great hall\./);
		});

		test("should keep a locked exit open once the key has been used", () => {
			const game = createTestGame();
			assert.deepStrictEqual(texts(game.execute("e")), ["The way east is locked. You need a key."]);

			game.player.addItem("iron_key");
			const output = game.execute("east");
			assert.deepStrictEqual(output[0], {
				group: MESSAGE_GROUP.COMMAND_RESPONSE,
				text: "You use the Iron Key to unlock the door and proceed east.",
			});
			assert.strictEqual(game.currentRoomId, "vault");

			game.execute("w");
			game.execute("drop key");
			assert.deepStrictEqual(game.player.inventory, []);
			game.execute("e");
			assert.strictEqual(game.currentRoomId, "vault");
		});
	});

	suite("quitting", () => {
		test("should ask for confirmation and accept a no", () => {
			const game = createTestGame();
			assert.deepStrictEqual(game.execute("quit"), [
				{ group: MESSAGE_GROUP.PROMPT, text: "Are you sure you want to quit? (y/n)" },
			]);
			assert.deepStrictEqual(texts(game.execute("n")), ["Quit cancelled."]);
			assert.strictEqual(game.mode, GAME_MODE.EXPLORING);
			assert.strictEqual(game.currentRoomId, "hall");
		});

		test("should end the session on yes", () => {
			const game = createTestGame();
			game.execute("q");
			assert.deepStrictEqual(texts(game.execute("yes")), ["Farewell, adventurer!"]);
			assert.strictEqual(game.mode, GAME_MODE.QUIT);
			assert.deepStrictEqual(texts(game.execute("look")), ["The game has ended."]);
		});

		test("should work in combat", () => {
			const game = createTestGame();
			game.execute("n");
			game.execute("quit");
			game.execute("y");
			assert.strictEqual(game.mode, GAME_MODE.QUIT);
			assert.strictEqual(game.combatTarget, undefined);
		});
	});

	suite("terminal modes", () => {
		test("should end the game when the player dies", () => {
			const game = createTestGame();
			game.execute("w");
			game.execute("w");
			assert.strictEqual(game.combatTarget?.id, "ogre");

			const output = game.execute("attack");
			const last = output[output.length - 1];
			assert.strictEqual(last?.group, MESSAGE_GROUP.SYSTEM);
			assert.match(last.text, /YOU HAVE DIED/);
			assert.strictEqual(game.mode, GAME_MODE.GAME_OVER);
			assert.strictEqual(game.player.hp, 0);
			assert.deepStrictEqual(texts(game.execute("attack")), ["The game has ended."]);
		});

		test("should end the game when the amulet is picked up", () => {
			const game = createTestGame();
			game.currentRoom.addItem("warlord_amulet");
			const output = game.execute("take amulet");
			assert.strictEqual(output[0]?.text, "You picked up Warlord's Amulet.");
			assert.strictEqual(output[1]?.group, MESSAGE_GROUP.SYSTEM);
			assert.match(output[1].text, /VICTORY/);
			assert.strictEqual(game.mode, GAME_MODE.WON);
		});

		test("should start over with newGame()", () => {
			const game = createTestGame();
			game.execute("take all");
			game.execute("q");
			game.execute("y");
			game.newGame("Bryn");
			assert.strictEqual(game.mode, GAME_MODE.EXPLORING);
			assert.strictEqual(game.player.name, "Bryn");
			assert.deepStrictEqual(game.player.inventory, []);
			assert.deepStrictEqual(game.currentRoom.items, ["torch", "health_potion"]);
			assert.strictEqual(texts(game.takeOutput())[0], "Welcome, Bryn! Your adventure begins...");
		});
	});

	suite("saving and loading", () => {
		let directory: string;

		before(async () => {
			directory = await mkdtemp(join(tmpdir(), "dungeon-crawl-game-"));
		});

		after(async () => {
			await rm(directory, { recursive: true, force: true });
		});

		test("should queue the save until tasks run", async () => {
			const path = join(directory, "queued.yaml");
			const game = createTestGame({ savePath: path });
			assert.deepStrictEqual(game.execute("save"), []);
			assert.strictEqual(game.hasPendingTasks(), true);
			assert.deepStrictEqual(texts(await game.runPendingTasks()), [
				`Game saved successfully to ${path}.`,
			]);
			assert.strictEqual(game.hasPendingTasks(), false);
		});

		test("should restore the saved state", async () => {
			const path = join(directory, "round-trip.yaml");
			const game = createTestGame({ savePath: path });
			game.execute("take torch");
			game.execute("d");
			game.execute("drink");
			game.player.gold = 42;
			game.execute("save");
			await game.runPendingTasks();

			game.execute("drop torch");
			game.execute("u");
			game.player.gold = 0;
			game.execute("load");
			const output = await game.runPendingTasks();
			assert.deepStrictEqual(output[0], {
				group: MESSAGE_GROUP.SYSTEM,
				text: "Game loaded successfully!",
			});
			assert.strictEqual(game.currentRoomId, "spring");
			assert.strictEqual(game.player.gold, 42);
			assert.deepStrictEqual(game.player.inventory, ["torch"]);
			assert.deepStrictEqual(game.dungeon.getRoom("spring")?.items, []);
			assert.deepStrictEqual(texts(game.execute("drink")), [
				"The fountain's magic has been depleted. The water is now ordinary.",
			]);
		});

		test("should load back into exploring after fleeing", async () => {
			const path = join(directory, "fled.yaml");
			const game = createTestGame({ savePath: path, rng: sequenceRng([0]) });
			game.execute("north");
			assert.strictEqual(game.mode, GAME_MODE.IN_COMBAT);
			game.execute("flee");
			assert.strictEqual(game.mode, GAME_MODE.EXPLORING);
			game.execute("save");
			await game.runPendingTasks();

			game.execute("load");
			await game.runPendingTasks();
			assert.strictEqual(game.currentRoomId, "den");
			assert.strictEqual(game.mode, GAME_MODE.EXPLORING);
			assert.strictEqual(game.combatTarget, undefined);
		});

		test("should show the victory screen when loading a won game", async () => {
			const path = join(directory, "won.yaml");
			const winner = createTestGame({ savePath: path });
			winner.currentRoom.addItem("warlord_amulet");
			winner.execute("take amulet");
			await winner.saveGame();

			const game = createTestGame({ savePath: path });
			await game.loadGame();
			const output = game.takeOutput();
			const last = output[output.length - 1];
			assert.strictEqual(last?.group, MESSAGE_GROUP.SYSTEM);
			assert.match(last.text, /VICTORY/);
			assert.strictEqual(game.mode, GAME_MODE.WON);
		});

		test("should report a missing save file", async () => {
			const path = join(directory, "missing.yaml");
			const game = createTestGame({ savePath: path });
			game.execute("load");
			assert.deepStrictEqual(await game.runPendingTasks(), [
				{ group: MESSAGE_GROUP.ERROR, text: `Save file not found: ${path}` },
			]);
		});

		test("should leave the game untouched when the save is invalid", async () => {
			const path = join(directory, "invalid.yaml");
			await writeFile(path, "version: '1.0'\nplayer: nobody\n", "utf-8");
			const game = createTestGame({ savePath: path });
			game.execute("take torch");
			game.execute("load");
			const output = await game.runPendingTasks();
			assert.strictEqual(output.length, 1);
			assert.strictEqual(output[0]?.group, MESSAGE_GROUP.ERROR);
			assert.match(output[0].text, /^Invalid save file/);
			assert.strictEqual(game.currentRoomId, "hall");
			assert.deepStrictEqual(game.player.inventory, ["torch"]);
		});
	});
});
