import { suite, test, before, after } from "node:test";
import assert from "node:assert";
import { mkdtemp, readFile, rm, writeFile } from "fs/promises";
import { existsSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import YAML from "js-yaml";
import { loadConfig, mergeConfig } from "./config.js";
import { CONFIG, CONFIG_DEFAULT, defaultConfig, setConfig } from "../registry/config.js";

suite("package/config.ts", () => {
	let directory: string;

	before(async () => {
		directory = await mkdtemp(join(tmpdir(), "dungeon-config-"));
	});

	after(async () => {
		await rm(directory, { recursive: true, force: true });
		setConfig(defaultConfig());
	});

	test("should make default config file if none present", async () => {
		const configPath = join(directory, "nested", "config.yaml");
		await loadConfig(configPath);

		assert.ok(existsSync(configPath), "Config file should be created");
		const parsed = YAML.load(await readFile(configPath, "utf-8"));
		assert.deepStrictEqual(parsed, CONFIG_DEFAULT);
		assert.ok(!existsSync(`${configPath}.tmp`));
	});

	test("should successfully read config file", async () => {
		const configPath = join(directory, "custom.yaml");
		await writeFile(
			configPath,
			YAML.dump({
				game: { name: "Test Crawl" },
				combat: { flee_chance: 0.25 },
				player: { max_inventory: 4 },
			}),
			"utf-8"
		);

		await loadConfig(configPath);

		assert.strictEqual(CONFIG.game.name, "Test Crawl");
		assert.strictEqual(CONFIG.combat.flee_chance, 0.25);
		assert.strictEqual(CONFIG.player.max_inventory, 4);
		assert.strictEqual(CONFIG.combat.crit_chance, CONFIG_DEFAULT.combat.crit_chance);
	});

	suite("mergeConfig()", () => {
		test("should ignore unknown sections and keys", () => {
			const merged = mergeConfig({
				game: { name: "X", creator: "nobody" },
				server: { port: 23 },
			});
			assert.deepStrictEqual(merged.game, { name: "X" });
			assert.strictEqual("server" in merged, false);
		});

		test("should ignore values of the wrong type", () => {
			const merged = mergeConfig({
				player: { attack: "lots", defense: 5 },
			});
			assert.strictEqual(merged.player.attack, CONFIG_DEFAULT.player.attack);
			assert.strictEqual(merged.player.defense, 5);
		});

		test("should fall back to defaults for a non-object document", () => {
			assert.deepStrictEqual(mergeConfig("just a string"), defaultConfig());
		});
	});
});
