/**
 * The game session: world, player and mode, plus the command loop entry point.
 *
 * A {@link Game} owns everything that changes during play: a fresh
 * {@link Dungeon} built from content, the {@link Player}, one enemy instance
 * per room, the combat target and the session flags. Input goes through
 * {@link Game.execute}, which resolves the line, checks the command against
 * the current {@link GAME_MODE}, runs it and returns the messages it produced.
 *
 * Messages in the INFO and SYSTEM groups are color markup (see core/color);
 * the rest are plain text.
 *
 * Everything in `execute` is synchronous. Saving and loading touch the disk,
 * so those commands queue a task instead; the caller runs the queue with
 * {@link Game.runPendingTasks} between commands.
 *
 * What you get
 * - `Game` class: session state, movement, combat bookkeeping, output buffer
 * - `GameOptions`: content, config, rng and command registry injection
 *
 * Typical usage
 * ```ts
 * import { Game } from "./game.js";
 * import { getContent } from "./registry/content.js";
 *
 * const game = new Game({ content: getContent(), playerName: "Ayla" });
 * game.takeOutput(); // welcome text and the first room
 * const messages = game.execute("go north");
 * messages.push(...(await game.runPendingTasks()));
 * ```
 *
 * @module game
 */

import { CONFIG, type Config } from "./registry/config.js";
import type { ContentTables } from "./registry/content.js";
import { type CommandObject, CommandRegistry, GAME_MODE, resolve } from "./core/command.js";
import { escapeColors } from "./core/color.js";
import { Dungeon } from "./core/dungeon.js";
import { type Enemy, createEnemy } from "./core/enemy.js";
import { SaveError } from "./core/errors.js";
import type { Item } from "./core/item.js";
import { type GameMessage, MESSAGE_GROUP, type SystemResult, fail, ok } from "./core/message.js";
import { Player } from "./core/player.js";
import type { Room } from "./core/room.js";
import { type GameState, type Snapshot, createSnapshot, restoreSnapshot } from "./core/snapshot.js";
import { readSave, writeSave } from "./package/save.js";
import { createCommandRegistry } from "./commands/index.js";
import type { DIRECTION } from "./utils/direction.js";
import { renderGameOver, renderRoom, renderVictory } from "./utils/display.js";
import { type Rng, defaultRng } from "./utils/random.js";
import { resolveFromRoot } from "./utils/path.js";
import { titleFromId } from "./utils/string.js";
import type { DeepReadonly } from "./utils/types.js";
import logger from "./utils/logger.js";

export const DEFAULT_PLAYER_NAME = "Adventurer";

export const COMBAT_HINT = "In combat! Use: attack, use <item>, flee, inventory, stats";
export const UNKNOWN_COMMAND =
	"I don't understand that command. Type 'help' for a list of commands.";

export interface GameOptions {
	content: ContentTables;
	config?: DeepReadonly<Config>;
	rng?: Rng;
	registry?: CommandRegistry;
	/** Defaults to `paths.save_file` from config, resolved from the root. */
	savePath?: string;
	playerName?: string;
}

export interface EnterRoomOptions {
	/** Start combat with a living enemy in the room. Default true. */
	encounter?: boolean;
	/** Send the room screen. Default true. */
	describe?: boolean;
}

type Task = () => Promise<void>;

export class Game implements GameState {
	readonly content: ContentTables;
	readonly config: DeepReadonly<Config>;
	readonly registry: CommandRegistry;
	rng: Rng;
	savePath: string;

	dungeon: Dungeon;
	player: Player;
	/** Enemy instance per room id. */
	enemies: Map<string, Enemy>;
	currentRoomId: string;
	combatTarget?: Enemy;
	/** Fountains already drunk from this session, by room id. */
	usedFountains: Set<string>;
	won = false;
	over = false;
	quit = false;
	/** The last command asked to quit; the next line answers it. */
	pendingQuit = false;

	private output: GameMessage[] = [];
	private tasks: Task[] = [];

	constructor(options: GameOptions) {
		this.content = options.content;
		this.config = options.config ?? CONFIG;
		this.rng = options.rng ?? defaultRng;
		this.registry = options.registry ?? createCommandRegistry();
		this.savePath = options.savePath ?? resolveFromRoot(this.config.paths.save_file);

		const name = options.playerName ?? DEFAULT_PLAYER_NAME;
		const state = this.createState(name);
		this.dungeon = state.dungeon;
		this.player = state.player;
		this.enemies = state.enemies;
		this.currentRoomId = state.currentRoomId;
		this.usedFountains = state.usedFountains;
		this.startSession();
	}

	get mode(): GAME_MODE {
		if (this.quit) return GAME_MODE.QUIT;
		if (this.over) return GAME_MODE.GAME_OVER;
		if (this.won) return GAME_MODE.WON;
		return this.combatTarget ? GAME_MODE.IN_COMBAT : GAME_MODE.EXPLORING;
	}

	/** Game over, won or quit: no further commands are accepted. */
	isFinished(): boolean {
		return this.quit || this.over || this.won;
	}

	get currentRoom(): Room {
		const room = this.dungeon.getRoom(this.currentRoomId);
		if (!room) throw new Error(`Current room '${this.currentRoomId}' does not exist`);
		return room;
	}

	getItem(itemId: string): Item | undefined {
		return this.content.items.get(itemId);
	}

	/** Display name of an item id, or the id itself if it is unknown. */
	itemName(itemId: string): string {
		return this.getItem(itemId)?.name ?? itemId;
	}

	getRoomEnemy(roomId: string = this.currentRoomId): Enemy | undefined {
		return this.enemies.get(roomId);
	}

	sendMessage(text: string, group: MESSAGE_GROUP = MESSAGE_GROUP.COMMAND_RESPONSE): void {
		this.output.push({ group, text });
	}

	/** Sends a system result as a response or an error. */
	report(result: SystemResult): void {
		this.sendMessage(
			result.message,
			result.success ? MESSAGE_GROUP.COMMAND_RESPONSE : MESSAGE_GROUP.ERROR
		);
	}

	/**
	 * Returns and clears everything sent since the last call.
	 */
	takeOutput(): GameMessage[] {
		const output = this.output;
		this.output = [];
		return output;
	}

	/**
	 * Throws the current session away and starts over with a new player.
	 */
	newGame(name: string = DEFAULT_PLAYER_NAME): void {
		this.applyState(this.createState(name));
		this.startSession();
	}

	private createState(name: string): GameState {
		const dungeon = Dungeon.fromDefinitions(this.content.rooms.values(), this.content.startingRoom);
		const enemies = new Map<string, Enemy>();
		for (const room of dungeon.getRooms()) {
			if (room.enemyId === undefined) continue;
			const template = this.content.enemies.get(room.enemyId);
			if (template) enemies.set(room.id, createEnemy(template));
		}
		const stats = this.config.player;
		const player = new Player({
			name,
			maxHp: stats.max_hp,
			attack: stats.attack,
			defense: stats.defense,
			xpToNext: stats.xp_to_next,
			gold: stats.gold,
			maxInventory: stats.max_inventory,
		});
		return {
			dungeon,
			player,
			enemies,
			currentRoomId: dungeon.startingRoomId,
			usedFountains: new Set(),
			won: false,
		};
	}

	/**
	 * Swaps a whole state in at once and clears the session flags.
	 */
	applyState(state: GameState): void {
		this.dungeon = state.dungeon;
		this.player = state.player;
		this.enemies = state.enemies;
		this.currentRoomId = state.currentRoomId;
		this.usedFountains = state.usedFountains;
		this.won = state.won;
		this.over = false;
		this.quit = false;
		this.pendingQuit = false;
		this.combatTarget = undefined;
	}

	private startSession(): void {
		logger.info(`New game started for ${this.player.name}`);
		this.sendMessage(
			`Welcome, ${escapeColors(this.player.name)}! Your adventure begins...`,
			MESSAGE_GROUP.SYSTEM
		);
		this.enterRoom(this.currentRoomId);
	}

	/**
	 * Puts the player in a room and marks it visited. The first visit shows
	 * the full description, later ones the short one.
	 */
	enterRoom(roomId: string, options: EnterRoomOptions = {}): Room {
		const room = this.dungeon.getRoom(roomId);
		if (!room) throw new Error(`Room '${roomId}' does not exist`);
		const firstVisit = !room.visited;
		this.currentRoomId = room.id;
		room.visited = true;
		logger.debug(`Entered room ${room.id}${firstVisit ? " (first visit)" : ""}`);

		if (options.describe ?? true) {
			this.sendMessage(renderRoom(this, room, { brief: !firstVisit }), MESSAGE_GROUP.INFO);
		}
		if (options.encounter ?? true) {
			const enemy = this.getRoomEnemy(room.id);
			if (enemy?.isAlive()) this.startCombat(enemy);
		}
		return room;
	}

	describeCurrentRoom(): void {
		this.sendMessage(renderRoom(this, this.currentRoom), MESSAGE_GROUP.INFO);
	}

	/**
	 * Moves through an exit, unlocking it for good if the player carries the
	 * key. Nothing changes on failure.
	 */
	move(direction: DIRECTION): SystemResult {
		const room = this.currentRoom;
		const target = this.dungeon.getExitTarget(room, direction);
		if (!target) return fail(`There is no exit to the ${direction}.`);

		let message = "";
		const key = this.dungeon.getRequiredKey(room, direction);
		if (key !== undefined) {
			if (!this.player.hasItem(key)) return fail(`The way ${direction} is locked. You need a key.`);
			this.dungeon.unlockExit(room, direction);
			message = `You use the ${this.itemName(key)} to unlock the door and proceed ${direction}.`;
			logger.debug(`Unlocked ${direction} exit of ${room.id} with ${key}`);
			this.sendMessage(message);
		}

		this.enterRoom(target.id);
		return ok(message);
	}

	startCombat(enemy: Enemy): void {
		this.combatTarget = enemy;
		logger.debug(`Combat started with ${enemy.id} in ${this.currentRoomId}`);
	}

	endCombat(): void {
		if (this.combatTarget) logger.debug(`Combat with ${this.combatTarget.id} ended`);
		this.combatTarget = undefined;
	}

	/**
	 * Sets the won flag once the player holds the win item.
	 */
	checkVictory(): boolean {
		if (!this.won && this.player.hasItem(this.config.victory.win_item)) {
			this.won = true;
			this.endCombat();
			logger.info(`${this.player.name} won the game`);
		}
		return this.won;
	}

	requestQuit(): void {
		this.pendingQuit = true;
		this.sendMessage("Are you sure you want to quit? (y/n)", MESSAGE_GROUP.PROMPT);
	}

	private answerQuit(raw: string): void {
		this.pendingQuit = false;
		const answer = raw.trim().toLowerCase();
		if (answer === "y" || answer === "yes") {
			this.quit = true;
			this.endCombat();
			logger.info(`${this.player.name} quit the game`);
			this.sendMessage("Farewell, adventurer!", MESSAGE_GROUP.SYSTEM);
			return;
		}
		this.sendMessage("Quit cancelled.", MESSAGE_GROUP.SYSTEM);
	}

	private rejection(command: CommandObject | undefined): string {
		if (this.mode === GAME_MODE.IN_COMBAT) return COMBAT_HINT;
		if (command) return "You're not in combat.";
		return UNKNOWN_COMMAND;
	}

	/**
	 * Runs one line of input and returns the messages it produced, along
	 * with anything still buffered from before.
	 */
	execute(raw: string): GameMessage[] {
		if (this.isFinished()) {
			this.sendMessage("The game has ended.", MESSAGE_GROUP.SYSTEM);
			return this.takeOutput();
		}
		if (this.pendingQuit) {
			this.answerQuit(raw);
			return this.takeOutput();
		}

		const { verb, args } = resolve(raw);
		if (verb === "") return this.takeOutput();

		const command = this.registry.get(verb);
		if (!command || !command.modes.includes(this.mode)) {
			this.sendMessage(this.rejection(command), MESSAGE_GROUP.ERROR);
			return this.takeOutput();
		}

		command.execute({ game: this }, args);
		this.afterCommand();
		return this.takeOutput();
	}

	private afterCommand(): void {
		if (this.over || !this.player.isAlive()) {
			this.over = true;
			this.endCombat();
			logger.info(`${this.player.name} died in ${this.currentRoomId}`);
			this.sendMessage(renderGameOver(this.player), MESSAGE_GROUP.SYSTEM);
			return;
		}
		if (this.checkVictory()) this.announceVictory();
	}

	private announceVictory(): void {
		const bossId = this.config.victory.boss_enemy;
		const bossName = this.content.enemies.get(bossId)?.name ?? titleFromId(bossId);
		this.sendMessage(renderVictory(this.player, bossName), MESSAGE_GROUP.SYSTEM);
	}

	queueTask(task: Task): void {
		this.tasks.push(task);
	}

	hasPendingTasks(): boolean {
		return this.tasks.length > 0;
	}

	/**
	 * Runs queued save/load work in order. A {@link SaveError} becomes an
	 * error message; anything else propagates.
	 */
	async runPendingTasks(): Promise<GameMessage[]> {
		const tasks = this.tasks;
		this.tasks = [];
		for (const task of tasks) {
			try {
				await task();
			} catch (error) {
				if (!(error instanceof SaveError)) throw error;
				logger.warn(`Save/load failed: ${error.message}`);
				this.sendMessage(error.message, MESSAGE_GROUP.ERROR);
			}
		}
		return this.takeOutput();
	}

	/**
	 * Takes a snapshot now and queues writing it.
	 */
	queueSave(path: string = this.savePath): void {
		const snapshot = createSnapshot(this);
		this.queueTask(() => this.writeSnapshot(snapshot, path));
	}

	queueLoad(path: string = this.savePath): void {
		this.queueTask(() => this.loadGame(path));
	}

	async saveGame(path: string = this.savePath): Promise<void> {
		await this.writeSnapshot(createSnapshot(this), path);
	}

	private async writeSnapshot(snapshot: Snapshot, path: string): Promise<void> {
		await writeSave(path, snapshot);
		logger.info(`Game saved to ${path}`);
		this.sendMessage(`Game saved successfully to ${path}.`);
	}

	/**
	 * Reads, checks and applies a save file. The live state is only replaced
	 * once the whole file has been validated.
	 * @throws SaveError when the file is missing, unreadable or invalid
	 */
	async loadGame(path: string = this.savePath): Promise<void> {
		const data = await readSave(path);
		const state = restoreSnapshot(this.content, data);
		this.applyState(state);
		logger.info(`Game loaded from ${path}`);
		this.sendMessage("Game loaded successfully!", MESSAGE_GROUP.SYSTEM);
		this.describeCurrentRoom();
		if (this.won) this.announceVictory();
	}
}
