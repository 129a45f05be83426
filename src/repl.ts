/**
 * Terminal front end: title menu and the read-eval-print loop.
 *
 * The loop owns all console I/O. It reads a line, hands it to
 * {@link Game.execute}, runs any queued save/load work and prints what came
 * back. INFO and SYSTEM messages are screens rendered with color markup;
 * everything else is plain text and gets a group color and a `>>` marker.
 * Setting `NO_COLOR` strips the markup instead of rendering it.
 *
 * The program ends when the game does (death, victory or a confirmed quit),
 * on Quit at the title, or when input closes (EOF). Loading from the title
 * with no save file, or a bad one, goes back to the menu.
 *
 * @module repl
 */
import { createInterface } from "readline";
import { DEFAULT_PLAYER_NAME, Game } from "./game.js";
import { COLOR, color, colorize, escapeColors, stripColors } from "./core/color.js";
import { SaveError } from "./core/errors.js";
import { saveExists } from "./package/save.js";
import { type GameMessage, MESSAGE_GROUP } from "./core/message.js";
import { CONFIG, type Config } from "./registry/config.js";
import type { ContentTables } from "./registry/content.js";
import { renderCombatStatus, renderTitle } from "./utils/display.js";
import type { Rng } from "./utils/random.js";
import type { DeepReadonly } from "./utils/types.js";
import logger from "./utils/logger.js";

export interface ReplOptions {
	content: ContentTables;
	config?: DeepReadonly<Config>;
	rng?: Rng;
	savePath?: string;
	/** Render color markup as ANSI. Defaults to on unless `NO_COLOR` is set. */
	color?: boolean;
	input: NodeJS.ReadableStream;
	output: NodeJS.WritableStream;
}

const GROUP_COLORS: Partial<Record<MESSAGE_GROUP, COLOR>> = {
	[MESSAGE_GROUP.COMBAT]: COLOR.CRIMSON,
	[MESSAGE_GROUP.ERROR]: COLOR.YELLOW,
	[MESSAGE_GROUP.WARNING]: COLOR.YELLOW,
	[MESSAGE_GROUP.PROMPT]: COLOR.CYAN,
};

const MENU_PROMPT = "Choose an option (1-3): ";
const NAME_PROMPT = "What is your name, adventurer? ";
const COMMAND_PROMPT = "\n> ";

/**
 * Turns a message into terminal text.
 */
export function formatMessage(message: GameMessage, useColor = true): string {
	const render = useColor ? colorize : stripColors;
	if (message.group === MESSAGE_GROUP.INFO || message.group === MESSAGE_GROUP.SYSTEM) {
		return render(message.text);
	}
	const text = `>> ${escapeColors(message.text)}`;
	const tint = GROUP_COLORS[message.group];
	return render(tint === undefined ? text : color(text, tint));
}

export async function runRepl(options: ReplOptions): Promise<void> {
	const config = options.config ?? CONFIG;
	const useColor = options.color ?? process.env.NO_COLOR === undefined;
	const render = useColor ? colorize : stripColors;
	const rl = createInterface({ input: options.input, output: options.output });
	const lines = rl[Symbol.asyncIterator]();

	const write = (text: string): void => {
		options.output.write(`${text}\n`);
	};
	const print = (messages: ReadonlyArray<GameMessage>): void => {
		for (const message of messages) write(formatMessage(message, useColor));
	};
	const ask = async (prompt: string): Promise<string | undefined> => {
		options.output.write(prompt);
		const next = await lines.next();
		return next.done ? undefined : next.value;
	};

	const createGame = (playerName: string): Game =>
		new Game({
			content: options.content,
			config,
			rng: options.rng,
			savePath: options.savePath,
			playerName,
		});

	/**
	 * Plays one game until it ends or input closes.
	 */
	const play = async (game: Game): Promise<void> => {
		while (!game.isFinished()) {
			if (game.combatTarget) write(render(renderCombatStatus(game, game.combatTarget)));
			const line = await ask(COMMAND_PROMPT);
			if (line === undefined) return;
			const messages = game.execute(line);
			messages.push(...(await game.runPendingTasks()));
			print(messages);
		}
	};

	try {
		for (;;) {
			write(render(renderTitle(config.game.name)));
			const choice = await ask(MENU_PROMPT);
			if (choice === undefined) return;

			switch (choice.trim()) {
				case "1": {
					const name = await ask(NAME_PROMPT);
					if (name === undefined) return;
					const game = createGame(name.trim() || DEFAULT_PLAYER_NAME);
					print(game.takeOutput());
					await play(game);
					return;
				}
				case "2": {
					const game = createGame(DEFAULT_PLAYER_NAME);
					game.takeOutput();
					if (!(await saveExists(game.savePath))) {
						print([{ group: MESSAGE_GROUP.ERROR, text: "No save file found." }]);
						break;
					}
					try {
						await game.loadGame();
					} catch (error) {
						if (!(error instanceof SaveError)) throw error;
						logger.warn(`Load from the title menu failed: ${error.message}`);
						print([{ group: MESSAGE_GROUP.ERROR, text: error.message }]);
						break;
					}
					print(game.takeOutput());
					await play(game);
					return;
				}
				case "3":
					write("Farewell, adventurer!");
					return;
				default:
					print([{ group: MESSAGE_GROUP.ERROR, text: "Please enter 1, 2, or 3." }]);
			}
		}
	} finally {
		rl.close();
	}
}
