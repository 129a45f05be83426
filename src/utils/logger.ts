/**
 * Logger module: structured application logging
 *
 * Provides a preconfigured Winston logger used across the project.
 * It writes logs to files and colorized human-readable logs to the console
 * (console output is disabled during tests).
 *
 * Transports
 * - File (errors): `logs/error-YYYY-MM-DD-HHMMSS[.test].log` at level `error`
 * - File (app):    `logs/app-YYYY-MM-DD-HHMMSS[.test].log` at level `debug`
 * - Console: colorized output at `LOG_LEVEL` (default `warn`, so the game
 *   prompt is not drowned out), disabled when `process.env.NODE_TEST_CONTEXT`
 *   is set
 *
 * Usage
 * ```ts
 * import logger from './logger.js';
 *
 * logger.info('Content loaded: %d rooms', 24);
 * logger.debug('Room entered', { roomId });
 * logger.error('Failure', { err });
 * ```
 *
 * @module utils/logger
 */
import winston from "winston";
import path from "path";
import { fileURLToPath } from "url";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

// node:test sets this for every test file it runs
const isTestMode = process.env.NODE_TEST_CONTEXT;

// Generate timestamp for log filenames (YYYY-MM-DD-HHMMSS)
const timestamp = new Date().toISOString().split("T");
const date = timestamp[0];
const HMS = timestamp[1].split(".")[0].split(":").join("");
const testSuffix = isTestMode ? ".test" : "";

// src/utils -> project root (dist/src/utils -> dist when built)
const SOURCE_ROOT = path.resolve(__dirname, "..", "..");
const LOG_DIRECTORY = path.join(
	path.basename(SOURCE_ROOT) === "dist" ? path.dirname(SOURCE_ROOT) : SOURCE_ROOT,
	"logs"
);

const fileFormat = winston.format.combine(
	winston.format.uncolorize(),
	winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
	winston.format.printf(
		({ timestamp, level, message, ...meta }) =>
			`[${timestamp}] ${level.toUpperCase()}: ${message}${
				Object.keys(meta).length ? " " + JSON.stringify(meta) : ""
			}`
	)
);

const logger = winston.createLogger({
	level: "debug",
	format: winston.format.combine(
		winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
		winston.format.errors({ stack: true }),
		winston.format.splat(),
		winston.format.json()
	),
	defaultMeta: { service: "dungeon-crawl" },
	transports: [
		new winston.transports.File({
			filename: path.join(LOG_DIRECTORY, `error-${date}-${HMS}${testSuffix}.log`),
			level: "error",
			format: fileFormat,
		}),
		new winston.transports.File({
			filename: path.join(LOG_DIRECTORY, `app-${date}-${HMS}${testSuffix}.log`),
			level: "debug",
			format: fileFormat,
		}),
		...(!isTestMode
			? [
					new winston.transports.Console({
						level: process.env.LOG_LEVEL || "warn",
						format: winston.format.combine(
							winston.format.colorize(),
							winston.format.timestamp({ format: "HH:mm:ss" }),
							winston.format.printf(
								({ timestamp, level, message, ...meta }) =>
									`[${timestamp}] ${level}: ${message}${
										Object.keys(meta).length && meta.service === undefined
											? " " + JSON.stringify(meta)
											: ""
									}`
							)
						),
					}),
			  ]
			: []),
	],
});

export default logger;
