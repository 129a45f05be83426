#!/usr/bin/env node
import { loadAllPackages } from "./package.js";
import { getContent } from "./src/registry/content.js";
import { runRepl } from "./src/repl.js";
import logger from "./src/utils/logger.js";

let loaded = false;
try {
	logger.info("Loading packages...");
	await loadAllPackages();
	loaded = true;
} catch (error) {
	// bad config or content: nothing to play
	logger.error(`Cannot start: ${error instanceof Error ? error.message : String(error)}`);
	process.exitCode = 1;
}

if (loaded) {
	await runRepl({ content: getContent(), input: process.stdin, output: process.stdout });
	logger.info("Session ended");
}
