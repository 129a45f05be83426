/**
 * Save file I/O.
 *
 * Snapshots are written as YAML to the configured save path. Writes go to a
 * temporary file that is renamed over the real one, so a failed save never
 * leaves a half-written file behind. Reading only parses the YAML; checking
 * the contents is {@link restoreSnapshot}'s job.
 *
 * @example
 * import { readSave, writeSave } from './package/save.js';
 * await writeSave(path, createSnapshot(game));
 * const state = restoreSnapshot(content, await readSave(path));
 *
 * @module package/save
 */
import { dirname, relative } from "path";
import { access, mkdir, readFile, rename, unlink, writeFile } from "fs/promises";
import { constants as FS_CONSTANTS } from "fs";
import YAML from "js-yaml";
import logger from "../utils/logger.js";
import { getSafeRootDirectory } from "../utils/path.js";
import { SaveError } from "../core/errors.js";
import type { Snapshot } from "../core/snapshot.js";

const ROOT_DIRECTORY = getSafeRootDirectory();

function describeError(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

function isMissingFile(error: unknown): boolean {
	return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * @throws SaveError if the file cannot be written
 */
export async function writeSave(path: string, snapshot: Snapshot): Promise<void> {
	const tempPath = `${path}.tmp`;
	const yaml = YAML.dump(snapshot, {
		noRefs: true,
		lineWidth: 120,
	});

	try {
		await mkdir(dirname(path), { recursive: true });
		await writeFile(tempPath, yaml, "utf-8");
		await rename(tempPath, path);
		logger.debug(`Wrote save file: ${relative(ROOT_DIRECTORY, path)}`);
	} catch (error) {
		await unlink(tempPath).catch((cleanupError: unknown) => {
			if (!isMissingFile(cleanupError)) {
				logger.warn(`Could not remove ${tempPath}: ${describeError(cleanupError)}`);
			}
		});
		throw new SaveError(`Failed to save game: ${describeError(error)}`, { cause: error });
	}
}

/**
 * Reads and parses a save file without checking its contents.
 * @throws SaveError if the file is missing or is not valid YAML
 */
export async function readSave(path: string): Promise<unknown> {
	let content: string;
	try {
		content = await readFile(path, "utf-8");
	} catch (error) {
		if (isMissingFile(error)) throw new SaveError(`Save file not found: ${path}`, { cause: error });
		throw new SaveError(`Failed to load game: ${describeError(error)}`, { cause: error });
	}

	try {
		return YAML.load(content);
	} catch (error) {
		throw new SaveError(`Invalid save file format: ${describeError(error)}`, { cause: error });
	}
}

export async function saveExists(path: string): Promise<boolean> {
	try {
		await access(path, FS_CONSTANTS.F_OK);
		return true;
	} catch {
		return false;
	}
}
