/**
 * Package: help - helpfile loader
 *
 * Loads helpfiles from the `data/help` directory at startup.
 * Each helpfile is a YAML file with:
 * - `keyword: string` - primary keyword for the helpfile
 * - `aliases?: string[]` - optional alternative keywords
 * - `related?: string[]` - optional related topic keywords
 * - `content: string` - the help text (supports multiline with |)
 *
 * Files beginning with `_` are ignored. Only `.yaml` files are loaded.
 * Related references are checked once every file is loaded.
 *
 * @example
 * // data/help/movement.yaml
 * keyword: movement
 * aliases: [go, directions]
 * related: [vehicles]
 * content: |
 *   Type a direction to walk that way...
 *
 * @module package/help
 */

import { readdir, readFile } from "fs/promises";
import YAML from "js-yaml";
import { extname, join, relative } from "path";
import logger from "../utils/logger.js";
import { getDataDirectory, getSafeRootDirectory } from "../utils/path.js";
import type { Package } from "../utils/package.js";
import { readRecord, readRequiredString, readStringList, type Problems } from "../utils/data.js";
import type { Helpfile } from "../core/help.js";
import { getHelpfileRegistry, getHelpfiles, registerHelpfile } from "../registry/help.js";

export const HELP_DIRECTORY = join(getDataDirectory(), "help");

/**
 * Validates and normalizes a helpfile parsed from YAML.
 */
export function parseHelpfile(data: unknown, where: string): Helpfile {
	const problems: Problems = [];
	const raw = readRecord(data, where, problems);
	const keyword = readRequiredString(raw.keyword, `${where}.keyword`, problems);
	const content = readRequiredString(raw.content, `${where}.content`, problems);
	const aliases = readStringList(raw.aliases, `${where}.aliases`, problems);
	const related = readStringList(raw.related, `${where}.related`, problems);
	if (problems.length) throw new Error(problems.join("; "));
	return {
		keyword: keyword.toLowerCase(),
		aliases: aliases.map((alias) => alias.toLowerCase()),
		related: related.map((topic) => topic.toLowerCase()),
		// YAML's | syntax leaves a trailing newline
		content: content.trim(),
	};
}

function validateRelatedReferences(): void {
	const registry = getHelpfileRegistry();
	for (const helpfile of getHelpfiles()) {
		for (const relatedKeyword of helpfile.related) {
			if (!registry.has(relatedKeyword)) {
				logger.warn(
					`Helpfile "${helpfile.keyword}" references missing related topic: "${relatedKeyword}"`
				);
			}
		}
	}
}

/**
 * Loads every helpfile in `directory` into the help registry.
 */
export async function loadHelpfiles(directory: string = HELP_DIRECTORY): Promise<number> {
	const root = getSafeRootDirectory();
	logger.debug(`Loading helpfiles from ${relative(root, directory)}`);
	let loaded = 0;
	let errors = 0;
	const files = await readdir(directory);
	for (const file of files.sort()) {
		if (file.startsWith("_") || extname(file).toLowerCase() !== ".yaml") continue;
		const filePath = join(directory, file);
		try {
			const content = await readFile(filePath, "utf-8");
			registerHelpfile(parseHelpfile(YAML.load(content), file));
			loaded++;
		} catch (error) {
			logger.error(
				`Failed to load helpfile ${relative(root, filePath)}: ${
					error instanceof Error ? error.message : String(error)
				}`
			);
			errors++;
		}
	}
	validateRelatedReferences();
	logger.info(`Loaded ${loaded} helpfile(s)${errors > 0 ? ` (${errors} error(s))` : ""}`);
	return loaded;
}

export default {
	name: "help",
	loader: async () => {
		await loadHelpfiles();
	},
} satisfies Package;
