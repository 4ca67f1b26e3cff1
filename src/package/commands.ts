/**
 * Package: commands - dynamic command loader
 *
 * Loads every command module in `src/commands` (`dist/src/commands` once
 * built) into the command registry at startup.
 *
 * Each command file default-exports a {@link CommandObject}:
 * - `verb: string` - the canonical verb
 * - `aliases?: string[]` - further canonical verbs
 * - `execute(context, args)` - handler function
 *
 * A named `command` export is accepted as well. Files beginning with `_`
 * are helpers and are ignored, as are spec files and declaration files.
 * Modules that fail to import or export no command are logged and skipped.
 *
 * @example
 * // src/commands/xyzzy.ts
 * export default {
 *   verb: "XYZZY",
 *   execute: () => ok('A hollow voice says "Fool."'),
 * } satisfies CommandObject;
 *
 * @module package/commands
 */
import { readdir } from "fs/promises";
import { relative } from "path";
import { fileURLToPath, pathToFileURL } from "url";
import logger from "../utils/logger.js";
import { getSafeRootDirectory } from "../utils/path.js";
import type { Package } from "../utils/package.js";
import { isRecord } from "../utils/types.js";
import { isCommandObject, type CommandObject } from "../core/command.js";
import { getCommandRegistry, type CommandRegistry } from "../registry/command.js";

export const COMMAND_DIRECTORY = fileURLToPath(new URL("../commands/", import.meta.url));

/**
 * True for files that hold a command module.
 */
export function isCommandFile(file: string): boolean {
	if (file.startsWith("_")) return false;
	if (file.endsWith(".d.ts") || file.includes(".spec.")) return false;
	return file.endsWith(".ts") || file.endsWith(".js");
}

/**
 * The command object a module exports, if any.
 */
export function commandFromModule(module: unknown): CommandObject | undefined {
	if (!isRecord(module)) return undefined;
	const exported = module.default ?? module.command;
	return isCommandObject(exported) ? exported : undefined;
}

/**
 * Imports every command module in `directory` into `registry`.
 * Returns the number of modules registered.
 */
export async function loadCommands(
	registry: CommandRegistry = getCommandRegistry(),
	directory: string = COMMAND_DIRECTORY
): Promise<number> {
	const root = getSafeRootDirectory();
	logger.info(`Loading commands from ${relative(root, directory)}`);
	const files = (await readdir(directory)).filter(isCommandFile).sort();
	logger.debug(`Found ${files.length} command files`);
	let loaded = 0;
	for (const file of files) {
		const url = pathToFileURL(`${directory.replace(/[\\/]$/, "")}/${file}`).href;
		try {
			const command = commandFromModule(await import(url));
			if (!command) {
				logger.warn(`Command file ${file} must default-export a command object`);
				continue;
			}
			registry.register(command);
			loaded++;
			logger.debug(`Loaded command ${command.verb} from ${file}`);
			if (command.aliases?.length) {
				logger.debug(`  Aliases: ${command.aliases.join(", ")}`);
			}
		} catch (error) {
			logger.error(`Failed to load command from ${file}: ${error}`);
		}
	}
	logger.info(`Loaded ${loaded} command(s)`);
	return loaded;
}

export default {
	name: "commands",
	loader: async () => {
		await loadCommands();
	},
} satisfies Package;
