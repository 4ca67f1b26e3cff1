/**
 * Package: config - YAML configuration loader
 *
 * Loads `data/config.yaml` (creating it with the defaults if missing) and
 * merges it into the in-memory `CONFIG` object from the config registry.
 *
 * Behavior
 * - Merges only known keys whose value has the default's type; anything
 *   else is logged and ignored
 * - `game.theme` must be `haunted` or `classic`
 * - If the file is absent, writes `CONFIG_DEFAULT` to disk atomically
 * - Logs details at `info`/`debug` levels, including default vs overridden
 *
 * @example
 * import configPkg from './package/config.js';
 * import { CONFIG } from '../registry/config.js';
 * await configPkg.loader();
 * console.log(CONFIG.game.theme);
 *
 * @module package/config
 */
import { dirname, join, relative } from "path";
import { mkdir, readFile, rename, unlink, writeFile } from "fs/promises";
import YAML from "js-yaml";
import logger from "../utils/logger.js";
import { getDataDirectory, getSafeRootDirectory } from "../utils/path.js";
import type { Package } from "../utils/package.js";
import { isRecord, isSameType } from "../utils/types.js";
import {
	CONFIG_DEFAULT,
	setConfig,
	type Config,
	type GameConfig,
	type PlayerConfig,
	type SavesConfig,
} from "../registry/config.js";

export const CONFIG_PATH = join(getDataDirectory(), "config.yaml");

const THEMES = new Set(["haunted", "classic"]);

/**
 * Copies the keys of `source` that exist in `defaults` with the same type.
 */
function mergeSection<T extends Record<string, string | number>>(
	section: string,
	defaults: T,
	source: unknown
): T {
	const merged: T = { ...defaults };
	if (source === undefined || source === null) return merged;
	if (!isRecord(source)) {
		logger.warn(`Ignoring config section ${section}: expected a mapping`);
		return merged;
	}
	for (const key of Object.keys(defaults)) {
		if (!(key in source)) continue;
		const value = source[key];
		const fallback = defaults[key];
		if (!isSameType(fallback, value)) {
			logger.warn(`Ignoring ${section}.${key}: expected a ${typeof fallback}`);
			continue;
		}
		if (value === fallback) {
			logger.debug(`DEFAULT ${section}.${key} = ${value}`);
			continue;
		}
		Object.assign(merged, { [key]: value });
		logger.debug(`Set ${section}.${key} = ${value}`);
	}
	return merged;
}

/**
 * Builds a complete config from parsed YAML, falling back to the defaults
 * for anything missing or malformed.
 */
export function mergeConfig(parsed: unknown): Config {
	const root = isRecord(parsed) ? parsed : {};
	const game: GameConfig = mergeSection("game", CONFIG_DEFAULT.game, root.game);
	if (!THEMES.has(game.theme)) {
		logger.warn(`Unknown theme "${game.theme}"; using ${CONFIG_DEFAULT.game.theme}`);
		game.theme = CONFIG_DEFAULT.game.theme;
	}
	const player: PlayerConfig = mergeSection(
		"player",
		CONFIG_DEFAULT.player,
		root.player
	);
	const saves: SavesConfig = mergeSection("saves", CONFIG_DEFAULT.saves, root.saves);
	return { game, player, saves };
}

async function writeDefaultConfig(path: string): Promise<void> {
	const defaultContent = YAML.dump(CONFIG_DEFAULT, {
		noRefs: true,
		lineWidth: 120,
	});
	const tempPath = `${path}.tmp`;
	await mkdir(dirname(path), { recursive: true });
	try {
		// Write to temporary file first
		await writeFile(tempPath, defaultContent, "utf-8");
		// Atomically rename temp file to final location
		await rename(tempPath, path);
		logger.debug("Default config file created");
	} catch (writeError) {
		await unlink(tempPath).catch((cleanupError: unknown) => {
			logger.debug(`Could not remove ${tempPath}: ${cleanupError}`);
		});
		throw writeError;
	}
}

export async function loadConfig(path: string = CONFIG_PATH): Promise<Config> {
	logger.debug(`Loading config from ${relative(getSafeRootDirectory(), path)}`);
	let content: string;
	try {
		content = await readFile(path, "utf-8");
	} catch (error) {
		// if the file doesn't exist, save the default config
		logger.debug(`Config file not found (${error}), creating default at ${path}`);
		await writeDefaultConfig(path);
		const defaults = mergeConfig(undefined);
		setConfig(defaults);
		return defaults;
	}
	const config = mergeConfig(YAML.load(content));
	setConfig(config);
	logger.info("Config loaded successfully");
	return config;
}

export default {
	name: "config",
	loader: async () => {
		await loadConfig();
	},
} satisfies Package;
