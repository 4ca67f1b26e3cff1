/**
 * Registry: config - centralized configuration access
 *
 * Provides a centralized location for accessing the game configuration.
 * The CONFIG object is loaded and updated by the config package.
 *
 * @module registry/config
 */

import type { Theme } from "../core/command.js";
import type { DeepReadonly } from "../utils/types.js";

export { READONLY_CONFIG as CONFIG };

export type GameConfig = {
	name: string;
	theme: Theme;
};

export type PlayerConfig = {
	/** Sanity a new game starts with. */
	sanity: number;
};

export type SavesConfig = {
	/** Where save slots are written, relative to the root directory. */
	directory: string;
};

export type Config = {
	game: GameConfig;
	player: PlayerConfig;
	saves: SavesConfig;
};

export const CONFIG_DEFAULT: DeepReadonly<Config> = {
	game: {
		name: "Hollow Manor",
		theme: "haunted",
	},
	player: {
		sanity: 100,
	},
	saves: {
		directory: "data/saves",
	},
} as const;

// make a copy of the default, don't reference it directly plz
const CONFIG: Config = {
	game: { ...CONFIG_DEFAULT.game },
	player: { ...CONFIG_DEFAULT.player },
	saves: { ...CONFIG_DEFAULT.saves },
};

// export a readonly version of the config
const READONLY_CONFIG: DeepReadonly<Config> = CONFIG;

/**
 * Set the config object.
 * @param config - The config object to set.
 */
export function setConfig(config: Config) {
	CONFIG.game = config.game;
	CONFIG.player = config.player;
	CONFIG.saves = config.saves;
}

/**
 * Put every section back to its defaults.
 */
export function resetConfig() {
	setConfig({
		game: { ...CONFIG_DEFAULT.game },
		player: { ...CONFIG_DEFAULT.player },
		saves: { ...CONFIG_DEFAULT.saves },
	});
}
