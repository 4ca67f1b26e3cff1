/**
 * Direction utilities for movement and exits.
 *
 * This module provides:
 * - Direction enum and constants
 * - Direction-to-text and text-to-direction conversion utilities
 * - Direction helper functions (reverse)
 *
 * Direction values are their own lowercase names so they can be written to
 * YAML world data and save files as-is.
 *
 * @module direction
 */

/**
 * Enum for directional movement between rooms.
 *
 * @example
 * ```typescript
 * import { DIRECTION } from "./direction.js";
 *
 * const exit = room.exits.get(DIRECTION.NORTH);
 * ```
 */
export enum DIRECTION {
	NORTH = "north",
	SOUTH = "south",
	EAST = "east",
	WEST = "west",
	NORTHEAST = "northeast",
	NORTHWEST = "northwest",
	SOUTHEAST = "southeast",
	SOUTHWEST = "southwest",
	UP = "up",
	DOWN = "down",
	IN = "in",
	OUT = "out",
}

/**
 * Array containing all possible direction values.
 * Order is: cardinal (N/S/E/W), diagonal (NE/NW/SE/SW), vertical (U/D), in/out.
 */
export const DIRECTIONS: ReadonlyArray<DIRECTION> = [
	DIRECTION.NORTH,
	DIRECTION.SOUTH,
	DIRECTION.EAST,
	DIRECTION.WEST,
	DIRECTION.NORTHEAST,
	DIRECTION.NORTHWEST,
	DIRECTION.SOUTHEAST,
	DIRECTION.SOUTHWEST,
	DIRECTION.UP,
	DIRECTION.DOWN,
	DIRECTION.IN,
	DIRECTION.OUT,
];

const DIR2REVERSE: ReadonlyMap<DIRECTION, DIRECTION> = new Map<
	DIRECTION,
	DIRECTION
>([
	[DIRECTION.NORTH, DIRECTION.SOUTH],
	[DIRECTION.SOUTH, DIRECTION.NORTH],
	[DIRECTION.EAST, DIRECTION.WEST],
	[DIRECTION.WEST, DIRECTION.EAST],
	[DIRECTION.UP, DIRECTION.DOWN],
	[DIRECTION.DOWN, DIRECTION.UP],
	[DIRECTION.NORTHEAST, DIRECTION.SOUTHWEST],
	[DIRECTION.NORTHWEST, DIRECTION.SOUTHEAST],
	[DIRECTION.SOUTHEAST, DIRECTION.NORTHWEST],
	[DIRECTION.SOUTHWEST, DIRECTION.NORTHEAST],
	[DIRECTION.IN, DIRECTION.OUT],
	[DIRECTION.OUT, DIRECTION.IN],
]);

/**
 * Gets the opposite direction for a given direction.
 *
 * @example
 * ```typescript
 * dir2reverse(DIRECTION.NORTH); // DIRECTION.SOUTH
 * dir2reverse(DIRECTION.IN); // DIRECTION.OUT
 * ```
 */
export function dir2reverse(dir: DIRECTION): DIRECTION {
	return DIR2REVERSE.get(dir) ?? dir;
}

/**
 * Maps directions to their abbreviated text representations.
 * `in` and `out` have no abbreviation.
 */
export const DIR2TEXT_SHORT: ReadonlyMap<DIRECTION, string> = new Map<
	DIRECTION,
	string
>([
	[DIRECTION.NORTH, "n"],
	[DIRECTION.SOUTH, "s"],
	[DIRECTION.EAST, "e"],
	[DIRECTION.WEST, "w"],
	[DIRECTION.NORTHEAST, "ne"],
	[DIRECTION.NORTHWEST, "nw"],
	[DIRECTION.SOUTHEAST, "se"],
	[DIRECTION.SOUTHWEST, "sw"],
	[DIRECTION.UP, "u"],
	[DIRECTION.DOWN, "d"],
]);

const TEXT2DIR: ReadonlyMap<string, DIRECTION> = new Map<string, DIRECTION>([
	...DIRECTIONS.map((dir): [string, DIRECTION] => [dir, dir]),
	...Array.from(DIR2TEXT_SHORT.entries()).map(
		([dir, text]): [string, DIRECTION] => [text, dir]
	),
]);

/**
 * Converts a direction to text.
 *
 * @example
 * ```typescript
 * dir2text(DIRECTION.NORTHEAST); // "northeast"
 * dir2text(DIRECTION.NORTHEAST, true); // "ne"
 * ```
 */
export function dir2text(dir: DIRECTION, short = false): string {
	if (short) return DIR2TEXT_SHORT.get(dir) ?? dir;
	return dir;
}

/**
 * Parses full or abbreviated direction text, case-insensitively.
 *
 * @example
 * ```typescript
 * text2dir("North"); // DIRECTION.NORTH
 * text2dir("sw"); // DIRECTION.SOUTHWEST
 * text2dir("sideways"); // undefined
 * ```
 */
export function text2dir(text: string): DIRECTION | undefined {
	return TEXT2DIR.get(text.toLowerCase());
}
