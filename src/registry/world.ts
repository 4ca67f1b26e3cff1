/**
 * Registry: world - the shared world loaded at start-up
 *
 * Set by the world package. Sessions read templates from it and keep their
 * own changes in their game state.
 *
 * @module registry/world
 */

import type { World } from "../core/world.js";

let WORLD: World | undefined;

export function setWorld(world: World): void {
	WORLD = world;
}

/**
 * The loaded world. Throws when the world package has not run.
 */
export function getWorld(): World {
	if (!WORLD) throw new Error("World has not been loaded");
	return WORLD;
}
