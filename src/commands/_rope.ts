/**
 * Tying and untying. A rope and its anchor point at each other: the rope's
 * `tiedTo` names the anchor and the anchor's `tiedObjects` lists the rope.
 *
 * @module commands/_rope
 */

import type { CommandContext } from "../core/command.js";

export function fasten(context: CommandContext, rope: string, anchor: string): void {
	const state = context.state;
	state.updateObject(rope, { tiedTo: anchor });
	state.updateObject(anchor, {
		tiedObjects: [...state.objectState(anchor).tiedObjects, rope],
	});
	const flag = context.world.object(rope).tie?.flags[anchor];
	if (flag) state.setFlag(flag);
	context.affected.add(anchor);
}

/**
 * Unties a rope from whatever holds it. Returns the former anchor.
 */
export function unfasten(context: CommandContext, rope: string): string | undefined {
	const state = context.state;
	const anchor = state.objectState(rope).tiedTo;
	if (!anchor) return undefined;
	state.updateObject(rope, { tiedTo: undefined });
	state.updateObject(anchor, {
		tiedObjects: state.objectState(anchor).tiedObjects.filter((id) => id !== rope),
	});
	const flag = context.world.object(rope).tie?.flags[anchor];
	if (flag) state.clearFlag(flag);
	context.affected.add(anchor);
	return anchor;
}
