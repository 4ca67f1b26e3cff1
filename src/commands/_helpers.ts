/**
 * Helpers shared by command modules.
 *
 * @module commands/_helpers
 */

import type { CommandArgs, CommandContext } from "../core/command.js";
import { applyReaction, canReact } from "../core/reactions.js";
import { mismatch, type Reply } from "../core/result.js";
import { heldObjects, reachableObjects } from "../core/scope.js";
import type { GameState } from "../core/state.js";
import { verbLabel } from "../core/vocabulary.js";
import { CAPABILITY, hasCapability } from "../core/world.js";

/**
 * Wraps a handler whose object role is required, so the handler receives
 * the resolved id directly.
 */
export function withObject(
	run: (context: CommandContext, id: string, args: CommandArgs) => Reply
): (context: CommandContext, args: CommandArgs) => Reply {
	return (context, args) => {
		if (!args.object) {
			return mismatch(`What do you want to ${verbLabel(context.command.verb)}?`);
		}
		return run(context, args.object, args);
	};
}

/**
 * Applies the object's reaction to `key` (the verb by default) when it has
 * one that can fire. Returns its message, or undefined.
 */
export function react(
	context: CommandContext,
	id: string,
	key: string = context.command.verb
): string | undefined {
	const reaction = context.world.object(id).reactions[key];
	if (!reaction || !canReact(context, reaction, id, key)) return undefined;
	return applyReaction(context, reaction, id, key);
}

export function can(
	context: CommandContext,
	id: string,
	capability: CAPABILITY
): boolean {
	return hasCapability(context.world.object(id), capability);
}

/**
 * First carried object with the capability, in inventory order.
 */
export function findHeld(
	state: GameState,
	capability: CAPABILITY,
	except?: string
): string | undefined {
	return heldObjects(state).find(
		(id) => id !== except && hasCapability(state.world.object(id), capability)
	);
}

/**
 * A lit fire source the player can reach, other than `except`.
 */
export function findFlame(state: GameState, except?: string): string | undefined {
	return reachableObjects(state).find(
		(id) =>
			id !== except &&
			hasCapability(state.world.object(id), CAPABILITY.FIRE_SOURCE) &&
			state.objectState(id).lit
	);
}

/**
 * True when `id` sits somewhere inside `container`, however deep.
 */
export function isWithin(state: GameState, id: string, container: string): boolean {
	let location = state.locationOf(id);
	const seen = new Set<string>();
	while (location.kind === "inside" && !seen.has(location.id)) {
		if (location.id === container) return true;
		seen.add(location.id);
		location = state.locationOf(location.id);
	}
	return false;
}
