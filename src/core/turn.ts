/**
 * End-of-turn bookkeeping: the move counter and draining light sources.
 *
 * Every lit source with a battery loses one turn of light per move, two
 * while the player is cursed. The player is warned when a source drops to
 * 20 and to 5 turns; at 0 it goes out.
 *
 * @module core/turn
 */

import { capitalizeFirst } from "../utils/string.js";
import type { CommandContext } from "./command.js";
import { DARKNESS, the } from "./describe.js";
import { isLit } from "./scope.js";

export const DIM_WARNING = 20;
export const FLICKER_WARNING = 5;

function crossed(before: number, after: number, mark: number): boolean {
	return before > mark && after <= mark;
}

export function drainLights(context: CommandContext): void {
	const state = context.state;
	const wasLit = isLit(state);
	const drain = state.cursed ? 2 : 1;
	for (const [id, remaining] of state.resources) {
		if (!state.objectState(id).lit || remaining <= 0) continue;
		const next = Math.max(0, remaining - drain);
		state.resources.set(id, next);
		const name = capitalizeFirst(the(context, id));
		if (next === 0) {
			state.updateObject(id, { lit: false });
			context.affected.add(id);
			context.notifications.push(`${name} flickers and goes out.`);
		} else if (crossed(remaining, next, FLICKER_WARNING)) {
			context.notifications.push(`${name} is flickering and about to go out.`);
		} else if (crossed(remaining, next, DIM_WARNING)) {
			context.notifications.push(`${name} is growing dim.`);
		}
	}
	if (wasLit && !isLit(state)) context.notifications.push(DARKNESS);
}

/**
 * Called once after every successful command that takes a turn.
 */
export function passTime(context: CommandContext): void {
	context.state.moves += 1;
	drainLights(context);
}
