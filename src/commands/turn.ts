/**
 * TURN: dials and wheels.
 *
 * A dial steps one position per turn (backwards with BACK) and fires its
 * effect when it arrives at the activation position. A wheel without
 * positions turns once; it stays turned until it is turned back.
 *
 * @example
 * ```
 * turn dial
 * turn dial back
 * turn wheel
 * ```
 *
 * @module commands/turn
 */

import type { CommandContext, CommandObject } from "../core/command.js";
import { the } from "../core/describe.js";
import { MODIFIER_BACK } from "../core/parser.js";
import { applyReaction, canReact } from "../core/reactions.js";
import { conflict, mismatch, ok } from "../core/result.js";
import { SCOPE } from "../core/scope.js";
import { CAPABILITY, hasCapability, type Reaction } from "../core/world.js";
import { capitalizeFirst } from "../utils/string.js";
import { withObject } from "./_helpers.js";

function fire(
	context: CommandContext,
	reaction: Reaction,
	id: string,
	key: string
): string | undefined {
	if (!canReact(context, reaction, id, key)) return undefined;
	return applyReaction(context, reaction, id, key);
}

export default {
	verb: "TURN",
	object: { required: true, scope: SCOPE.REACHABLE },
	execute: withObject((context, id) => {
		const state = context.state;
		const template = context.world.object(id);
		const spec = template.turn;
		const The = capitalizeFirst(the(context, id));
		if (!hasCapability(template, CAPABILITY.TURNABLE) || !spec) {
			return mismatch(`You can't turn ${the(context, id)}.`, "not turnable");
		}
		const back = context.command.modifiers.includes(MODIFIER_BACK);

		if (spec.positions !== undefined) {
			const before = state.objectState(id).rotation;
			const rotation = (before + (back ? -1 : 1) + spec.positions) % spec.positions;
			state.updateObject(id, { rotation });
			const lines = [`${The} clicks round to ${rotation}.`];
			if (rotation === spec.activation && before !== spec.activation) {
				const effect = fire(context, spec.effect, id, "TURN");
				if (effect) lines.push(effect);
			}
			return ok(lines.join("\n"));
		}

		const activated = state.objectState(id).activated;
		if (back) {
			if (!activated) return conflict(`${The} won't turn back any further.`);
			state.updateObject(id, { activated: false });
			const effect = spec.reverse && fire(context, spec.reverse, id, "TURN_BACK");
			return ok(effect || `${The} turns back.`);
		}
		if (activated) return conflict(`${The} won't turn any further.`);
		state.updateObject(id, { activated: true });
		return ok(fire(context, spec.effect, id, "TURN") || `${The} turns, but nothing happens.`);
	}),
} satisfies CommandObject;
