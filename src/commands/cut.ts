/**
 * CUT: cuts something with a blade, named or carried.
 *
 * Objects that split (into pieces named in world data) are replaced by
 * the pieces; anything else is marked as cut. A cut rope falls free of
 * whatever it was tied to.
 *
 * @example
 * ```
 * cut rope with knife
 * ```
 *
 * @module commands/cut
 */

import type { CommandObject } from "../core/command.js";
import { a, the } from "../core/describe.js";
import { conflict, mismatch, ok } from "../core/result.js";
import { SCOPE } from "../core/scope.js";
import { CAPABILITY, DESTROYED } from "../core/world.js";
import { capitalizeFirst, joinWithAnd } from "../utils/string.js";
import { can, findHeld, withObject } from "./_helpers.js";
import { unfasten } from "./_rope.js";

export default {
	verb: "CUT",
	object: { required: true, scope: SCOPE.REACHABLE },
	tool: { required: false, scope: SCOPE.REACHABLE },
	execute: withObject((context, id, args) => {
		const state = context.state;
		const template = context.world.object(id);
		const blade = args.tool ?? findHeld(state, CAPABILITY.CUTTING_TOOL, id);
		if (!blade) return mismatch("You have nothing to cut it with.", "no blade");
		if (!can(context, blade, CAPABILITY.CUTTING_TOOL)) {
			return mismatch(
				`${capitalizeFirst(the(context, blade))} isn't sharp enough.`,
				"not a cutting tool"
			);
		}
		if (!can(context, id, CAPABILITY.CUTTABLE)) {
			return mismatch(`You can't cut ${the(context, id)}.`, "not cuttable");
		}
		if (state.objectState(id).cut) {
			return conflict(`${capitalizeFirst(the(context, id))} has already been cut.`);
		}

		const anchor = unfasten(context, id);
		if (template.splitsInto.length) {
			const location = state.locationOf(id);
			for (const piece of template.splitsInto) {
				state.moveObject(piece, location);
				context.affected.add(piece);
			}
			state.moveObject(id, DESTROYED);
			return ok(
				`You cut ${the(context, id)} into ${joinWithAnd(
					template.splitsInto.map((piece) => a(context, piece))
				)}.`
			);
		}
		state.updateObject(id, { cut: true });
		return ok(
			anchor
				? `You cut ${the(context, id)}, and it falls away from ${the(context, anchor)}.`
				: `You cut ${the(context, id)}.`
		);
	}),
} satisfies CommandObject;
