/**
 * PUSH, PULL and MOVE: shifts heavy things such as the rug.
 *
 * Only the first push has an effect; later pushes report that the object
 * has already been moved and change nothing.
 *
 * @example
 * ```
 * move rug
 * push rug
 * ```
 *
 * @module commands/push
 */

import type { CommandObject } from "../core/command.js";
import { the } from "../core/describe.js";
import { applyReaction } from "../core/reactions.js";
import { conflict, mismatch, ok } from "../core/result.js";
import { SCOPE } from "../core/scope.js";
import { CAPABILITY } from "../core/world.js";
import { capitalizeFirst } from "../utils/string.js";
import { can, withObject } from "./_helpers.js";

export default {
	verb: "PUSH",
	aliases: ["PULL", "MOVE"],
	object: { required: true, scope: SCOPE.REACHABLE },
	execute: withObject((context, id) => {
		const state = context.state;
		const template = context.world.object(id);
		if (!can(context, id, CAPABILITY.MOVEABLE)) {
			return mismatch(
				`Moving ${the(context, id)} doesn't accomplish anything.`,
				"not moveable"
			);
		}
		if (state.objectState(id).pushed) {
			return conflict(`${capitalizeFirst(the(context, id))} has already been moved.`, true);
		}
		state.updateObject(id, { pushed: true });
		if (!template.push) return ok(`You move ${the(context, id)}.`);
		return ok(applyReaction(context, template.push, id, "PUSH"));
	}),
} satisfies CommandObject;
