/**
 * TIE: ties a rope to an anchor it can hold on to.
 *
 * Tying a rope that is already tied elsewhere unties it first. A carried
 * rope is left hanging from the anchor.
 *
 * @example
 * ```
 * tie rope to railing
 * ```
 *
 * @module commands/tie
 */

import type { CommandObject } from "../core/command.js";
import { the } from "../core/describe.js";
import { conflict, mismatch, ok } from "../core/result.js";
import { SCOPE } from "../core/scope.js";
import { CAPABILITY, hasCapability, inRoom } from "../core/world.js";
import { capitalizeFirst } from "../utils/string.js";
import { withObject } from "./_helpers.js";
import { fasten, unfasten } from "./_rope.js";

export default {
	verb: "TIE",
	object: { required: true, scope: SCOPE.REACHABLE },
	tool: {
		required: true,
		scope: SCOPE.REACHABLE,
		prompt: (context) =>
			`What do you want to tie the ${context.command.object ?? "it"} to?`,
	},
	execute: withObject((context, id, args) => {
		const state = context.state;
		const template = context.world.object(id);
		const anchor = args.tool;
		if (!hasCapability(template, CAPABILITY.TIEABLE) || !template.tie) {
			return mismatch(`You can't tie ${the(context, id)}.`, "not tieable");
		}
		if (!anchor) return mismatch(`What do you want to tie ${the(context, id)} to?`);
		if (anchor === id) return mismatch("You can't tie something to itself.", "same object");
		if (
			!hasCapability(context.world.object(anchor), CAPABILITY.ANCHOR) ||
			!template.tie.targets.includes(anchor)
		) {
			return mismatch(
				`You can't tie ${the(context, id)} to ${the(context, anchor)}.`,
				"not an anchor"
			);
		}
		if (state.objectState(id).tiedTo === anchor) {
			return conflict(
				`${capitalizeFirst(the(context, id))} is already tied to ${the(context, anchor)}.`
			);
		}
		unfasten(context, id);
		fasten(context, id, anchor);
		if (state.isHeld(id)) state.moveObject(id, inRoom(state.currentRoom));
		return ok(
			template.tie.message ??
				`${capitalizeFirst(the(context, id))} is now tied to ${the(context, anchor)}.`
		);
	}),
} satisfies CommandObject;
