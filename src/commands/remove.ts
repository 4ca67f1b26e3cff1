/**
 * REMOVE: takes off something worn.
 *
 * @example
 * ```
 * remove cloak
 * take off cloak
 * ```
 *
 * @module commands/remove
 */

import type { CommandObject } from "../core/command.js";
import { the } from "../core/describe.js";
import { conflict, ok } from "../core/result.js";
import { SCOPE } from "../core/scope.js";
import { withObject } from "./_helpers.js";

export default {
	verb: "REMOVE",
	object: { required: true, scope: SCOPE.HELD },
	execute: withObject((context, id) => {
		const state = context.state;
		if (!state.objectState(id).worn) {
			return conflict(`You aren't wearing ${the(context, id)}.`);
		}
		state.updateObject(id, { worn: false });
		return ok(`You take off ${the(context, id)}.`);
	}),
} satisfies CommandObject;
