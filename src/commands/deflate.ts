/**
 * DEFLATE: lets the air out of an inflatable object.
 *
 * @module commands/deflate
 */

import type { CommandObject } from "../core/command.js";
import { the } from "../core/describe.js";
import { blocked, conflict, mismatch, ok } from "../core/result.js";
import { SCOPE } from "../core/scope.js";
import { CAPABILITY } from "../core/world.js";
import { capitalizeFirst } from "../utils/string.js";
import { can, withObject } from "./_helpers.js";

export default {
	verb: "DEFLATE",
	object: { required: true, scope: SCOPE.REACHABLE },
	execute: withObject((context, id) => {
		const state = context.state;
		const The = capitalizeFirst(the(context, id));
		if (!can(context, id, CAPABILITY.INFLATABLE)) {
			return mismatch(`You can't deflate ${the(context, id)}.`, "not inflatable");
		}
		if (state.currentVehicle === id) {
			return blocked("You can't deflate it while you're sitting in it.");
		}
		if (!state.objectState(id).inflated) return conflict(`${The} isn't inflated.`);
		state.updateObject(id, { inflated: false });
		return ok(`${The} deflates with a long sigh.`);
	}),
} satisfies CommandObject;
