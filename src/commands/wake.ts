/**
 * WAKE: wakes someone who is asleep.
 *
 * @module commands/wake
 */

import type { CommandObject } from "../core/command.js";
import { the } from "../core/describe.js";
import { conflict, mismatch, ok } from "../core/result.js";
import { SCOPE } from "../core/scope.js";
import { isActor } from "../core/world.js";
import { capitalizeFirst } from "../utils/string.js";
import { withObject } from "./_helpers.js";

export default {
	verb: "WAKE",
	object: { required: true, scope: SCOPE.ROOM },
	execute: withObject((context, id) => {
		const state = context.state;
		const The = capitalizeFirst(the(context, id));
		if (!isActor(context.world.object(id))) {
			return mismatch(`${The} isn't asleep.`, "not a person");
		}
		if (state.objectState(id).disposition !== "asleep") {
			return conflict(`${The} is already awake.`);
		}
		state.updateObject(id, { disposition: "awake" });
		return ok(`${The} wakes with a start.`);
	}),
} satisfies CommandObject;
