/**
 * CLOSE: closes doors and containers.
 *
 * @module commands/close
 */

import type { CommandObject } from "../core/command.js";
import { the } from "../core/describe.js";
import { conflict, mismatch, ok } from "../core/result.js";
import { SCOPE } from "../core/scope.js";
import { CAPABILITY } from "../core/world.js";
import { capitalizeFirst } from "../utils/string.js";
import { can, withObject } from "./_helpers.js";

export default {
	verb: "CLOSE",
	object: { required: true, scope: SCOPE.REACHABLE },
	execute: withObject((context, id) => {
		const state = context.state;
		if (!can(context, id, CAPABILITY.OPENABLE)) {
			return mismatch(`You can't close ${the(context, id)}.`, "not openable");
		}
		if (!state.objectState(id).open) {
			return conflict(`${capitalizeFirst(the(context, id))} is already closed.`);
		}
		state.updateObject(id, { open: false });
		return ok("Closed.");
	}),
} satisfies CommandObject;
