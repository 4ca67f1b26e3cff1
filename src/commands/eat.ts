/**
 * EAT: eats something edible. It is gone afterwards.
 *
 * @module commands/eat
 */

import type { CommandObject } from "../core/command.js";
import { the } from "../core/describe.js";
import { mismatch, ok } from "../core/result.js";
import { SCOPE } from "../core/scope.js";
import { CAPABILITY, DESTROYED } from "../core/world.js";
import { capitalizeFirst } from "../utils/string.js";
import { can, react, withObject } from "./_helpers.js";

export default {
	verb: "EAT",
	object: { required: true, scope: SCOPE.REACHABLE },
	execute: withObject((context, id) => {
		if (!can(context, id, CAPABILITY.EDIBLE)) {
			return mismatch(
				`${capitalizeFirst(the(context, id))} isn't something you can eat.`,
				"not edible"
			);
		}
		context.state.moveObject(id, DESTROYED);
		return ok(react(context, id) || "Thank you. It hit the spot.");
	}),
} satisfies CommandObject;
