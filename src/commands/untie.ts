/**
 * UNTIE: frees a rope from its anchor.
 *
 * @module commands/untie
 */

import type { CommandObject } from "../core/command.js";
import { the } from "../core/describe.js";
import { conflict, ok } from "../core/result.js";
import { SCOPE } from "../core/scope.js";
import { capitalizeFirst } from "../utils/string.js";
import { withObject } from "./_helpers.js";
import { unfasten } from "./_rope.js";

export default {
	verb: "UNTIE",
	object: { required: true, scope: SCOPE.REACHABLE },
	execute: withObject((context, id) => {
		const anchor = unfasten(context, id);
		if (!anchor) {
			return conflict(`${capitalizeFirst(the(context, id))} isn't tied to anything.`);
		}
		return ok(`You untie ${the(context, id)} from ${the(context, anchor)}.`);
	}),
} satisfies CommandObject;
