/**
 * INFLATE: blows up an inflatable object, with its pump where it needs one.
 *
 * @example
 * ```
 * inflate boat with pump
 * ```
 *
 * @module commands/inflate
 */

import type { CommandObject } from "../core/command.js";
import { the } from "../core/describe.js";
import { conflict, mismatch, ok } from "../core/result.js";
import { reachableObjects, SCOPE } from "../core/scope.js";
import { CAPABILITY } from "../core/world.js";
import { capitalizeFirst } from "../utils/string.js";
import { can, withObject } from "./_helpers.js";

export default {
	verb: "INFLATE",
	object: { required: true, scope: SCOPE.REACHABLE },
	tool: { required: false, scope: SCOPE.REACHABLE },
	execute: withObject((context, id, args) => {
		const state = context.state;
		const template = context.world.object(id);
		const The = capitalizeFirst(the(context, id));
		if (!can(context, id, CAPABILITY.INFLATABLE)) {
			return mismatch(`You can't inflate ${the(context, id)}.`, "not inflatable");
		}
		if (state.objectState(id).inflated) return conflict(`${The} is already inflated.`);
		const needed = template.inflateTool;
		if (needed) {
			const pump =
				args.tool ?? (reachableObjects(state).includes(needed) ? needed : undefined);
			if (!pump) {
				return mismatch(`You'll need something to inflate ${the(context, id)} with.`, "no pump");
			}
			if (pump !== needed) {
				return mismatch(
					`${capitalizeFirst(the(context, pump))} won't inflate ${the(context, id)}.`,
					"wrong tool"
				);
			}
		}
		state.updateObject(id, { inflated: true });
		return ok(`${The} fills with air and takes shape.`);
	}),
} satisfies CommandObject;
