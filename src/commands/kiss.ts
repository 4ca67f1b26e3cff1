/**
 * KISS: mostly a bad idea.
 *
 * @module commands/kiss
 */

import type { CommandObject } from "../core/command.js";
import { the } from "../core/describe.js";
import { ok } from "../core/result.js";
import { SCOPE } from "../core/scope.js";
import { isActor } from "../core/world.js";
import { capitalizeFirst } from "../utils/string.js";
import { react, withObject } from "./_helpers.js";

export default {
	verb: "KISS",
	object: { required: true, scope: SCOPE.ROOM },
	execute: withObject((context, id) => {
		const reaction = react(context, id);
		if (reaction) return ok(reaction);
		if (isActor(context.world.object(id))) {
			return ok(`${capitalizeFirst(the(context, id))} doesn't seem interested.`);
		}
		return ok(`You kiss ${the(context, id)}. Nothing happens.`);
	}),
} satisfies CommandObject;
