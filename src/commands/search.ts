/**
 * SEARCH, LOOK UNDER, LOOK BEHIND and LOOK INSIDE.
 *
 * An object's reaction for the verb wins; otherwise containers show their
 * contents and everything else turns up nothing.
 *
 * @example
 * ```
 * look under rug
 * look in mailbox
 * search table
 * ```
 *
 * @module commands/search
 */

import type { CommandObject } from "../core/command.js";
import { contentsLine, the } from "../core/describe.js";
import { conflict, mismatch, ok } from "../core/result.js";
import { isSeeThrough, SCOPE } from "../core/scope.js";
import { isContainer } from "../core/world.js";
import { capitalizeFirst } from "../utils/string.js";
import { react, withObject } from "./_helpers.js";

export default {
	verb: "SEARCH",
	aliases: ["LOOK_UNDER", "LOOK_BEHIND", "LOOK_INSIDE"],
	object: { required: true, scope: SCOPE.REACHABLE },
	execute: withObject((context, id) => {
		const verb = context.command.verb;
		const reaction = react(context, id, verb);
		if (reaction) return ok(reaction);

		const The = capitalizeFirst(the(context, id));
		switch (verb) {
			case "LOOK_UNDER":
				return ok("There is nothing but dust there.");
			case "LOOK_BEHIND":
				return ok("There is nothing behind it.");
			default:
				break;
		}
		if (isContainer(context.world.object(id))) {
			if (!isSeeThrough(context.state, id)) return conflict(`${The} is closed.`);
			return ok(contentsLine(context, id) ?? `${The} is empty.`);
		}
		if (verb === "LOOK_INSIDE") {
			return mismatch(`You can't look inside ${the(context, id)}.`, "not a container");
		}
		return ok("You find nothing of interest.");
	}),
} satisfies CommandObject;
