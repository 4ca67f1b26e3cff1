/**
 * EXAMINE: describes an object and whatever state of it can be seen.
 *
 * @example
 * ```
 * examine lamp
 * x mailbox
 * look at rug
 * ```
 *
 * @module commands/examine
 */

import type { CommandObject } from "../core/command.js";
import { describeObject } from "../core/describe.js";
import { ok } from "../core/result.js";
import { SCOPE } from "../core/scope.js";
import { react, withObject } from "./_helpers.js";

export default {
	verb: "EXAMINE",
	object: { required: true, scope: SCOPE.REACHABLE },
	execute: withObject((context, id) => {
		const extra = react(context, id, "EXAMINE");
		const description = describeObject(context, id);
		return ok(extra ? `${description}\n${extra}` : description);
	}),
} satisfies CommandObject;
