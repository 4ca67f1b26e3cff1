/**
 * LOOK: describes the current room in full, whatever the verbosity.
 * With an object it behaves like EXAMINE.
 *
 * @example
 * ```
 * look
 * l
 * ```
 *
 * @module commands/look
 */

import type { CommandObject } from "../core/command.js";
import { describeRoom } from "../core/describe.js";
import { ok } from "../core/result.js";
import { SCOPE } from "../core/scope.js";
import examine from "./examine.js";

export default {
	verb: "LOOK",
	object: { required: false, scope: SCOPE.REACHABLE },
	execute(context, args) {
		if (args.object) return examine.execute(context, args);
		return ok(describeRoom(context, { force: true }));
	},
} satisfies CommandObject;
