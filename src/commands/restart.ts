/**
 * RESTART: throws the current game away and starts over.
 *
 * @module commands/restart
 */

import type { CommandObject } from "../core/command.js";
import { describeRoom } from "../core/describe.js";
import { ok } from "../core/result.js";

export default {
	verb: "RESTART",
	meta: true,
	afterEnd: true,
	execute(context) {
		context.state.assign(context.newGame());
		return ok(describeRoom(context, { force: true }));
	},
} satisfies CommandObject;
