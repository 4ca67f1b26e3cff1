/**
 * WAIT: lets a move pass.
 *
 * @module commands/wait
 */

import type { CommandObject } from "../core/command.js";
import { themed } from "../core/describe.js";
import { ok } from "../core/result.js";

export default {
	verb: "WAIT",
	execute: (context) =>
		ok(themed(context, "Time passes...", "Time passes. The house waits with you.")),
} satisfies CommandObject;
