/**
 * GO: walks through an exit. A bare direction is parsed as GO.
 *
 * @example
 * ```
 * go north
 * n
 * walk up
 * ```
 *
 * @module commands/go
 */

import type { CommandObject } from "../core/command.js";
import { blocked } from "../core/result.js";
import { NO_EXIT, travel } from "./_movement.js";

export default {
	verb: "GO",
	direction: "required",
	execute(context, args) {
		if (!args.direction) return blocked(NO_EXIT);
		return travel(context, args.direction);
	},
} satisfies CommandObject;
