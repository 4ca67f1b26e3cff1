/**
 * CLIMB: up or down, optionally naming what is climbed.
 *
 * @example
 * ```
 * climb tree
 * climb down
 * climb down rope
 * ```
 *
 * @module commands/climb
 */

import type { CommandObject } from "../core/command.js";
import { the } from "../core/describe.js";
import { blocked, mismatch } from "../core/result.js";
import { SCOPE } from "../core/scope.js";
import { CAPABILITY } from "../core/world.js";
import { DIRECTION } from "../direction.js";
import { can } from "./_helpers.js";
import { travel } from "./_movement.js";

const CANNOT_CLIMB = "You can't climb that way.";

export default {
	verb: "CLIMB",
	direction: "optional",
	object: { required: false, scope: SCOPE.REACHABLE },
	execute(context, args) {
		const state = context.state;
		if (args.object) {
			if (!can(context, args.object, CAPABILITY.CLIMBABLE)) {
				return mismatch(`You can't climb ${the(context, args.object)}.`, "not climbable");
			}
			if (state.isHeld(args.object)) {
				return mismatch(
					`You can't climb ${the(context, args.object)} while you're holding it.`,
					"held"
				);
			}
		}
		const direction = args.direction ?? DIRECTION.UP;
		if (direction !== DIRECTION.UP && direction !== DIRECTION.DOWN) {
			return blocked(CANNOT_CLIMB);
		}
		if (!context.world.room(state.currentRoom).exits.has(direction)) {
			return blocked(CANNOT_CLIMB);
		}
		return travel(context, direction);
	},
} satisfies CommandObject;
