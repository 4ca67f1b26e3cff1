/**
 * ENTER: boards a vehicle, climbs through an enterable object, or goes in.
 *
 * @example
 * ```
 * enter window
 * enter boat
 * enter
 * ```
 *
 * @module commands/enter
 */

import type { CommandObject } from "../core/command.js";
import { the } from "../core/describe.js";
import { blocked, mismatch, ok } from "../core/result.js";
import { SCOPE } from "../core/scope.js";
import { CAPABILITY, hasCapability, isVehicle } from "../core/world.js";
import { DIRECTION } from "../direction.js";
import { capitalizeFirst } from "../utils/string.js";
import { board, enterRoom, travel } from "./_movement.js";

export default {
	verb: "ENTER",
	object: { required: false, scope: SCOPE.ROOM },
	execute(context, args) {
		const id = args.object;
		if (!id) return travel(context, DIRECTION.IN);
		const template = context.world.object(id);
		if (isVehicle(template)) return board(context, id);
		if (hasCapability(template, CAPABILITY.ENTERABLE) && template.leadsTo) {
			if (
				hasCapability(template, CAPABILITY.OPENABLE) &&
				!context.state.objectState(id).open
			) {
				return blocked(`${capitalizeFirst(the(context, id))} is closed.`);
			}
			return ok(enterRoom(context, template.leadsTo));
		}
		return mismatch(`You can't enter ${the(context, id)}.`, "not enterable");
	},
} satisfies CommandObject;
