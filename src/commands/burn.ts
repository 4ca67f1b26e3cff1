/**
 * BURN: sets fire to something flammable. It burns away and anything
 * inside it falls out.
 *
 * @example
 * ```
 * burn leaflet
 * burn leaflet with matches
 * ```
 *
 * @module commands/burn
 */

import type { CommandObject } from "../core/command.js";
import { the } from "../core/describe.js";
import { mismatch, ok } from "../core/result.js";
import { SCOPE } from "../core/scope.js";
import { CAPABILITY, DESTROYED, hasCapability, inRoom, inside } from "../core/world.js";
import { capitalizeFirst } from "../utils/string.js";
import { can, findFlame, withObject } from "./_helpers.js";
import { unfasten } from "./_rope.js";

export default {
	verb: "BURN",
	object: { required: true, scope: SCOPE.REACHABLE },
	tool: { required: false, scope: SCOPE.REACHABLE },
	execute: withObject((context, id, args) => {
		const state = context.state;
		if (!can(context, id, CAPABILITY.FLAMMABLE)) {
			return mismatch(`${capitalizeFirst(the(context, id))} won't burn.`, "not flammable");
		}
		const flame = args.tool ?? findFlame(state, id);
		if (!flame) return mismatch("You have no flame to burn it with.", "no flame");
		if (
			!hasCapability(context.world.object(flame), CAPABILITY.FIRE_SOURCE) ||
			!state.objectState(flame).lit
		) {
			return mismatch(`${capitalizeFirst(the(context, flame))} isn't burning.`, "no flame");
		}
		for (const child of state.contentsOf(inside(id))) {
			state.moveObject(child, inRoom(state.currentRoom));
			context.affected.add(child);
		}
		unfasten(context, id);
		state.moveObject(id, DESTROYED);
		return ok(`${capitalizeFirst(the(context, id))} catches fire and is consumed.`);
	}),
} satisfies CommandObject;
