/**
 * THROW: throws a carried object, optionally at something. The object
 * always ends up on the floor; a weapon thrown at a creature wounds it.
 *
 * @example
 * ```
 * throw knife at troll
 * throw leaflet
 * ```
 *
 * @module commands/throw
 */

import type { CommandObject } from "../core/command.js";
import { the } from "../core/describe.js";
import { ok } from "../core/result.js";
import { SCOPE } from "../core/scope.js";
import { CAPABILITY, inRoom } from "../core/world.js";
import { capitalizeFirst } from "../utils/string.js";
import { can, withObject } from "./_helpers.js";
import { weaponDamage, wound } from "./_combat.js";

export default {
	verb: "THROW",
	object: { required: true, scope: SCOPE.HELD },
	tool: { required: false, scope: SCOPE.ROOM },
	execute: withObject((context, id, args) => {
		const state = context.state;
		state.moveObject(id, inRoom(state.currentRoom));
		if (state.objectState(id).worn) state.updateObject(id, { worn: false });
		const target = args.tool;
		if (!target) return ok(`You throw ${the(context, id)}. It lands nearby.`);
		if (context.world.object(target).type === "creature" && can(context, id, CAPABILITY.WEAPON)) {
			return ok(
				`You throw ${the(context, id)} at ${the(context, target)}.\n${wound(
					context,
					target,
					weaponDamage(context, id)
				)}`
			);
		}
		return ok(
			`${capitalizeFirst(the(context, id))} bounces off ${the(context, target)} and lands on the floor.`
		);
	}),
} satisfies CommandObject;
