/**
 * POUR: empties liquid out of a container, or into another one.
 *
 * @example
 * ```
 * pour water
 * pour bottle into flask
 * ```
 *
 * @module commands/pour
 */

import type { CommandObject } from "../core/command.js";
import { the } from "../core/describe.js";
import { conflict, mismatch, ok } from "../core/result.js";
import { SCOPE } from "../core/scope.js";
import { CAPABILITY } from "../core/world.js";
import { capitalizeFirst } from "../utils/string.js";
import { can, withObject } from "./_helpers.js";
import { capacityOf, drain } from "./_liquid.js";

export default {
	verb: "POUR",
	object: { required: true, scope: SCOPE.REACHABLE },
	tool: { required: false, scope: SCOPE.REACHABLE },
	execute: withObject((context, id, args) => {
		const state = context.state;
		const liquid = state.objectState(id).liquid;
		if (!liquid || liquid.amount <= 0) return conflict("There's nothing to pour.");
		const target = args.tool;
		if (!target) {
			drain(context, id, liquid.amount);
			return ok(`You pour out the ${liquid.kind}. It soaks away into the ground.`);
		}
		if (target === id) return mismatch("You can't pour something into itself.", "same object");
		if (!can(context, target, CAPABILITY.FILLABLE)) {
			drain(context, id, liquid.amount);
			return ok(
				`The ${liquid.kind} splashes over ${the(context, target)} and is gone.`
			);
		}
		const existing = state.objectState(target).liquid;
		if (existing && existing.kind !== liquid.kind) {
			return conflict(
				`${capitalizeFirst(the(context, target))} already has some ${existing.kind} in it.`
			);
		}
		const room = capacityOf(context, target) - (existing?.amount ?? 0);
		if (room <= 0) return conflict(`${capitalizeFirst(the(context, target))} is already full.`);
		const moved = drain(context, id, room);
		state.updateObject(target, {
			liquid: { kind: liquid.kind, amount: (existing?.amount ?? 0) + moved },
		});
		context.affected.add(target);
		return ok(`You pour the ${liquid.kind} into ${the(context, target)}.`);
	}),
} satisfies CommandObject;
