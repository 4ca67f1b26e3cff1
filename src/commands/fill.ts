/**
 * FILL: fills a container that holds liquid.
 *
 * @example
 * ```
 * fill bottle
 * fill bottle with water
 * fill bottle from flask
 * ```
 *
 * @module commands/fill
 */

import type { CommandObject } from "../core/command.js";
import { the } from "../core/describe.js";
import { absent, conflict, mismatch, ok } from "../core/result.js";
import { SCOPE } from "../core/scope.js";
import { CAPABILITY } from "../core/world.js";
import { capitalizeFirst } from "../utils/string.js";
import { can, withObject } from "./_helpers.js";
import { capacityOf, drain, findSource } from "./_liquid.js";

export default {
	verb: "FILL",
	topic: true,
	object: { required: true, scope: SCOPE.REACHABLE },
	execute: withObject((context, id, args) => {
		const state = context.state;
		const The = capitalizeFirst(the(context, id));
		if (!can(context, id, CAPABILITY.FILLABLE)) {
			return mismatch(`You can't fill ${the(context, id)}.`, "not fillable");
		}
		const capacity = capacityOf(context, id);
		const current = state.objectState(id).liquid;
		const held = current?.amount ?? 0;
		if (held >= capacity) return conflict(`${The} is already full.`, true);

		const source = findSource(context, id, args.topic);
		if (!source) return absent("There's nothing here to fill it with.");
		if (current && current.kind !== source.kind) {
			return conflict(`${The} already has some ${current.kind} in it.`);
		}
		const added = source.from ? drain(context, source.from, capacity - held) : capacity - held;
		state.updateObject(id, { liquid: { kind: source.kind, amount: held + added } });
		return ok(
			held + added >= capacity
				? `${The} is now full of ${source.kind}.`
				: `You pour some ${source.kind} into ${the(context, id)}.`
		);
	}),
} satisfies CommandObject;
