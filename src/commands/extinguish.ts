/**
 * EXTINGUISH and TURN OFF: light sources.
 *
 * @example
 * ```
 * turn off lamp
 * blow out candles
 * ```
 *
 * @module commands/extinguish
 */

import type { CommandObject } from "../core/command.js";
import { DARKNESS, the } from "../core/describe.js";
import { conflict, mismatch, ok } from "../core/result.js";
import { isLit, SCOPE } from "../core/scope.js";
import { verbLabel } from "../core/vocabulary.js";
import { CAPABILITY, hasCapability } from "../core/world.js";
import { capitalizeFirst } from "../utils/string.js";
import { withObject } from "./_helpers.js";

export default {
	verb: "EXTINGUISH",
	aliases: ["TURN_OFF"],
	object: { required: true, scope: SCOPE.REACHABLE },
	execute: withObject((context, id) => {
		const state = context.state;
		const template = context.world.object(id);
		const The = capitalizeFirst(the(context, id));
		if (
			!hasCapability(template, CAPABILITY.LIGHTABLE) &&
			!hasCapability(template, CAPABILITY.FIRE_SOURCE)
		) {
			return mismatch(
				`You can't ${verbLabel(context.command.verb)} ${the(context, id)}.`,
				"not a light source"
			);
		}
		if (!state.objectState(id).lit) return conflict(`${The} isn't lit.`);
		const wasLit = isLit(state);
		state.updateObject(id, { lit: false });
		const lines = [`${The} is now off.`];
		if (wasLit && !isLit(state)) lines.push(DARKNESS);
		return ok(lines.join("\n"));
	}),
} satisfies CommandObject;
