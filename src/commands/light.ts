/**
 * LIGHT and TURN ON: light sources.
 *
 * Sources with a battery refuse once it is spent. Sources that need a
 * flame (the candles) need a lit fire source, either named or within
 * reach. Lighting a dark room describes it.
 *
 * @example
 * ```
 * turn on lamp
 * light candles with matches
 * ```
 *
 * @module commands/light
 */

import type { CommandObject } from "../core/command.js";
import { describeRoom, the } from "../core/describe.js";
import { conflict, mismatch, ok } from "../core/result.js";
import { isLit, SCOPE } from "../core/scope.js";
import { verbLabel } from "../core/vocabulary.js";
import { CAPABILITY, hasCapability } from "../core/world.js";
import { capitalizeFirst } from "../utils/string.js";
import { findFlame, withObject } from "./_helpers.js";

export default {
	verb: "LIGHT",
	aliases: ["TURN_ON"],
	object: { required: true, scope: SCOPE.REACHABLE },
	tool: { required: false, scope: SCOPE.REACHABLE },
	execute: withObject((context, id, args) => {
		const state = context.state;
		const template = context.world.object(id);
		const The = capitalizeFirst(the(context, id));
		const burns = hasCapability(template, CAPABILITY.FIRE_SOURCE);
		if (!hasCapability(template, CAPABILITY.LIGHTABLE) && !burns) {
			return mismatch(
				`You can't ${verbLabel(context.command.verb)} ${the(context, id)}.`,
				"not a light source"
			);
		}
		if (state.objectState(id).lit) return conflict(`${The} is already lit.`);
		const remaining = state.resources.get(id);
		if (remaining !== undefined && remaining <= 0) {
			return mismatch(`${The} has nothing left to give. It stays dark.`, "spent");
		}
		if (template.light?.fire) {
			const flame = args.tool ?? findFlame(state, id);
			if (!flame) {
				return mismatch(`You'll need a flame to light ${the(context, id)}.`, "no flame");
			}
			if (
				!hasCapability(context.world.object(flame), CAPABILITY.FIRE_SOURCE) ||
				!state.objectState(flame).lit
			) {
				return mismatch(
					`${capitalizeFirst(the(context, flame))} isn't burning.`,
					"no flame"
				);
			}
		}

		const wasLit = isLit(state);
		state.updateObject(id, { lit: true });
		const lines = [
			burns || template.light?.fire ? `${The} is now lit.` : `${The} is now on.`,
		];
		if (!wasLit && isLit(state)) lines.push(describeRoom(context, { force: true }));
		return ok(lines.join("\n"));
	}),
} satisfies CommandObject;
