/**
 * ATTACK: fights a creature or person, bare-handed or with a weapon.
 *
 * @example
 * ```
 * attack troll with sword
 * kill troll
 * ```
 *
 * @module commands/attack
 */

import type { CommandObject } from "../core/command.js";
import { the } from "../core/describe.js";
import { mismatch, ok } from "../core/result.js";
import { SCOPE } from "../core/scope.js";
import { CAPABILITY, isActor } from "../core/world.js";
import { capitalizeFirst } from "../utils/string.js";
import { can, withObject } from "./_helpers.js";
import { weaponDamage, wound } from "./_combat.js";

export default {
	verb: "ATTACK",
	object: {
		required: true,
		scope: SCOPE.ROOM,
		prompt: "What do you want to attack?",
	},
	tool: { required: false, scope: SCOPE.HELD },
	execute: withObject((context, id, args) => {
		if (!isActor(context.world.object(id))) {
			return mismatch(
				`Attacking ${the(context, id)} would accomplish nothing.`,
				"not a creature"
			);
		}
		const weapon = args.tool;
		if (weapon && !can(context, weapon, CAPABILITY.WEAPON)) {
			return mismatch(
				`${capitalizeFirst(the(context, weapon))} is no weapon.`,
				"not a weapon"
			);
		}
		const opening = weapon
			? `You strike ${the(context, id)} with ${the(context, weapon)}.`
			: `You hit ${the(context, id)} with your bare hands.`;
		return ok(`${opening}\n${wound(context, id, weaponDamage(context, weapon))}`);
	}),
} satisfies CommandObject;
