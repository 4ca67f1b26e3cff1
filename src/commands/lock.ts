/**
 * LOCK and UNLOCK: need the object's key, either named or carried.
 *
 * @example
 * ```
 * unlock cabinet with key
 * lock cabinet
 * ```
 *
 * @module commands/lock
 */

import type { CommandObject } from "../core/command.js";
import { the } from "../core/describe.js";
import { blocked, conflict, mismatch, ok } from "../core/result.js";
import { heldObjects, SCOPE } from "../core/scope.js";
import { CAPABILITY } from "../core/world.js";
import { verbLabel } from "../core/vocabulary.js";
import { capitalizeFirst } from "../utils/string.js";
import { can, withObject } from "./_helpers.js";

export default {
	verb: "LOCK",
	aliases: ["UNLOCK"],
	object: { required: true, scope: SCOPE.REACHABLE },
	tool: { required: false, scope: SCOPE.HELD },
	execute: withObject((context, id, args) => {
		const state = context.state;
		const verb = context.command.verb;
		const template = context.world.object(id);
		const The = capitalizeFirst(the(context, id));
		if (!can(context, id, CAPABILITY.LOCKABLE)) {
			return mismatch(`You can't ${verbLabel(verb)} ${the(context, id)}.`, "not lockable");
		}
		if (!template.key) return blocked(`There's no keyhole in ${the(context, id)}.`);
		const key =
			args.tool ??
			(heldObjects(state).includes(template.key) ? template.key : undefined);
		if (!key) return blocked("You don't have the key.");
		if (key !== template.key) {
			return blocked(
				`${capitalizeFirst(the(context, key))} doesn't fit ${the(context, id)}.`
			);
		}

		const locked = state.objectState(id).locked;
		if (verb === "UNLOCK") {
			if (!locked) return conflict(`${The} isn't locked.`);
			state.updateObject(id, { locked: false });
			return ok("Unlocked.");
		}
		if (locked) return conflict(`${The} is already locked.`);
		if (state.objectState(id).open) {
			return conflict(`You'll have to close ${the(context, id)} first.`);
		}
		state.updateObject(id, { locked: true });
		return ok("Locked.");
	}),
} satisfies CommandObject;
