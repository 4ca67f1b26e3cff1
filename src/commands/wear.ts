/**
 * WEAR: puts on something wearable. Worn armor softens blows.
 *
 * @example
 * ```
 * wear cloak
 * put on cloak
 * ```
 *
 * @module commands/wear
 */

import type { CommandObject } from "../core/command.js";
import { the } from "../core/describe.js";
import { conflict, mismatch, ok } from "../core/result.js";
import { SCOPE } from "../core/scope.js";
import { CAPABILITY, INVENTORY } from "../core/world.js";
import { can, withObject } from "./_helpers.js";

export default {
	verb: "WEAR",
	object: { required: true, scope: SCOPE.HELD },
	execute: withObject((context, id) => {
		const state = context.state;
		if (!can(context, id, CAPABILITY.WEARABLE)) {
			return mismatch(`You can't wear ${the(context, id)}.`, "not wearable");
		}
		if (state.objectState(id).worn) {
			return conflict(`You're already wearing ${the(context, id)}.`);
		}
		state.moveObject(id, INVENTORY);
		state.updateObject(id, { worn: true });
		return ok(`You are now wearing ${the(context, id)}.`);
	}),
} satisfies CommandObject;
