/**
 * DRINK: drinks from a container of liquid, or a drinkable object.
 *
 * @module commands/drink
 */

import type { CommandObject } from "../core/command.js";
import { the } from "../core/describe.js";
import { mismatch, ok } from "../core/result.js";
import { SCOPE } from "../core/scope.js";
import { CAPABILITY, DESTROYED } from "../core/world.js";
import { can, react, withObject } from "./_helpers.js";
import { drain } from "./_liquid.js";

export default {
	verb: "DRINK",
	object: { required: true, scope: SCOPE.REACHABLE },
	execute: withObject((context, id) => {
		const liquid = context.state.objectState(id).liquid;
		if (liquid && liquid.amount > 0) {
			drain(context, id, 1);
			return ok(react(context, id) || `You drink some of the ${liquid.kind}. Refreshing.`);
		}
		if (can(context, id, CAPABILITY.DRINKABLE)) {
			context.state.moveObject(id, DESTROYED);
			return ok(react(context, id) || "Thank you very much. I was rather thirsty.");
		}
		return mismatch(`You can't drink ${the(context, id)}.`, "not drinkable");
	}),
} satisfies CommandObject;
