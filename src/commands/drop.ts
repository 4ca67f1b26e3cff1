/**
 * DROP: puts carried objects down in the current room.
 *
 * @example
 * ```
 * drop sword
 * drop all
 * put down lamp
 * ```
 *
 * @module commands/drop
 */

import type { CommandObject } from "../core/command.js";
import { ok } from "../core/result.js";
import { SCOPE } from "../core/scope.js";
import { inRoom } from "../core/world.js";
import { withObject } from "./_helpers.js";

export default {
	verb: "DROP",
	object: {
		required: true,
		scope: SCOPE.HELD,
		multiple: true,
		all: (context) => context.state.inventory,
	},
	execute: withObject((context, id) => {
		const state = context.state;
		state.moveObject(id, inRoom(state.currentRoom));
		if (state.objectState(id).worn) state.updateObject(id, { worn: false });
		return ok("Dropped.");
	}),
} satisfies CommandObject;
