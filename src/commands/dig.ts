/**
 * DIG: digs in soft ground with a digging tool and uncovers whatever is
 * buried there. Each spot can be dug once.
 *
 * @example
 * ```
 * dig with shovel
 * dig in sand with shovel
 * ```
 *
 * @module commands/dig
 */

import type { CommandObject } from "../core/command.js";
import { a, the } from "../core/describe.js";
import { conflict, mismatch, ok } from "../core/result.js";
import { SCOPE } from "../core/scope.js";
import { CAPABILITY, inRoom } from "../core/world.js";
import { joinWithAnd } from "../utils/string.js";
import { can, findHeld } from "./_helpers.js";

export default {
	verb: "DIG",
	tool: { required: false, scope: SCOPE.HELD },
	execute(context, args) {
		const state = context.state;
		const room = context.world.room(state.currentRoom);
		if (!room.isDiggable) return mismatch("The ground here is too hard to dig.", "not diggable");
		const tool = args.tool ?? findHeld(state, CAPABILITY.DIGGING_TOOL);
		if (!tool) return mismatch("You'd need something to dig with.", "no digging tool");
		if (!can(context, tool, CAPABILITY.DIGGING_TOOL)) {
			return mismatch(`You can't dig with ${the(context, tool)}.`, "not a digging tool");
		}
		if (state.roomState(room.id).dug) {
			return conflict("You've already dug here. There's nothing more to find.");
		}
		state.updateRoom(room.id, { dug: true });
		const found = room.buried.filter((id) => state.locationOf(id).kind === "nowhere");
		for (const id of found) {
			state.moveObject(id, inRoom(room.id));
			context.affected.add(id);
		}
		if (!found.length) return ok("You dig a hole, but find nothing.");
		return ok(`You dig a hole and uncover ${joinWithAnd(found.map((id) => a(context, id)))}.`);
	},
} satisfies CommandObject;
