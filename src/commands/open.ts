/**
 * OPEN: opens doors and containers.
 *
 * A locked object is reported as locked before anything else. Opening a
 * container shows what is inside; containers that release their contents
 * on opening (the mailbox) drop them into the room.
 *
 * @example
 * ```
 * open mailbox
 * open trap door
 * ```
 *
 * @module commands/open
 */

import type { CommandObject } from "../core/command.js";
import { a, the } from "../core/describe.js";
import { blocked, conflict, mismatch, ok } from "../core/result.js";
import { SCOPE } from "../core/scope.js";
import { CAPABILITY, hasCapability, inRoom, inside, isContainer } from "../core/world.js";
import { capitalizeFirst, joinWithAnd } from "../utils/string.js";
import { withObject } from "./_helpers.js";

export default {
	verb: "OPEN",
	object: { required: true, scope: SCOPE.REACHABLE },
	execute: withObject((context, id) => {
		const state = context.state;
		const template = context.world.object(id);
		const The = capitalizeFirst(the(context, id));
		if (state.objectState(id).locked) return blocked(`${The} is locked.`);
		if (!hasCapability(template, CAPABILITY.OPENABLE)) {
			return mismatch(`You can't open ${the(context, id)}.`, "not openable");
		}
		if (state.objectState(id).open) return conflict(`${The} is already open.`);
		state.updateObject(id, { open: true });

		if (!isContainer(template)) return ok("Opened.");
		const contents = state.contentsOf(inside(id));
		if (!contents.length) return ok("Opened.");
		if (template.releaseOnOpen) {
			for (const child of contents) {
				state.moveObject(child, inRoom(state.currentRoom));
				context.affected.add(child);
			}
		}
		return ok(
			`Opening ${the(context, id)} reveals ${joinWithAnd(
				contents.map((child) => a(context, child))
			)}.`
		);
	}),
} satisfies CommandObject;
