/**
 * TAKE: picks up objects from the room or from open containers.
 *
 * @example
 * ```
 * take lamp
 * take lamp and sword
 * take all
 * take leaflet from mailbox
 * pick up leaflet
 * ```
 *
 * @module commands/take
 */

import type { CommandObject } from "../core/command.js";
import { the } from "../core/describe.js";
import { absent, conflict, mismatch, ok } from "../core/result.js";
import { isAccessible, roomObjects, SCOPE } from "../core/scope.js";
import { CAPABILITY, INVENTORY, inside } from "../core/world.js";
import { capitalizeFirst } from "../utils/string.js";
import { can, isWithin, react, withObject } from "./_helpers.js";

export default {
	verb: "TAKE",
	object: {
		required: true,
		scope: SCOPE.REACHABLE,
		multiple: true,
		all: (context, args) =>
			(args.tool === undefined
				? roomObjects(context.state)
				: isAccessible(context.state, args.tool)
					? context.state.contentsOf(inside(args.tool))
					: []
			).filter(
				(id) =>
					can(context, id, CAPABILITY.TAKEABLE) &&
					!context.state.objectState(id).tiedTo
			),
	},
	/** The container to take from. */
	tool: { required: false, scope: SCOPE.REACHABLE },
	execute: withObject((context, id, args) => {
		const state = context.state;
		const source = args.tool;
		if (source) {
			if (!isAccessible(state, source) || !isWithin(state, id, source)) {
				return absent(
					`${capitalizeFirst(the(context, id))} isn't in ${the(context, source)}.`
				);
			}
		}
		if (state.isHeld(id)) return conflict("You already have that.");
		if (!can(context, id, CAPABILITY.TAKEABLE)) {
			return mismatch(`You can't take ${the(context, id)}.`, "not takeable");
		}
		const tiedTo = state.objectState(id).tiedTo;
		if (tiedTo) {
			return conflict(
				`${capitalizeFirst(the(context, id))} is tied to ${the(
					context,
					tiedTo
				)}. You'll have to untie it first.`
			);
		}
		state.moveObject(id, INVENTORY);
		return ok(react(context, id, "TAKE") || "Taken.");
	}),
} satisfies CommandObject;
