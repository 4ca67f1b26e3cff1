/**
 * PUT: places objects inside a container.
 *
 * Containers marked as scoring (the trophy case) award an object's
 * treasure value the first time it is put inside.
 *
 * @example
 * ```
 * put leaflet in mailbox
 * put painting and skull in case
 * ```
 *
 * @module commands/put
 */

import type { CommandObject } from "../core/command.js";
import { the } from "../core/describe.js";
import { awardScore } from "../core/reactions.js";
import { conflict, mismatch, ok } from "../core/result.js";
import { isAccessible, SCOPE } from "../core/scope.js";
import { inside, isContainer } from "../core/world.js";
import { capitalizeFirst } from "../utils/string.js";
import { isWithin, withObject } from "./_helpers.js";

/** Flag recording that a treasure has been scored. */
export function scoredFlag(id: string): string {
	return `scored:${id}`;
}

export default {
	verb: "PUT",
	object: { required: true, scope: SCOPE.REACHABLE, multiple: true },
	tool: {
		required: true,
		scope: SCOPE.REACHABLE,
		prompt: "Where do you want to put it?",
	},
	execute: withObject((context, id, args) => {
		const state = context.state;
		const container = args.tool;
		if (!container) return mismatch("Where do you want to put it?");
		const template = context.world.object(container);
		if (id === container || isWithin(state, container, id)) {
			return mismatch("You can't put something inside itself.", "would contain itself");
		}
		if (!isContainer(template)) {
			return mismatch(
				`You can't put anything in ${the(context, container)}.`,
				"not a container"
			);
		}
		if (isWithin(state, id, container)) {
			return conflict(
				`${capitalizeFirst(the(context, id))} is already in ${the(context, container)}.`
			);
		}
		if (!isAccessible(state, container)) {
			return conflict(`${capitalizeFirst(the(context, container))} is closed.`);
		}
		if (state.contentsOf(inside(container)).length >= template.capacity) {
			return conflict(`There's no more room in ${the(context, container)}.`);
		}
		state.moveObject(id, inside(container));
		if (state.objectState(id).worn) state.updateObject(id, { worn: false });
		context.affected.add(container);
		const treasure = context.world.object(id).treasure;
		if (template.scoring && treasure > 0 && !state.hasFlag(scoredFlag(id))) {
			state.setFlag(scoredFlag(id));
			awardScore(context, treasure);
		}
		return ok("Done.");
	}),
} satisfies CommandObject;
