/**
 * GIVE: hands a carried object to someone.
 *
 * What the recipient does with it is looked up in its `gifts` table.
 *
 * @example
 * ```
 * give garlic to caretaker
 * ```
 *
 * @module commands/give
 */

import type { CommandObject } from "../core/command.js";
import { the } from "../core/describe.js";
import { applyReaction, canReact } from "../core/reactions.js";
import { absent, conflict, mismatch, ok } from "../core/result.js";
import { SCOPE } from "../core/scope.js";
import { heldBy, isActor } from "../core/world.js";
import { capitalizeFirst } from "../utils/string.js";
import { withObject } from "./_helpers.js";

export default {
	verb: "GIVE",
	object: { required: true, scope: SCOPE.HELD },
	tool: {
		required: true,
		scope: SCOPE.ROOM,
		prompt: (context) =>
			`Who do you want to give the ${context.command.object ?? "it"} to?`,
	},
	execute: withObject((context, id, args) => {
		const state = context.state;
		if (!state.isHeld(id)) {
			return absent(`You'll have to take ${the(context, id)} out first.`);
		}
		const recipient = args.tool;
		if (!recipient) return mismatch("Who do you want to give it to?");
		const template = context.world.object(recipient);
		const Recipient = capitalizeFirst(the(context, recipient));
		if (!isActor(template)) {
			return mismatch(`You can't give anything to ${the(context, recipient)}.`, "not a person");
		}
		if (state.objectState(recipient).disposition === "asleep") {
			return conflict(`${Recipient} is asleep.`);
		}
		state.moveObject(id, heldBy(recipient));
		if (state.objectState(id).worn) state.updateObject(id, { worn: false });
		context.affected.add(recipient);
		const key = `GIFT:${id}`;
		const gift = template.gifts[id];
		if (gift && canReact(context, gift, recipient, key)) {
			return ok(applyReaction(context, gift, recipient, key));
		}
		return ok(`${Recipient} takes ${the(context, id)} without a word.`);
	}),
} satisfies CommandObject;
