/**
 * TALK: talks to someone, optionally about a topic.
 *
 * The reply is looked up in the speaker's dialogue table, by the whole
 * topic and then by each of its words, falling back to `default`.
 *
 * @example
 * ```
 * talk to caretaker
 * ask caretaker about key
 * ```
 *
 * @module commands/talk
 */

import type { CommandObject } from "../core/command.js";
import { the } from "../core/describe.js";
import { conflict, mismatch, ok } from "../core/result.js";
import { SCOPE } from "../core/scope.js";
import { isActor } from "../core/world.js";
import { capitalizeFirst } from "../utils/string.js";
import { withObject } from "./_helpers.js";

export default {
	verb: "TALK",
	topic: true,
	object: {
		required: true,
		scope: SCOPE.ROOM,
		prompt: "Who do you want to talk to?",
	},
	execute: withObject((context, id, args) => {
		const template = context.world.object(id);
		const The = capitalizeFirst(the(context, id));
		if (!isActor(template)) {
			return mismatch(`You can't talk to ${the(context, id)}.`, "not a person");
		}
		if (context.state.objectState(id).disposition === "asleep") {
			return conflict(`${The} is asleep.`);
		}
		const dialogue = template.dialogue;
		let line: string | undefined;
		if (args.topic) {
			line =
				dialogue[args.topic] ??
				args.topic
					.split(" ")
					.map((word) => dialogue[word])
					.find((reply) => reply !== undefined);
		}
		return ok(line ?? dialogue.default ?? `${The} has nothing to say.`);
	}),
} satisfies CommandObject;
