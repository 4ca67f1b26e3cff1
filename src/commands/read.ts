/**
 * READ: shows the text written on an object.
 *
 * @example
 * ```
 * read leaflet
 * ```
 *
 * @module commands/read
 */

import type { CommandObject } from "../core/command.js";
import { the } from "../core/describe.js";
import { blocked, mismatch, ok } from "../core/result.js";
import { isLit, SCOPE } from "../core/scope.js";
import { CAPABILITY, hasCapability } from "../core/world.js";
import { react, withObject } from "./_helpers.js";

export default {
	verb: "READ",
	object: {
		required: true,
		scope: SCOPE.REACHABLE,
		prompt: "What do you want to read?",
	},
	execute: withObject((context, id) => {
		const template = context.world.object(id);
		if (!hasCapability(template, CAPABILITY.READABLE) || !template.text) {
			return mismatch(`There's nothing written on ${the(context, id)}.`, "not readable");
		}
		if (!isLit(context.state)) return blocked("It is too dark to read.");
		const extra = react(context, id, "READ");
		return ok(extra ? `${template.text}\n${extra}` : template.text);
	}),
} satisfies CommandObject;
