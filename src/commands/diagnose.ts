/**
 * DIAGNOSE: how the player's mind is holding up.
 *
 * @module commands/diagnose
 */

import type { CommandObject } from "../core/command.js";
import { ok } from "../core/result.js";
import { describeSanity } from "../core/sanity.js";

export default {
	verb: "DIAGNOSE",
	meta: true,
	execute(context) {
		const state = context.state;
		const lines = [`${describeSanity(state.sanity)} (sanity ${state.sanity})`];
		if (state.cursed) lines.push("Something cold clings to you. You have been cursed.");
		return ok(lines.join("\n"));
	},
} satisfies CommandObject;
