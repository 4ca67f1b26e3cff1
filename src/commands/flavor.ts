/**
 * WAVE, RUB, SHAKE, SQUEEZE and TOUCH.
 *
 * These do nothing in particular unless an object has a reaction for the
 * verb (rubbing the mirror, rubbing the idol).
 *
 * @module commands/flavor
 */

import type { CommandObject } from "../core/command.js";
import { the, themed } from "../core/describe.js";
import { ok } from "../core/result.js";
import { SCOPE } from "../core/scope.js";
import { react, withObject } from "./_helpers.js";

const DEFAULTS: Record<string, { plain: (name: string) => string; haunted: (name: string) => string }> = {
	WAVE: {
		plain: (name) => `You wave ${name}. Nothing happens.`,
		haunted: (name) => `You wave ${name}. Somewhere in the house, something waves back.`,
	},
	RUB: {
		plain: (name) => `Rubbing ${name} doesn't seem to do anything.`,
		haunted: (name) => `You rub ${name}. It feels faintly warm, like skin.`,
	},
	SHAKE: {
		plain: (name) => `You shake ${name}. Nothing happens.`,
		haunted: (name) => `You shake ${name}. Something rattles, though nothing is inside.`,
	},
	SQUEEZE: {
		plain: (name) => `You squeeze ${name}. Nothing happens.`,
		haunted: (name) => `You squeeze ${name}. It seems to squeeze back.`,
	},
	TOUCH: {
		plain: () => "You feel nothing unexpected.",
		haunted: () => "It is colder than it should be.",
	},
};

export default {
	verb: "WAVE",
	aliases: ["RUB", "SHAKE", "SQUEEZE", "TOUCH"],
	object: { required: true, scope: SCOPE.REACHABLE },
	execute: withObject((context, id) => {
		const reaction = react(context, id);
		if (reaction) return ok(reaction);
		const lines = DEFAULTS[context.command.verb] ?? DEFAULTS.TOUCH;
		const name = the(context, id);
		return ok(themed(context, lines.plain(name), lines.haunted(name)));
	}),
} satisfies CommandObject;
